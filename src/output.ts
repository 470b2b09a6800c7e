// ============================================================================
// FILE: src/output.ts
// PURPOSE: Write evaluation reports (CSV) and format results for the console
// ============================================================================

import * as fs from 'fs/promises';
import * as path from 'path';
import { createObjectCsvWriter } from 'csv-writer';
import { DEFAULT_CURRENCY } from './embeddings.js';
import type { EntityRecord, RankedRecord } from './types.js';

// ----------------------------------------------------------------------------
// SECTION 1: EVALUATION REPORT
// ----------------------------------------------------------------------------

/**
 * JudgeScores - 0-2 ratings from the LLM judge
 */
export interface JudgeScores {
  factualAccuracyRag: number;
  completenessRag: number;
  factualAccuracyBaseline: number;
  completenessBaseline: number;
}

/**
 * EvaluationRow - One question's answers and scores
 *
 * scores is null when the judge reply could not be parsed; the row is
 * still written with empty score cells.
 */
export interface EvaluationRow {
  question: string;
  ragAnswer: string;
  baselineAnswer: string;
  scores: JudgeScores | null;
  notes: string;
}

export const REPORT_HEADER = [
  { id: 'question', title: 'Question' },
  { id: 'ragAnswer', title: 'RAG answer' },
  { id: 'baselineAnswer', title: 'Baseline answer' },
  { id: 'factualAccuracyRag', title: 'Factual Accuracy (RAG)' },
  { id: 'completenessRag', title: 'Completeness (RAG)' },
  { id: 'factualAccuracyBaseline', title: 'Factual Accuracy (Baseline)' },
  { id: 'completenessBaseline', title: 'Completeness (Baseline)' },
  { id: 'notes', title: 'Notes' },
];

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * appendReportRows - Append rows to a CSV report, creating it with a header
 *
 * @param reportPath - Path to the .csv file
 */
export async function appendReportRows(reportPath: string, rows: EvaluationRow[]): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(reportPath)), { recursive: true });
  const append = await exists(reportPath);

  const writer = createObjectCsvWriter({ path: reportPath, header: REPORT_HEADER, append });
  await writer.writeRecords(
    rows.map(row => ({
      question: row.question,
      ragAnswer: row.ragAnswer,
      baselineAnswer: row.baselineAnswer,
      factualAccuracyRag: row.scores?.factualAccuracyRag ?? '',
      completenessRag: row.scores?.completenessRag ?? '',
      factualAccuracyBaseline: row.scores?.factualAccuracyBaseline ?? '',
      completenessBaseline: row.scores?.completenessBaseline ?? '',
      notes: row.notes,
    }))
  );
}

// ----------------------------------------------------------------------------
// SECTION 2: CONSOLE FORMATTING
// ----------------------------------------------------------------------------

/**
 * formatSearchResults - Readable listing of ranked records
 */
export function formatSearchResults(
  query: string,
  results: RankedRecord[],
  currency: string = DEFAULT_CURRENCY
): string {
  const lines: string[] = [];
  lines.push(`# Search: "${query}"`);
  lines.push(`Found ${results.length} matches`);
  lines.push('');

  results.forEach((r, i) => {
    const rec = r.record;
    lines.push(`${i + 1}. ${rec.name}${rec.affiliation ? ` (${rec.affiliation})` : ''} - distance: ${r.distance.toFixed(4)}`);
    if (rec.research_areas.length > 0) {
      lines.push(`   Areas: ${rec.research_areas.join(', ')}`);
    }
    for (const p of rec.projects) {
      const extras = [p.years, p.grant_amount !== null ? `${p.grant_amount} ${currency}` : '']
        .filter(Boolean)
        .join(' - ');
      lines.push(`   Project: ${p.title}${extras ? ` (${extras})` : ''}`);
    }
    if (rec.source) {
      lines.push(`   Source: ${rec.source}`);
    }
  });

  return lines.join('\n');
}

/**
 * IndexStats - Summary of a persisted index
 */
export interface IndexStats {
  records: number;
  dimension: number;
  model: string;
  withProjects: number;
  totalGrant: number;
  topAffiliations: Array<{ affiliation: string; count: number }>;
}

/**
 * calculateIndexStats - Count records, projects and affiliations
 */
export function calculateIndexStats(
  metadata: EntityRecord[],
  dimension: number,
  model: string,
  topN = 5
): IndexStats {
  const byAffiliation = new Map<string, number>();
  let withProjects = 0;
  let totalGrant = 0;

  for (const rec of metadata) {
    const key = rec.affiliation.trim() || '(none)';
    byAffiliation.set(key, (byAffiliation.get(key) ?? 0) + 1);
    if (rec.projects.length > 0) withProjects++;
    for (const p of rec.projects) totalGrant += p.grant_amount ?? 0;
  }

  const topAffiliations = [...byAffiliation.entries()]
    .map(([affiliation, count]) => ({ affiliation, count }))
    .sort((a, b) => b.count - a.count || a.affiliation.localeCompare(b.affiliation))
    .slice(0, topN);

  return { records: metadata.length, dimension, model, withProjects, totalGrant, topAffiliations };
}

export function formatIndexStats(stats: IndexStats, currency: string = DEFAULT_CURRENCY): string {
  return `
📊 Index Statistics
═══════════════════════════════
Records indexed:   ${stats.records}
Vector dimension:  ${stats.dimension}
Embedding model:   ${stats.model || '(unknown)'}
With projects:     ${stats.withProjects}
Total grants:      ${stats.totalGrant.toLocaleString('en-US')} ${currency}

Top affiliations:
${stats.topAffiliations.map(a => `   ${a.affiliation}: ${a.count}`).join('\n') || '   (none)'}
`;
}
