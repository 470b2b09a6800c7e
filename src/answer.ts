// ============================================================================
// FILE: src/answer.ts
// PURPOSE: Turn retrieved records into LLM context and ask the question
// ============================================================================

import { DEFAULT_CURRENCY, type EmbeddingProvider } from './embeddings.js';
import type { ChatClient } from './llm-client.js';
import { selectWithinBudget } from './retrieval/budget.js';
import { searchWithDistances } from './retrieval/search.js';
import type { EntityRecord } from './types.js';

/**
 * formatRecordContext - Render one record as a context block
 *
 * EXAMPLE OUTPUT:
 * "Alice Nowak (WMiI UAM): fuzzy logic, NLP
 * - Fuzzy reasoning (2019-2022) | 150000 PLN
 * Source: https://researchportal.example/alice"
 */
export function formatRecordContext(record: EntityRecord, currency: string = DEFAULT_CURRENCY): string {
  const lines: string[] = [];

  const head = record.affiliation ? `${record.name} (${record.affiliation})` : record.name;
  lines.push(`${head}: ${record.research_areas.join(', ')}`);

  for (const project of record.projects) {
    let line = `- ${project.title}`;
    if (project.years) line += ` (${project.years})`;
    if (project.grant_amount !== null) line += ` | ${project.grant_amount} ${currency}`;
    lines.push(line);
  }

  if (record.source) {
    lines.push(`Source: ${record.source}`);
  }

  return lines.join('\n');
}

/**
 * buildPrompt - Context-then-question prompt sent to the chat model
 */
export function buildPrompt(context: string, question: string): string {
  return `CONTEXT:\n${context}\n\nQUESTION:\n${question}\n\nANSWER:`;
}

export interface AnswerDeps {
  embeddings: EmbeddingProvider;
  chat: ChatClient;
  indexPath: string;
}

export interface AskOptions {
  topK: number;
  maxContextChars: number;
  currency?: string;
  temperature?: number;
}

export interface AnswerResult {
  answer: string;
  records: EntityRecord[];
  context: string;
}

/**
 * askWithContext - Retrieve, build context, and ask the chat model
 *
 * Algorithm:
 * 1. Search the index for the topK nearest records
 * 2. Keep as many as fit in maxContextChars, in rank order
 * 3. Send the context + question prompt to the chat model
 */
export async function askWithContext(
  question: string,
  deps: AnswerDeps,
  options: AskOptions
): Promise<AnswerResult> {
  const currency = options.currency ?? DEFAULT_CURRENCY;

  const ranked = await searchWithDistances(question, deps.indexPath, options.topK, deps.embeddings);
  const { selected, context } = selectWithinBudget(
    ranked.map(r => r.record),
    options.maxContextChars,
    record => formatRecordContext(record, currency)
  );

  const answer = await deps.chat.complete([{ role: 'user', content: buildPrompt(context, question.trim()) }], {
    temperature: options.temperature ?? 0.3,
  });

  return { answer, records: selected, context };
}
