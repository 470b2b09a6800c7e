// ============================================================================
// FILE: src/retrieval/builder.ts
// PURPOSE: Turn researcher records into a persisted vector index
// ============================================================================

import { loadRecords } from '../dataset.js';
import { DEFAULT_CURRENCY, isDegenerateRecord, prepareRecordText, type EmbeddingProvider } from '../embeddings.js';
import { DimensionMismatchError, EmptyDatasetError, ProviderError, SaraError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { EntityRecord, ProgressCallback } from '../types.js';
import { FlatL2Index } from './flat-index.js';
import { metadataPathFor, saveIndex, type SemanticIndex } from './persistence.js';

export interface BuildOptions {
  currency?: string;
  onProgress?: ProgressCallback;
  logger?: Logger;
}

/**
 * SkippedRecord - A degenerate input record left out of the index
 */
export interface SkippedRecord {
  position: number;
  reason: string;
}

export interface BuildResult extends SemanticIndex {
  skipped: SkippedRecord[];
}

export interface BuildSummary {
  indexPath: string;
  metadataPath: string;
  count: number;
  dimension: number;
  model: string;
  skipped: SkippedRecord[];
}

async function embedRecord(provider: EmbeddingProvider, text: string, position: number): Promise<number[]> {
  let vector: number[];
  try {
    vector = await provider.embed(text);
  } catch (error) {
    if (error instanceof SaraError) throw error;
    throw new ProviderError(
      `Embedding failed for record #${position}: ${error instanceof Error ? error.message : String(error)}`,
      null,
      error
    );
  }

  if (vector.length === 0) {
    throw new ProviderError(`Embedding provider returned an empty vector for record #${position}`);
  }
  if (!vector.every(Number.isFinite)) {
    throw new ProviderError(`Embedding provider returned non-finite values for record #${position}`);
  }
  return vector;
}

/**
 * buildIndex - Embed every record and assemble the index pair in memory
 *
 * Records are embedded one at a time, in order. Degenerate records (nothing
 * to embed) are skipped with a warning. The first vector fixes the
 * dimension; any provider failure aborts the whole build.
 *
 * @throws EmptyDatasetError if there is nothing to index
 * @throws DimensionMismatchError if the provider changes dimension mid-build
 * @throws ProviderError if an embedding call fails
 */
export async function buildIndex(
  records: EntityRecord[],
  provider: EmbeddingProvider,
  options: BuildOptions = {}
): Promise<BuildResult> {
  const logger = options.logger ?? createLogger('Build');
  const currency = options.currency ?? DEFAULT_CURRENCY;

  if (records.length === 0) {
    throw new EmptyDatasetError('Cannot build an index from an empty dataset', { records: 0 });
  }

  // Step 1: Prepare texts, dropping degenerate records
  const prepared: Array<{ record: EntityRecord; text: string; position: number }> = [];
  const skipped: SkippedRecord[] = [];

  records.forEach((record, position) => {
    if (isDegenerateRecord(record)) {
      const reason = 'record has no name, affiliation, research areas or projects';
      logger.warn(`Skipping record #${position}: ${reason}`);
      skipped.push({ position, reason });
      return;
    }
    prepared.push({ record, text: prepareRecordText(record, currency), position });
  });

  if (prepared.length === 0) {
    throw new EmptyDatasetError(`All ${records.length} records are empty; nothing to index`, {
      records: records.length,
      skipped: skipped.length,
    });
  }

  // Step 2: Embed sequentially; the first vector fixes the dimension
  let index: FlatL2Index | null = null;
  const metadata: EntityRecord[] = [];

  for (let i = 0; i < prepared.length; i++) {
    const { record, text, position } = prepared[i];
    const vector = await embedRecord(provider, text, position);

    if (index === null) {
      index = new FlatL2Index(vector.length, provider.model);
    } else if (vector.length !== index.dimension) {
      throw DimensionMismatchError.forVectors(index.dimension, vector.length, `record #${position} (${record.name})`);
    }

    index.add(vector);
    metadata.push(record);
    options.onProgress?.(i + 1, prepared.length);
  }

  // prepared is non-empty, so the loop ran at least once
  if (index === null) {
    throw new EmptyDatasetError();
  }

  return { index, metadata, skipped };
}

/**
 * buildIndexFromFile - Build entry point: JSON data file in, index pair out
 */
export async function buildIndexFromFile(
  dataPath: string,
  indexPath: string,
  provider: EmbeddingProvider,
  options: BuildOptions = {}
): Promise<BuildSummary> {
  const logger = options.logger ?? createLogger('Build');

  const records = await loadRecords(dataPath);
  logger.info(`Loaded ${records.length} records from ${dataPath}`);

  const result = await buildIndex(records, provider, { ...options, logger });
  await saveIndex(result, indexPath);
  logger.info(`Saved ${result.index.size} vectors to ${indexPath}`);

  return {
    indexPath,
    metadataPath: metadataPathFor(indexPath),
    count: result.index.size,
    dimension: result.index.dimension,
    model: result.index.model,
    skipped: result.skipped,
  };
}
