// ============================================================================
// FILE: src/retrieval/search.ts
// PURPOSE: Top-k nearest researcher records for a free-text query
// ============================================================================

import type { EmbeddingProvider } from '../embeddings.js';
import { DimensionMismatchError, InvalidQueryError, ProviderError, SaraError } from '../errors.js';
import type { EntityRecord, RankedRecord } from '../types.js';
import { loadIndex, type SemanticIndex } from './persistence.js';

// ----------------------------------------------------------------------------
// VALIDATION
// ----------------------------------------------------------------------------

/**
 * validateQuery - Trim a query and reject blank input
 */
export function validateQuery(query: string): string {
  const trimmed = query.trim();
  if (!trimmed) {
    throw new InvalidQueryError('Query must not be empty');
  }
  return trimmed;
}

export function validateTopK(topK: number): number {
  if (!Number.isInteger(topK) || topK <= 0) {
    throw new InvalidQueryError(`top_k must be a positive integer, got ${topK}`, { topK });
  }
  return topK;
}

// ----------------------------------------------------------------------------
// SEARCH OVER A LOADED INDEX
// ----------------------------------------------------------------------------

/**
 * embedQuery - Embed a query and check it fits the index's embedding space
 *
 * @throws DimensionMismatchError on a model or dimension mismatch
 */
async function embedQuery(query: string, loaded: SemanticIndex, provider: EmbeddingProvider): Promise<number[]> {
  const { index } = loaded;

  if (index.model && provider.model && index.model !== provider.model) {
    throw new DimensionMismatchError(
      `Index was built with embedding model "${index.model}" but the query provider uses "${provider.model}"`,
      { expected: index.model, actual: provider.model }
    );
  }

  let vector: number[];
  try {
    vector = await provider.embed(query);
  } catch (error) {
    if (error instanceof SaraError) throw error;
    throw new ProviderError(
      `Query embedding failed: ${error instanceof Error ? error.message : String(error)}`,
      null,
      error
    );
  }

  if (vector.length !== index.dimension) {
    throw DimensionMismatchError.forVectors(index.dimension, vector.length, 'query');
  }
  return vector;
}

/**
 * searchLoaded - Rank records of an already-loaded index against a query
 *
 * topK larger than the record count is clamped. Results are nearest first;
 * equal distances keep index order.
 */
export async function searchLoaded(
  query: string,
  loaded: SemanticIndex,
  topK: number,
  provider: EmbeddingProvider
): Promise<RankedRecord[]> {
  const text = validateQuery(query);
  const k = validateTopK(topK);

  const vector = await embedQuery(text, loaded, provider);
  const neighbors = loaded.index.search(vector, k);

  return neighbors.map(n => ({
    record: loaded.metadata[n.position],
    distance: n.distance,
    position: n.position,
  }));
}

// ----------------------------------------------------------------------------
// QUERY ENTRY POINTS
// ----------------------------------------------------------------------------

/**
 * searchWithDistances - Load an index from disk and rank it against a query
 */
export async function searchWithDistances(
  query: string,
  indexPath: string,
  topK: number,
  provider: EmbeddingProvider
): Promise<RankedRecord[]> {
  // Validate before touching the disk so bad input fails fast
  validateQuery(query);
  validateTopK(topK);

  const loaded = await loadIndex(indexPath);
  return searchLoaded(query, loaded, topK, provider);
}

/**
 * search - The k nearest researcher records, nearest first
 *
 * @throws InvalidQueryError for a blank query or non-positive topK
 * @throws IndexNotFoundError / CorruptIndexError from loading
 * @throws DimensionMismatchError if the query embedding does not fit the index
 */
export async function search(
  query: string,
  indexPath: string,
  topK: number,
  provider: EmbeddingProvider
): Promise<EntityRecord[]> {
  const ranked = await searchWithDistances(query, indexPath, topK, provider);
  return ranked.map(r => r.record);
}
