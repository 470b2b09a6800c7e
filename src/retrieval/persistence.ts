// ============================================================================
// FILE: src/retrieval/persistence.ts
// PURPOSE: Save and load the (vector index, metadata table) pair as a unit
// ============================================================================

import * as fs from 'fs/promises';
import * as path from 'path';
import { parseRecords } from '../dataset.js';
import { CorruptIndexError, IndexNotFoundError, InvalidDatasetError, isNotFound } from '../errors.js';
import type { EntityRecord } from '../types.js';
import { FlatL2Index, type VectorIndex } from './flat-index.js';

/**
 * SemanticIndex - A vector index and its positionally aligned metadata
 *
 * Invariant: index.size === metadata.length
 */
export interface SemanticIndex {
  index: VectorIndex;
  metadata: EntityRecord[];
}

/**
 * metadataPathFor - Companion metadata file for an index path
 */
export function metadataPathFor(indexPath: string): string {
  return `${indexPath}.meta.json`;
}

async function removeQuietly(filePath: string): Promise<void> {
  await fs.rm(filePath, { force: true });
}

/**
 * saveIndex - Persist an index pair atomically enough for a single operator
 *
 * Both files are written under temporary names and renamed into place only
 * once both writes succeed, so a failed rebuild leaves the previous pair
 * intact. Between the two renames there is a short window where a crash
 * leaves a new index beside old metadata; loadIndex reports that as
 * CorruptIndexError (count mismatch) and the pair has to be rebuilt.
 *
 * Concurrent builds to the same path are not coordinated; the last rename wins.
 */
export async function saveIndex(pair: SemanticIndex, indexPath: string): Promise<void> {
  if (pair.index.size !== pair.metadata.length) {
    throw new CorruptIndexError(
      `Refusing to save misaligned index: ${pair.index.size} vectors vs ${pair.metadata.length} records`,
      { path: indexPath, vectors: pair.index.size, records: pair.metadata.length }
    );
  }

  const metaPath = metadataPathFor(indexPath);
  await fs.mkdir(path.dirname(path.resolve(indexPath)), { recursive: true });

  const suffix = `.tmp-${process.pid}-${Date.now()}`;
  const tmpIndex = indexPath + suffix;
  const tmpMeta = metaPath + suffix;

  try {
    await pair.index.save(tmpIndex);
    await fs.writeFile(tmpMeta, JSON.stringify(pair.metadata, null, 2), 'utf-8');
  } catch (error) {
    await removeQuietly(tmpIndex);
    await removeQuietly(tmpMeta);
    throw error;
  }

  await fs.rename(tmpIndex, indexPath);
  await fs.rename(tmpMeta, metaPath);
}

async function readMetadata(metaPath: string): Promise<EntityRecord[]> {
  let raw: string;
  try {
    raw = await fs.readFile(metaPath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) throw new IndexNotFoundError(metaPath);
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new CorruptIndexError(`Metadata file is not valid JSON: ${metaPath}`, { path: metaPath }, error);
  }

  try {
    return parseRecords(json, metaPath);
  } catch (error) {
    if (error instanceof InvalidDatasetError) {
      throw new CorruptIndexError(`Metadata file does not hold records: ${error.message}`, { path: metaPath }, error);
    }
    throw error;
  }
}

/**
 * loadIndex - Load an index pair written by saveIndex
 *
 * Files are decoded with FlatL2Index.load, the reader for the SVX1 format
 * that VectorIndex.save writes.
 *
 * @throws IndexNotFoundError if either file is missing
 * @throws CorruptIndexError if a file is malformed or the counts differ
 */
export async function loadIndex(indexPath: string): Promise<SemanticIndex> {
  const metaPath = metadataPathFor(indexPath);

  // Check both before decoding anything, so a missing half is always "not found"
  for (const filePath of [indexPath, metaPath]) {
    try {
      await fs.access(filePath);
    } catch (error) {
      if (isNotFound(error)) throw new IndexNotFoundError(filePath);
      throw error;
    }
  }

  const index = await FlatL2Index.load(indexPath);
  const metadata = await readMetadata(metaPath);

  if (index.size !== metadata.length) {
    throw new CorruptIndexError(
      `Index and metadata are out of step: ${index.size} vectors vs ${metadata.length} records`,
      { path: indexPath, vectors: index.size, records: metadata.length }
    );
  }

  return { index, metadata };
}
