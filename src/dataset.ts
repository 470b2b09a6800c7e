// ============================================================================
// FILE: src/dataset.ts
// PURPOSE: Read and validate researcher records from a JSON data source
// ============================================================================

import * as fs from 'fs/promises';
import { z } from 'zod';
import { DatasetNotFoundError, InvalidDatasetError, isNotFound } from './errors.js';
import type { EntityRecord } from './types.js';

const text = z
  .string()
  .nullish()
  .transform(v => v ?? '');

export const ProjectSchema = z.object({
  title: text,
  years: z
    .union([z.string(), z.number()])
    .nullish()
    .transform(v => (v === null || v === undefined ? '' : String(v))),
  grant_amount: z
    .number()
    .nullish()
    .transform(v => v ?? null),
});

/**
 * EntityRecordSchema - Lenient record schema
 *
 * Scraped sources are patchy: missing strings become "", missing lists [],
 * missing grant amounts null. Unknown keys are dropped.
 */
export const EntityRecordSchema = z.object({
  name: text,
  affiliation: text,
  research_areas: z
    .array(z.string())
    .nullish()
    .transform(v => v ?? []),
  projects: z
    .array(ProjectSchema)
    .nullish()
    .transform(v => v ?? []),
  source: text,
});

export const EntityRecordArraySchema = z.array(EntityRecordSchema);

/**
 * parseRecords - Validate an already-parsed JSON value as a record array
 *
 * @param origin - Path or label used in error messages
 * @throws InvalidDatasetError naming the first offending element
 */
export function parseRecords(json: unknown, origin: string): EntityRecord[] {
  const parsed = EntityRecordArraySchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new InvalidDatasetError(`Invalid records in ${origin} at ${where}: ${issue.message}`, {
      path: origin,
      at: where,
    });
  }
  return parsed.data;
}

/**
 * loadRecords - Read an array of EntityRecords from a UTF-8 JSON file
 *
 * @throws DatasetNotFoundError if the file does not exist
 * @throws InvalidDatasetError if it is not a JSON array of records
 */
export async function loadRecords(dataPath: string): Promise<EntityRecord[]> {
  let raw: string;
  try {
    raw = await fs.readFile(dataPath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) throw new DatasetNotFoundError(dataPath);
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new InvalidDatasetError(`Data file is not valid JSON: ${dataPath}`, { path: dataPath }, error);
  }

  return parseRecords(json, dataPath);
}
