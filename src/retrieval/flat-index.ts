// ============================================================================
// FILE: src/retrieval/flat-index.ts
// PURPOSE: Exact nearest-neighbor index over float32 vectors (squared L2)
// ============================================================================

import * as fs from 'fs/promises';
import { CorruptIndexError, DimensionMismatchError, IndexNotFoundError, isNotFound } from '../errors.js';
import type { Neighbor } from '../types.js';

// ----------------------------------------------------------------------------
// SECTION 1: INTERFACE
// ----------------------------------------------------------------------------

/**
 * VectorIndex - Positional nearest-neighbor structure
 *
 * Vectors are addressed by insertion position only; callers keep any
 * parallel data (the metadata table) aligned by position. An approximate
 * index can replace the flat one behind this interface.
 *
 * Loading is a static factory on the implementation (FlatL2Index.load),
 * since an interface cannot declare one.
 */
export interface VectorIndex {
  readonly dimension: number;
  readonly size: number;
  /** Embedding model the vectors came from ('' when unknown) */
  readonly model: string;
  add(vector: ArrayLike<number>): number;
  search(query: ArrayLike<number>, topK: number): Neighbor[];
  vectorAt(position: number): number[];
  save(filePath: string): Promise<void>;
}

// ----------------------------------------------------------------------------
// SECTION 2: DISTANCE
// ----------------------------------------------------------------------------

/**
 * squaredL2 - Squared Euclidean distance between equal-length vectors
 */
export function squaredL2(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return sum;
}

// ----------------------------------------------------------------------------
// SECTION 3: FLAT INDEX
// ----------------------------------------------------------------------------

const MAGIC = 'SVX1';
const FORMAT_VERSION = 1;
/** magic + version + dimension + count + model length */
const FIXED_HEADER_BYTES = 20;

/**
 * FlatL2Index - Brute-force index, exact squared-L2 search
 *
 * Vectors are stored as float32 rows. Search is O(n·d) per query, which is
 * fine for the low thousands of researcher records this serves.
 *
 * File layout (little-endian):
 *   "SVX1" | u32 version | u32 dimension | u32 count | u32 modelLen |
 *   model utf-8 | float32[count * dimension]
 */
export class FlatL2Index implements VectorIndex {
  private readonly rows: Float32Array[] = [];

  constructor(
    readonly dimension: number,
    readonly model: string = ''
  ) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new DimensionMismatchError(`Index dimension must be a positive integer, got ${dimension}`, {
        actual: dimension,
      });
    }
  }

  get size(): number {
    return this.rows.length;
  }

  /**
   * add - Append a vector and return its position
   */
  add(vector: ArrayLike<number>): number {
    if (vector.length !== this.dimension) {
      throw DimensionMismatchError.forVectors(this.dimension, vector.length, `vector #${this.rows.length}`);
    }
    this.rows.push(Float32Array.from(vector));
    return this.rows.length - 1;
  }

  /**
   * search - The topK nearest positions, nearest first
   *
   * topK is clamped to the index size. Equal distances keep insertion
   * order (lower position first).
   */
  search(query: ArrayLike<number>, topK: number): Neighbor[] {
    if (query.length !== this.dimension) {
      throw DimensionMismatchError.forVectors(this.dimension, query.length, 'query');
    }
    const k = Math.min(Math.max(0, Math.floor(topK)), this.rows.length);
    if (k === 0) return [];

    const q = Float32Array.from(query);
    const scored: Neighbor[] = this.rows.map((row, position) => ({
      position,
      distance: squaredL2(q, row),
    }));

    scored.sort((a, b) => a.distance - b.distance || a.position - b.position);
    return scored.slice(0, k);
  }

  vectorAt(position: number): number[] {
    const row = this.rows[position];
    if (!row) {
      throw new RangeError(`No vector at position ${position} (size ${this.rows.length})`);
    }
    return Array.from(row);
  }

  // --------------------------------------------------------------------------
  // Serialization
  // --------------------------------------------------------------------------

  toBuffer(): Buffer {
    const modelBytes = Buffer.from(this.model, 'utf-8');
    const dataOffset = FIXED_HEADER_BYTES + modelBytes.length;
    const buffer = Buffer.alloc(dataOffset + this.rows.length * this.dimension * 4);

    buffer.write(MAGIC, 0, 'ascii');
    buffer.writeUInt32LE(FORMAT_VERSION, 4);
    buffer.writeUInt32LE(this.dimension, 8);
    buffer.writeUInt32LE(this.rows.length, 12);
    buffer.writeUInt32LE(modelBytes.length, 16);
    modelBytes.copy(buffer, FIXED_HEADER_BYTES);

    let offset = dataOffset;
    for (const row of this.rows) {
      for (const value of row) {
        buffer.writeFloatLE(value, offset);
        offset += 4;
      }
    }
    return buffer;
  }

  /**
   * fromBuffer - Decode an index written by toBuffer
   *
   * @param origin - File path for error messages
   * @throws CorruptIndexError on any header or length inconsistency
   */
  static fromBuffer(buffer: Buffer, origin = '<buffer>'): FlatL2Index {
    if (buffer.length < FIXED_HEADER_BYTES) {
      throw new CorruptIndexError(`Index file too short: ${origin}`, { path: origin, bytes: buffer.length });
    }
    const magic = buffer.toString('ascii', 0, 4);
    if (magic !== MAGIC) {
      throw new CorruptIndexError(`Not a vector index file (bad magic "${magic}"): ${origin}`, { path: origin });
    }
    const version = buffer.readUInt32LE(4);
    if (version !== FORMAT_VERSION) {
      throw new CorruptIndexError(`Unsupported index format version ${version}: ${origin}`, {
        path: origin,
        version,
      });
    }

    const dimension = buffer.readUInt32LE(8);
    const count = buffer.readUInt32LE(12);
    const modelLength = buffer.readUInt32LE(16);
    const dataOffset = FIXED_HEADER_BYTES + modelLength;
    const expectedBytes = dataOffset + count * dimension * 4;

    if (dimension === 0 || buffer.length !== expectedBytes) {
      throw new CorruptIndexError(`Index file size does not match its header: ${origin}`, {
        path: origin,
        expected: expectedBytes,
        actual: buffer.length,
      });
    }

    const model = buffer.toString('utf-8', FIXED_HEADER_BYTES, dataOffset);
    const index = new FlatL2Index(dimension, model);

    let offset = dataOffset;
    for (let i = 0; i < count; i++) {
      const row = new Float32Array(dimension);
      for (let j = 0; j < dimension; j++) {
        row[j] = buffer.readFloatLE(offset);
        offset += 4;
      }
      index.rows.push(row);
    }
    return index;
  }

  async save(filePath: string): Promise<void> {
    await fs.writeFile(filePath, this.toBuffer());
  }

  /**
   * load - Read an index file
   *
   * @throws IndexNotFoundError if the file does not exist
   * @throws CorruptIndexError if it cannot be decoded
   */
  static async load(filePath: string): Promise<FlatL2Index> {
    let buffer: Buffer;
    try {
      buffer = await fs.readFile(filePath);
    } catch (error) {
      if (isNotFound(error)) throw new IndexNotFoundError(filePath);
      throw error;
    }
    return FlatL2Index.fromBuffer(buffer, filePath);
  }
}
