// ============================================================================
// FILE: src/errors.ts
// PURPOSE: Error taxonomy for index build, persistence, search and providers
// ============================================================================

/**
 * ErrorCode - Stable identifiers for every failure the pipeline reports.
 * Surfaced in CLI output and HTTP error bodies.
 */
export enum ErrorCode {
  EMPTY_DATASET = 'EMPTY_DATASET',
  DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',
  INDEX_NOT_FOUND = 'INDEX_NOT_FOUND',
  CORRUPT_INDEX = 'CORRUPT_INDEX',
  INVALID_QUERY = 'INVALID_QUERY',
  PROVIDER_ERROR = 'PROVIDER_ERROR',
  DATASET_NOT_FOUND = 'DATASET_NOT_FOUND',
  INVALID_DATASET = 'INVALID_DATASET',
  CONFIG_ERROR = 'CONFIG_ERROR',
}

export type ErrorDetails = Record<string, string | number | boolean | null>;

/**
 * SaraError - Base class for all pipeline errors
 *
 * Carries a machine-readable code plus the values needed to diagnose the
 * failure (paths, expected vs actual counts) without a debugger.
 */
export class SaraError extends Error {
  readonly code: ErrorCode;
  readonly details: ErrorDetails;

  constructor(code: ErrorCode, message: string, details: ErrorDetails = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'SaraError';
    this.code = code;
    this.details = details;
  }
}

export class EmptyDatasetError extends SaraError {
  constructor(message = 'Dataset contains no indexable records', details: ErrorDetails = {}) {
    super(ErrorCode.EMPTY_DATASET, message, details);
    this.name = 'EmptyDatasetError';
  }
}

export class DimensionMismatchError extends SaraError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(ErrorCode.DIMENSION_MISMATCH, message, details);
    this.name = 'DimensionMismatchError';
  }

  static forVectors(expected: number, actual: number, context: string): DimensionMismatchError {
    return new DimensionMismatchError(
      `Embedding dimension mismatch for ${context}: expected ${expected}, got ${actual}`,
      { expected, actual, context }
    );
  }
}

export class IndexNotFoundError extends SaraError {
  constructor(readonly path: string) {
    super(ErrorCode.INDEX_NOT_FOUND, `Index file not found: ${path}`, { path });
    this.name = 'IndexNotFoundError';
  }
}

export class CorruptIndexError extends SaraError {
  constructor(message: string, details: ErrorDetails = {}, cause?: unknown) {
    super(ErrorCode.CORRUPT_INDEX, message, details, cause);
    this.name = 'CorruptIndexError';
  }
}

export class InvalidQueryError extends SaraError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(ErrorCode.INVALID_QUERY, message, details);
    this.name = 'InvalidQueryError';
  }
}

/**
 * ProviderError - Any failure talking to an embedding or chat backend
 * (network, auth, rate limit, timeout, malformed response).
 */
export class ProviderError extends SaraError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, cause?: unknown) {
    super(ErrorCode.PROVIDER_ERROR, message, { status }, cause);
    this.name = 'ProviderError';
    this.status = status;
  }
}

export class DatasetNotFoundError extends SaraError {
  constructor(readonly path: string) {
    super(ErrorCode.DATASET_NOT_FOUND, `Data file not found: ${path}`, { path });
    this.name = 'DatasetNotFoundError';
  }
}

export class InvalidDatasetError extends SaraError {
  constructor(message: string, details: ErrorDetails = {}, cause?: unknown) {
    super(ErrorCode.INVALID_DATASET, message, details, cause);
    this.name = 'InvalidDatasetError';
  }
}

export class ConfigError extends SaraError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(ErrorCode.CONFIG_ERROR, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * getErrorMessage - Display string for anything thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof SaraError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * isNotFound - True for fs errors raised on a missing path
 *
 * ENOTDIR covers a path whose parent component is a regular file.
 */
export function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}
