import { AppError, ErrorCodes } from '@errors';

/**
* Error taxonomy of the sync and search pipeline.
*
* Each class carries the data its handler needs: retry decisions read
* `SourceUnavailableError.retryable`, index retries read the failed subset
* from `IndexWriteFailureError.failures`.
*/

// ============================================================================
// Source (PNCP)
// ============================================================================

export class SourceUnavailableError extends AppError {
  constructor(
    message: string,
    /** HTTP status, null for network errors and timeouts */
    public readonly status: number | null,
    public readonly retryable: boolean,
    public readonly attempts: number = 1,
    options?: { cause?: Error }
  ) {
    super(message, ErrorCodes.SOURCE_UNAVAILABLE, 502, { status, retryable, attempts }, undefined, options);
  }

  /** Same failure, reported after `attempts` tries */
  withAttempts(attempts: number): SourceUnavailableError {
    return new SourceUnavailableError(this.message, this.status, this.retryable, attempts, {
      cause: this,
    });
  }
}

export class SourceSchemaError extends AppError {
  constructor(
    message: string,
    public readonly page: number
  ) {
    super(message, ErrorCodes.SOURCE_SCHEMA_ERROR, 502, { page });
  }
}

export class NormalizationError extends AppError {
  constructor(
    public readonly field: string,
    public readonly rawValue: unknown,
    public readonly reason: string,
    public readonly externalId: string | null = null
  ) {
    super(`Invalid ${field}: ${reason}`, ErrorCodes.NORMALIZATION_ERROR, 422, { field, rawValue, externalId });
  }
}

// ============================================================================
// System of record
// ============================================================================

export class StoreConflictError extends AppError {
  constructor(message = 'Concurrent write conflict', options?: { cause?: Error }) {
    super(message, ErrorCodes.STORE_CONFLICT, 409, undefined, undefined, options);
  }
}

// ============================================================================
// Search engine
// ============================================================================

export class IndexSchemaConflictError extends AppError {
  constructor(
    public readonly index: string,
    public readonly mismatches: string[]
  ) {
    super(
      `Index ${index} exists with an incompatible mapping: ${mismatches.join('; ')}`,
      ErrorCodes.INDEX_SCHEMA_CONFLICT,
      500,
      { index, mismatches }
    );
  }
}

export interface IndexWriteItemFailure {
  internalId: number;
  reason: string;
}

export class IndexWriteFailureError extends AppError {
  constructor(public readonly failures: IndexWriteItemFailure[]) {
    super(
      `${failures.length} document(s) failed to index`,
      ErrorCodes.INDEX_WRITE_FAILURE,
      500,
      { failures }
    );
  }

  get failedIds(): number[] {
    return this.failures.map(f => f.internalId);
  }
}

export class SearchUnavailableError extends AppError {
  constructor(message = 'Search unavailable', options?: { cause?: Error }) {
    super(message, ErrorCodes.SEARCH_UNAVAILABLE, 503, undefined, undefined, options);
  }
}
