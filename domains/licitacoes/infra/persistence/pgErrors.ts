import { AppError, DatabaseError, toError } from '@errors';

import { StoreConflictError } from '../../domain/errors';

// serialization_failure, deadlock_detected
const CONFLICT_CODES = new Set(['40001', '40P01']);

function pgCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
* Map a driver error onto the pipeline's taxonomy: retryable write conflicts
* become StoreConflictError, everything else a sanitized DatabaseError
*/
export function translatePgError(error: unknown): AppError {
  if (error instanceof AppError) return error;

  const err = toError(error);
  const code = pgCode(error);
  if (code !== undefined && CONFLICT_CODES.has(code)) {
    return new StoreConflictError(`Concurrent write conflict (${code})`, { cause: err });
  }
  return DatabaseError.fromDBError(err);
}
