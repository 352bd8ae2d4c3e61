/**
* Unified Error Handling Package
*
* Standardized error classes, error codes, and helpers shared by the sync
* pipeline, the search service and the HTTP routes.
*
* Standard Error Format:
* {
*   error: string;       // Human-readable error message
*   code: string;        // Machine-readable error code
*   details?: unknown;   // Additional error details (validation issues, etc.)
*   requestId?: string;  // Request ID for tracing
* }
*/

// ============================================================================
// Error Code Constants
// ============================================================================

export const ErrorCodes = {
  // Validation Errors
  VALIDATION_ERROR: 'VALIDATION_ERROR',

  // Resource Errors
  NOT_FOUND: 'NOT_FOUND',

  // Database Errors
  DATABASE_ERROR: 'DATABASE_ERROR',
  CONNECTION_ERROR: 'CONNECTION_ERROR',
  QUERY_TIMEOUT: 'QUERY_TIMEOUT',
  STORE_CONFLICT: 'STORE_CONFLICT',

  // Service Errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',

  // Source (procurement portal) Errors
  SOURCE_UNAVAILABLE: 'SOURCE_UNAVAILABLE',
  SOURCE_SCHEMA_ERROR: 'SOURCE_SCHEMA_ERROR',
  NORMALIZATION_ERROR: 'NORMALIZATION_ERROR',

  // Search Engine Errors
  SEARCH_UNAVAILABLE: 'SEARCH_UNAVAILABLE',
  INDEX_SCHEMA_CONFLICT: 'INDEX_SCHEMA_CONFLICT',
  INDEX_WRITE_FAILURE: 'INDEX_WRITE_FAILURE',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

// ============================================================================
// Error Response Interface
// ============================================================================

/**
 * Standardized error response shape returned by all API endpoints.
 */
export interface ErrorResponse {
  /** Human-readable error message */
  error: string;
  /** Machine-readable error code from ErrorCodes */
  code: string;
  /** Additional error details (validation issues, etc.) - hidden in production */
  details?: unknown;
  /** Request ID for distributed tracing */
  requestId?: string;
}

// ============================================================================
// Base Application Error Class
// ============================================================================

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;
  public readonly requestId: string | undefined;
  public readonly statusCode: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    statusCode: number = 500,
    details?: unknown,
    requestId: string | undefined = undefined,
    options?: { cause?: Error }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    this.requestId = requestId;

    // Maintains proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): ErrorResponse {
    return {
      error: this.message,
      code: this.code,
      ...(this.details !== undefined && { details: this.details }),
      ...(this.requestId !== undefined && { requestId: this.requestId }),
    };
  }
}

// ============================================================================
// Specific Error Classes
// ============================================================================

export class ValidationError extends AppError {
  constructor(
    message: string = 'Validation failed',
    details?: unknown,
    requestId?: string
  ) {
    super(message, ErrorCodes.VALIDATION_ERROR, 400, details, requestId);
  }
}

export class NotFoundError extends AppError {
  constructor(
    resource: string = 'Resource',
    code: ErrorCode = ErrorCodes.NOT_FOUND
  ) {
    super(`${resource} not found`, code, 404);
  }
}

export class DatabaseError extends AppError {
  constructor(
    message: string = 'Database error',
    details?: unknown,
    code: ErrorCode = ErrorCodes.DATABASE_ERROR,
    options?: { cause?: Error }
  ) {
    super(message, code, 500, details, undefined, options);
  }

  /**
  * Create sanitized database error that doesn't leak internal details
  */
  static fromDBError(error: Error): DatabaseError {
    const message = error.message.toLowerCase();
    let sanitizedMessage = 'An unexpected database error occurred';
    let code: ErrorCode = ErrorCodes.DATABASE_ERROR;

    if (message.includes('connection') || message.includes('econnrefused') || message.includes('enotfound')) {
      sanitizedMessage = 'Database connection error. Please try again later.';
      code = ErrorCodes.CONNECTION_ERROR;
    } else if (message.includes('timeout')) {
      sanitizedMessage = 'Database query timeout.';
      code = ErrorCodes.QUERY_TIMEOUT;
    }

    return new DatabaseError(
      sanitizedMessage,
      { originalError: process.env['NODE_ENV'] === 'development' ? error.message : undefined },
      code,
      { cause: error }
    );
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Extract error message from unknown catch parameter.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Normalize an unknown catch parameter into an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
