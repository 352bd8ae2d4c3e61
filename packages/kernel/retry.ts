import { getLogger } from '@kernel/logger';

/**
* Retry Utilities
*
* Retry with exponential backoff and jitter, abortable through an AbortSignal.
*/

const logger = getLogger('retry');

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
* Options for retry operations
*/
export interface RetryOptions {
  /** Maximum number of retry attempts (the first call is not a retry) */
  maxRetries: number;
  /** Initial delay in milliseconds */
  initialDelayMs: number;
  /** Maximum delay in milliseconds */
  maxDelayMs: number;
  /** Multiplier for exponential backoff */
  backoffMultiplier: number;
  /** Error message patterns to retry */
  retryableErrors?: string[];
  /** Custom function to determine if error is retryable */
  shouldRetry?: (error: Error) => boolean;
  /** Callback invoked before each retry attempt */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  /** Optional AbortSignal to cancel the retry loop */
  signal?: AbortSignal;
  /** Operation name used in log lines */
  operation?: string;
}

// ============================================================================
// AbortError
// ============================================================================

/**
* Error thrown when an operation is aborted via AbortSignal
*/
export class AbortError extends Error {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryableErrors: [
    'ECONNREFUSED',
    'ETIMEDOUT',
    'ECONNRESET',
    'ENOTFOUND',
    'EAI_AGAIN',
    'timeout',
    'too many requests',
  ],
};

// ============================================================================
// Helper Functions
// ============================================================================

function isRetryableError(error: Error, options: RetryOptions): boolean {
  if (options.shouldRetry) {
    return options.shouldRetry(error);
  }

  const message = error.message.toLowerCase();
  return options.retryableErrors?.some(pattern =>
    message.includes(pattern.toLowerCase())
  ) ?? false;
}

/**
* Calculate delay with exponential backoff and jitter
* @param attempt - Retry attempt number, starting at 1
* @returns Delay in milliseconds, within ±25% of the capped exponential delay
*/
export function calculateDelay(
  attempt: number,
  options: Pick<RetryOptions, 'initialDelayMs' | 'backoffMultiplier' | 'maxDelayMs'>
): number {
  const exponentialDelay = options.initialDelayMs * Math.pow(options.backoffMultiplier, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, options.maxDelayMs);

  // ±25% jitter so concurrent modality runs do not retry in lockstep
  const jitter = cappedDelay * 0.25 * (Math.random() * 2 - 1);

  return Math.max(0, Math.floor(cappedDelay + jitter));
}

/**
* Sleep for specified milliseconds, abortable via signal
* @returns Promise that resolves after the delay or rejects with AbortError on abort
*/
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new AbortError());
  if (!signal) return new Promise(resolve => setTimeout(resolve, ms));

  return new Promise((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    function onAbort() {
      clearTimeout(timeoutId);
      reject(new AbortError());
    }

    signal.addEventListener('abort', onAbort, { once: true });
  });
}

// ============================================================================
// Retry Functions
// ============================================================================

/**
* Execute function with retry logic
* @param fn - Function to execute
* @param options - Partial retry options
* @returns Promise resolving to function result
* @throws The last error once retries are exhausted or the error is not retryable;
*   AbortError when the signal fires before an attempt or during a backoff sleep
*/
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_OPTIONS, ...options };
  const operation = opts.operation ?? (fn.name || 'anonymous');

  for (let attempt = 1; ; attempt++) {
    if (opts.signal?.aborted) {
      throw new AbortError('Retry aborted');
    }

    try {
      return await fn(attempt);
    } catch (error: unknown) {
      if (error instanceof AbortError) {
        throw error;
      }

      const err = error instanceof Error ? error : new Error(String(error));
      const isLastAttempt = attempt > opts.maxRetries;

      if (isLastAttempt || !isRetryableError(err, opts)) {
        if (isLastAttempt && opts.maxRetries > 0) {
          logger.warn(`Retries exhausted for ${operation}`, { attempts: attempt, error: err.message });
        }
        throw err;
      }

      const delay = calculateDelay(attempt, opts);

      logger.warn(`Retry attempt ${attempt}/${opts.maxRetries} for ${operation} after ${delay}ms: ${err.message}`, {
        error: err.message,
      });

      opts.onRetry?.(err, attempt, delay);

      await sleep(delay, opts.signal);
    }
  }
}

// ============================================================================
// HTTP Retry Utilities
// ============================================================================

/**
* Check if an HTTP status code is retryable
* @param retryableStatuses - List of retryable statuses
*/
export function isRetryableStatus(
  status: number,
  retryableStatuses: readonly number[] = [408, 429, 500, 502, 503, 504]
): boolean {
  return retryableStatuses.includes(status);
}
