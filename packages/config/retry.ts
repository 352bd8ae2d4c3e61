/**
 * Retry Configuration
 *
 * Backoff settings shared by source fetches, index writes and store upserts.
 */

import { parseIntEnv, parseFloatEnv } from './env';

export const retryConfig = {
  /** Base delay in milliseconds */
  baseDelayMs: parseIntEnv('RETRY_BASE_DELAY_MS', 2000),

  /** Maximum delay in milliseconds */
  maxDelayMs: parseIntEnv('RETRY_MAX_DELAY_MS', 30000),

  // parseFloatEnv: a multiplier of 1.5 must not be truncated to 1 (linear backoff)
  /** Backoff multiplier (must be > 1 for exponential growth) */
  backoffMultiplier: parseFloatEnv('RETRY_BACKOFF_MULTIPLIER', 2),

  /** HTTP status codes that trigger retry */
  retryableStatuses: [408, 429, 500, 502, 503, 504] as readonly number[],
} as const;

(function validateRetryConfig() {
  if (retryConfig.baseDelayMs <= 0) {
    throw new Error('RETRY_BASE_DELAY_MS must be > 0');
  }
  if (retryConfig.baseDelayMs > retryConfig.maxDelayMs) {
    throw new Error('RETRY_BASE_DELAY_MS must be <= RETRY_MAX_DELAY_MS');
  }
  if (retryConfig.backoffMultiplier <= 1) {
    throw new Error('RETRY_BACKOFF_MULTIPLIER must be > 1 for exponential backoff');
  }
})();
