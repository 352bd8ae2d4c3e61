/**
 * Sync Configuration
 *
 * Scheduling and failure budgets for the PNCP synchronization pipeline.
 */

import { parseIntEnv, parseIntArrayEnv } from './env';

export const syncConfig = {
  /** Scheduler period in minutes; 0 disables the background scheduler */
  intervalMinutes: parseIntEnv('SYNC_INTERVAL_MINUTES', 30),

  /** Scheduled runs fetch [today - lookbackDays, today] */
  lookbackDays: parseIntEnv('SYNC_LOOKBACK_DAYS', 30),

  /** Modality codes synchronized by the scheduler (6 = pregão eletrônico, 8 = dispensa) */
  modalidades: parseIntArrayEnv('SYNC_MODALIDADES', [6, 8]),

  /** Retries for a page fetch failing with a retryable SourceUnavailable */
  fetchMaxRetries: parseIntEnv('SYNC_FETCH_MAX_RETRIES', 3),

  /** Resubmissions of the failed subset of an index batch */
  indexMaxRetries: parseIntEnv('SYNC_INDEX_MAX_RETRIES', 3),

  /** Retries for an upsert hitting a serialization conflict */
  storeMaxRetries: parseIntEnv('SYNC_STORE_MAX_RETRIES', 5),

  /** Skipped records listed in a run outcome (the count is always exact) */
  maxReportedSkips: parseIntEnv('SYNC_MAX_REPORTED_SKIPS', 50),
} as const;

(function validateSyncConfig() {
  if (syncConfig.intervalMinutes < 0) {
    throw new Error('SYNC_INTERVAL_MINUTES must be >= 0');
  }
  if (syncConfig.lookbackDays < 1) {
    throw new Error('SYNC_LOOKBACK_DAYS must be >= 1');
  }
  if (syncConfig.fetchMaxRetries < 0 || syncConfig.indexMaxRetries < 0 || syncConfig.storeMaxRetries < 0) {
    throw new Error('SYNC_*_MAX_RETRIES must be >= 0');
  }
})();
