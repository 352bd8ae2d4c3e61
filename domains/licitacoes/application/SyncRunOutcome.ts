import type { SyncWatermark } from '../domain/entities/SyncWatermark';

export type SyncRunStatus = 'completed' | 'partial' | 'failed' | 'cancelled' | 'up_to_date';

export type SyncFailureStage = 'fetch' | 'store' | 'index';

export interface SkippedRecord {
  externalId: string | null;
  field: string;
  value: unknown;
  reason: string;
}

export interface PageError {
  dataInicial: string;
  dataFinal: string;
  page: number;
  reason: string;
}

export interface SyncFailure {
  stage: SyncFailureStage;
  page: number;
  modalidade: number;
  code: string;
  message: string;
}

/**
* Result of one sync run, returned to the caller and appended to the run log
*/
export interface SyncRunOutcome {
  modalidade: number;
  dataInicial: string;
  dataFinal: string;
  status: SyncRunStatus;
  /** Records stored and indexed */
  quantidade: number;
  /** Records rejected by the normalizer (exact count) */
  skipped: number;
  /** First skipped records, capped by SYNC_MAX_REPORTED_SKIPS */
  skippedRecords: SkippedRecord[];
  pageErrors: PageError[];
  pagesProcessed: number;
  /** Records dropped because a later occurrence in the same page won */
  duplicatesInRun: number;
  watermark: ReturnType<SyncWatermark['toJSON']>;
  failure: SyncFailure | null;
  startedAt: string;
  durationMs: number;
}
