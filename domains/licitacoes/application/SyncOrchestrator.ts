import { Mutex } from 'async-mutex';

import { pncpConfig, retryConfig, syncConfig, PNCP_MAX_WINDOW_DAYS } from '@config';
import { AppError, ErrorCodes, ValidationError, getErrorMessage, toError } from '@errors';
import { getLogger } from '@kernel/logger';
import { AbortError, withRetry } from '@kernel/retry';

import { maxYmd, parseYmd, splitIntoWindows, type DateWindow } from '../domain/dates';
import type { Licitacao, LicitacaoInput } from '../domain/entities/Licitacao';
import { SyncWatermark } from '../domain/entities/SyncWatermark';
import {
  IndexWriteFailureError,
  SourceSchemaError,
  SourceUnavailableError,
  StoreConflictError,
} from '../domain/errors';
import { normalize } from '../domain/normalizer';
import type { LicitacaoRepository } from './ports/LicitacaoRepository';
import type { ProcurementSource, SourcePage } from './ports/ProcurementSource';
import type { SearchIndex } from './ports/SearchIndex';
import type { SyncRunRepository } from './ports/SyncRunRepository';
import type { SyncWatermarkRepository } from './ports/SyncWatermarkRepository';
import type {
  PageError,
  SkippedRecord,
  SyncFailure,
  SyncFailureStage,
  SyncRunOutcome,
  SyncRunStatus,
} from './SyncRunOutcome';

const logger = getLogger('licitacoes:sync');

/**
* Sync Orchestrator
*
* Pulls PNCP pages for one modality and date range, upserts them into the
* system of record and indexes them. Owns the per-modality watermark and the
* retry policy for each stage.
*/

// ============================================================================
// Type Definitions
// ============================================================================

export interface SyncRunParams {
  /** YYYYMMDD */
  dataInicial: string;
  /** YYYYMMDD */
  dataFinal: string;
  codigoModalidade: number;
  tamanhoPagina?: number | undefined;
  /** Checked at page boundaries and during fetch backoff */
  signal?: AbortSignal | undefined;
}

export interface SyncOrchestratorDeps {
  source: ProcurementSource;
  licitacoes: LicitacaoRepository;
  watermarks: SyncWatermarkRepository;
  runs: SyncRunRepository;
  index: SearchIndex;
}

export interface SyncOrchestratorOptions {
  pageSize: number;
  fetchMaxRetries: number;
  indexMaxRetries: number;
  storeMaxRetries: number;
  maxReportedSkips: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  now: () => Date;
}

const DEFAULT_OPTIONS: SyncOrchestratorOptions = {
  pageSize: pncpConfig.pageSize,
  fetchMaxRetries: syncConfig.fetchMaxRetries,
  indexMaxRetries: syncConfig.indexMaxRetries,
  storeMaxRetries: syncConfig.storeMaxRetries,
  maxReportedSkips: syncConfig.maxReportedSkips,
  initialDelayMs: retryConfig.baseDelayMs,
  maxDelayMs: retryConfig.maxDelayMs,
  backoffMultiplier: retryConfig.backoffMultiplier,
  now: () => new Date(),
};

/**
* A stage failure that ends the run
*/
class StageFailure extends Error {
  constructor(
    readonly stage: SyncFailureStage,
    readonly pagina: number,
    readonly error: Error
  ) {
    super(error.message);
    this.name = 'StageFailure';
  }
}

/**
* Mutable tallies of one run
*/
interface RunState {
  watermark: SyncWatermark;
  quantidade: number;
  skipped: number;
  skippedRecords: SkippedRecord[];
  pageErrors: PageError[];
  pagesProcessed: number;
  duplicatesInRun: number;
  /** Page the run last worked on */
  lastPage: number;
}

type WindowResult = 'completed' | 'partial' | 'cancelled';

function validateParams(params: SyncRunParams): void {
  parseYmd(params.dataInicial, 'dataInicial');
  parseYmd(params.dataFinal, 'dataFinal');
  if (params.dataInicial > params.dataFinal) {
    throw new ValidationError('dataInicial must not be after dataFinal', {
      dataInicial: params.dataInicial,
      dataFinal: params.dataFinal,
    });
  }
  if (!Number.isInteger(params.codigoModalidade) || params.codigoModalidade < 1) {
    throw new ValidationError('codigoModalidade must be a positive integer', {
      codigoModalidade: params.codigoModalidade,
    });
  }
  if (params.tamanhoPagina !== undefined && (!Number.isInteger(params.tamanhoPagina) || params.tamanhoPagina < 1)) {
    throw new ValidationError('tamanhoPagina must be a positive integer', { tamanhoPagina: params.tamanhoPagina });
  }
}

// ============================================================================
// Orchestrator
// ============================================================================

export class SyncOrchestrator {
  private readonly options: SyncOrchestratorOptions;
  private readonly locks = new Map<number, Mutex>();

  constructor(
    private readonly deps: SyncOrchestratorDeps,
    options: Partial<SyncOrchestratorOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
  * True while a run for the modality holds its lock
  */
  isRunning(codigoModalidade: number): boolean {
    return this.locks.get(codigoModalidade)?.isLocked() ?? false;
  }

  /**
  * Synchronize one modality over a date range.
  *
  * Runs for the same modality queue behind each other; different modalities
  * run concurrently. Stage failures are reported in the outcome, not thrown.
  *
  * @throws ValidationError for malformed parameters
  */
  async runSync(params: SyncRunParams): Promise<SyncRunOutcome> {
    validateParams(params);
    return this.lockFor(params.codigoModalidade).runExclusive(() => this.execute(params));
  }

  private lockFor(codigoModalidade: number): Mutex {
    let lock = this.locks.get(codigoModalidade);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(codigoModalidade, lock);
    }
    return lock;
  }

  private async execute(params: SyncRunParams): Promise<SyncRunOutcome> {
    const { codigoModalidade, dataFinal } = params;
    const startedAt = this.options.now();
    const log = logger.child({ modalidade: codigoModalidade });

    const stored = await this.deps.watermarks.get(codigoModalidade);
    const state: RunState = {
      watermark: stored ?? SyncWatermark.initial(codigoModalidade, startedAt),
      quantidade: 0,
      skipped: 0,
      skippedRecords: [],
      pageErrors: [],
      pagesProcessed: 0,
      duplicatesInRun: 0,
      lastPage: 0,
    };

    // The last synced day is fetched again; the overlap is absorbed by the upsert
    const lastSynced = state.watermark.lastSyncedDate;
    const dataInicial = lastSynced ? maxYmd(lastSynced, params.dataInicial) : params.dataInicial;

    if (dataInicial > dataFinal) {
      log.info('Already up to date', { lastSyncedDate: lastSynced, dataFinal });
      return this.finish(params, dataInicial, 'up_to_date', state, null, startedAt);
    }

    log.info('Sync run started', { dataInicial, dataFinal, resumeCursor: state.watermark.cursor });

    let status: SyncRunStatus = 'completed';
    let failure: SyncFailure | null = null;
    let holdDate = false;

    try {
      for (const window of splitIntoWindows(dataInicial, dataFinal, PNCP_MAX_WINDOW_DAYS)) {
        const result = await this.syncWindow(params, window, state);
        if (result === 'cancelled') {
          status = 'cancelled';
          break;
        }

        const now = this.options.now();
        // A window with a skipped page is fetched again next run, and so is everything after it
        if (result === 'partial' || holdDate) {
          holdDate = true;
          await this.saveWatermark(state, state.watermark.withCursorCleared(now));
        } else {
          await this.saveWatermark(state, state.watermark.withWindowCompleted(window, now));
        }
      }
    } catch (error) {
      if (!(error instanceof StageFailure)) {
        throw error;
      }
      status = 'failed';
      failure = {
        stage: error.stage,
        page: error.pagina,
        modalidade: codigoModalidade,
        code: error.error instanceof AppError ? error.error.code : ErrorCodes.INTERNAL_ERROR,
        message: error.error.message,
      };
      log.error(`Sync run failed at ${error.stage} stage`, error.error, { page: error.pagina });
    }

    if (status === 'completed' && state.pageErrors.length > 0) {
      status = 'partial';
    }
    return this.finish(params, dataInicial, status, state, failure, startedAt);
  }

  /**
  * Page loop over one window
  */
  private async syncWindow(params: SyncRunParams, window: DateWindow, state: RunState): Promise<WindowResult> {
    const pageSize = params.tamanhoPagina ?? this.options.pageSize;
    let pagina = state.watermark.resumePageFor(window);
    let knownTotalPages: number | null = null;
    let hadPageErrors = false;

    for (;;) {
      if (params.signal?.aborted) {
        return 'cancelled';
      }
      state.lastPage = pagina;

      let page: SourcePage;
      try {
        page = await this.fetchWithRetry(params, window, pagina, pageSize);
      } catch (error) {
        if (error instanceof AbortError) {
          return 'cancelled';
        }
        if (error instanceof SourceSchemaError) {
          hadPageErrors = true;
          state.pageErrors.push({ ...window, page: pagina, reason: error.message });
          logger.warn('Skipping unreadable page', { ...window, page: pagina, error: error.message });
          // Without a known page count there is no telling where the window ends
          if (knownTotalPages !== null && pagina < knownTotalPages) {
            pagina++;
            continue;
          }
          return 'partial';
        }
        throw new StageFailure('fetch', pagina, toError(error));
      }

      knownTotalPages = page.totalPages;
      await this.processPage(page, pagina, state);

      state.pagesProcessed++;
      // Past a skipped page the cursor stays put, so a resumed run fetches that page again
      if (!hadPageErrors) {
        await this.saveWatermark(state, state.watermark.withPageCompleted(window, pagina, this.options.now()));
      }

      logger.debug('Page synced', {
        modalidade: params.codigoModalidade,
        ...window,
        page: pagina,
        totalPages: page.totalPages,
        records: page.records.length,
      });

      if (!page.hasNextPage || page.records.length === 0) {
        return hadPageErrors ? 'partial' : 'completed';
      }
      pagina++;
    }
  }

  /**
  * Persist the watermark, then adopt it as the run's progress
  */
  private async saveWatermark(state: RunState, next: SyncWatermark): Promise<void> {
    try {
      await this.deps.watermarks.save(next);
    } catch (error) {
      throw new StageFailure('store', state.lastPage, toError(error));
    }
    state.watermark = next;
  }

  private async fetchWithRetry(
    params: SyncRunParams,
    window: DateWindow,
    pagina: number,
    tamanhoPagina: number
  ): Promise<SourcePage> {
    let attempts = 0;
    try {
      return await withRetry(
        attempt => {
          attempts = attempt;
          return this.deps.source.fetchPage({
            ...window,
            codigoModalidade: params.codigoModalidade,
            pagina,
            tamanhoPagina,
          }, params.signal);
        },
        {
          maxRetries: this.options.fetchMaxRetries,
          initialDelayMs: this.options.initialDelayMs,
          maxDelayMs: this.options.maxDelayMs,
          backoffMultiplier: this.options.backoffMultiplier,
          shouldRetry: error => error instanceof SourceUnavailableError && error.retryable,
          signal: params.signal,
          operation: `pncp.fetchPage(${params.codigoModalidade}, page ${pagina})`,
        }
      );
    } catch (error) {
      if (error instanceof SourceUnavailableError) {
        throw error.withAttempts(attempts);
      }
      throw error;
    }
  }

  /**
  * Normalize, dedupe, store and index one page
  */
  private async processPage(page: SourcePage, pagina: number, state: RunState): Promise<void> {
    const byExternalId = new Map<string, LicitacaoInput>();

    for (const raw of page.records) {
      const result = normalize(raw);
      if (!result.ok) {
        state.skipped++;
        const { error } = result;
        if (state.skippedRecords.length < this.options.maxReportedSkips) {
          state.skippedRecords.push({
            externalId: error.externalId,
            field: error.field,
            value: error.rawValue,
            reason: error.reason,
          });
        }
        logger.warn('Skipping invalid record', {
          page: pagina,
          externalId: error.externalId,
          field: error.field,
          reason: error.reason,
        });
        continue;
      }

      // Last occurrence wins
      if (byExternalId.delete(result.value.externalId)) {
        state.duplicatesInRun++;
      }
      byExternalId.set(result.value.externalId, result.value);
    }

    const valid = [...byExternalId.values()];
    if (valid.length === 0) return;

    const stored = await this.upsertWithRetry(valid, pagina);
    await this.indexWithRetry(stored, pagina);
    try {
      await this.deps.licitacoes.markIndexed(stored.map(l => l.internalId), this.options.now());
    } catch (error) {
      throw new StageFailure('store', pagina, toError(error));
    }
    state.quantidade += stored.length;
  }

  private async upsertWithRetry(inputs: LicitacaoInput[], pagina: number): Promise<Licitacao[]> {
    try {
      return await withRetry(
        () => this.deps.licitacoes.upsertBatch(inputs),
        {
          maxRetries: this.options.storeMaxRetries,
          initialDelayMs: this.options.initialDelayMs,
          maxDelayMs: this.options.maxDelayMs,
          backoffMultiplier: this.options.backoffMultiplier,
          shouldRetry: error => error instanceof StoreConflictError,
          operation: 'licitacoes.upsertBatch',
        }
      );
    } catch (error) {
      throw new StageFailure('store', pagina, toError(error));
    }
  }

  /**
  * Index a batch, resubmitting only the documents that failed
  */
  private async indexWithRetry(docs: Licitacao[], pagina: number): Promise<void> {
    let pending = docs;
    try {
      await withRetry(
        async () => {
          try {
            await this.deps.index.indexBatch(pending);
          } catch (error) {
            if (error instanceof IndexWriteFailureError) {
              const failed = new Set(error.failedIds);
              pending = pending.filter(doc => failed.has(doc.internalId));
            }
            throw error;
          }
        },
        {
          maxRetries: this.options.indexMaxRetries,
          initialDelayMs: this.options.initialDelayMs,
          maxDelayMs: this.options.maxDelayMs,
          backoffMultiplier: this.options.backoffMultiplier,
          shouldRetry: error => error instanceof IndexWriteFailureError,
          operation: 'index.indexBatch',
        }
      );
    } catch (error) {
      throw new StageFailure('index', pagina, toError(error));
    }
  }

  private async finish(
    params: SyncRunParams,
    dataInicial: string,
    status: SyncRunStatus,
    state: RunState,
    failure: SyncFailure | null,
    startedAt: Date
  ): Promise<SyncRunOutcome> {
    const outcome: SyncRunOutcome = {
      modalidade: params.codigoModalidade,
      dataInicial,
      dataFinal: params.dataFinal,
      status,
      quantidade: state.quantidade,
      skipped: state.skipped,
      skippedRecords: state.skippedRecords,
      pageErrors: state.pageErrors,
      pagesProcessed: state.pagesProcessed,
      duplicatesInRun: state.duplicatesInRun,
      watermark: state.watermark.toJSON(),
      failure,
      startedAt: startedAt.toISOString(),
      durationMs: this.options.now().getTime() - startedAt.getTime(),
    };

    if (status !== 'failed') {
      logger.info('Sync run finished', {
        modalidade: outcome.modalidade,
        status,
        quantidade: outcome.quantidade,
        skipped: outcome.skipped,
        pagesProcessed: outcome.pagesProcessed,
        durationMs: outcome.durationMs,
      });
    }

    try {
      await this.deps.runs.record(outcome);
    } catch (error) {
      // The outcome is still returned to the caller
      logger.error('Failed to record sync run', toError(error), {
        modalidade: outcome.modalidade,
        status,
        error: getErrorMessage(error),
      });
    }
    return outcome;
  }
}
