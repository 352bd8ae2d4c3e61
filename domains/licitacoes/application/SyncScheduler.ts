import { getErrorMessage, toError } from '@errors';
import { getLogger } from '@kernel/logger';

import { addDays, todayYmd } from '../domain/dates';
import type { SyncOrchestrator } from './SyncOrchestrator';
import type { SyncRunOutcome } from './SyncRunOutcome';

const logger = getLogger('licitacoes:scheduler');

/** The part of the orchestrator the scheduler drives */
export type SyncRunner = Pick<SyncOrchestrator, 'isRunning' | 'runSync'>;

export interface SyncSchedulerOptions {
  modalidades: readonly number[];
  lookbackDays: number;
  pageSize?: number | undefined;
  now?: () => Date;
}

/**
* Periodic sync of every configured modality over a trailing window.
*
* The timer is re-armed after each tick finishes, so ticks never overlap.
* `stop()` cancels at the next page boundary and waits for the tick.
*/
export class SyncScheduler {
  private timer: NodeJS.Timeout | null = null;
  private controller: AbortController | null = null;
  private inFlight: Promise<void> | null = null;
  private readonly now: () => Date;

  constructor(
    private readonly orchestrator: SyncRunner,
    private readonly options: SyncSchedulerOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  get isStarted(): boolean {
    return this.controller !== null;
  }

  /**
  * Run one tick now, then every `intervalMs`; a second call is a no-op
  */
  start(intervalMs: number): void {
    if (this.controller) return;
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new Error('intervalMs must be a positive number');
    }

    const controller = new AbortController();
    this.controller = controller;
    logger.info('Scheduler started', { intervalMs, modalidades: this.options.modalidades });

    const run = (): void => {
      this.timer = null;
      this.inFlight = this.tick(controller.signal).then(() => {
        this.inFlight = null;
        if (!controller.signal.aborted) {
          this.timer = setTimeout(run, intervalMs);
        }
      });
    };
    run();
  }

  /**
  * Resolves once the in-flight page and tick have finished
  */
  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) return;

    controller.abort();
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.inFlight;
    this.controller = null;
    logger.info('Scheduler stopped');
  }

  /**
  * Sync every modality not already running; never rejects
  */
  async tick(signal?: AbortSignal): Promise<SyncRunOutcome[]> {
    const dataFinal = todayYmd(this.now());
    const dataInicial = addDays(dataFinal, -this.options.lookbackDays);

    const runs: Promise<SyncRunOutcome>[] = [];
    for (const codigoModalidade of this.options.modalidades) {
      if (this.orchestrator.isRunning(codigoModalidade)) {
        logger.info('Modality already syncing, skipping tick', { modalidade: codigoModalidade });
        continue;
      }
      runs.push(this.orchestrator.runSync({
        dataInicial,
        dataFinal,
        codigoModalidade,
        tamanhoPagina: this.options.pageSize,
        signal,
      }));
    }

    const settled = await Promise.allSettled(runs);
    const outcomes: SyncRunOutcome[] = [];
    for (const result of settled) {
      if (result.status === 'fulfilled') {
        outcomes.push(result.value);
      } else {
        logger.error('Scheduled sync run crashed', toError(result.reason), {
          error: getErrorMessage(result.reason),
        });
      }
    }
    return outcomes;
  }
}
