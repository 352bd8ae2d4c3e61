import { getLogger } from '@kernel/logger';

import { IndexWriteFailureError, type IndexWriteItemFailure } from '../domain/errors';
import type { LicitacaoRepository, ReindexMode } from './ports/LicitacaoRepository';
import type { SearchIndex } from './ports/SearchIndex';

const logger = getLogger('licitacoes:reindex');

export interface ReindexResult {
  indexed: number;
  failed: number;
  /** First failures, capped */
  failures: IndexWriteItemFailure[];
}

export interface ReindexerOptions {
  batchSize: number;
  maxReportedFailures: number;
  now: () => Date;
}

const DEFAULT_OPTIONS: ReindexerOptions = {
  batchSize: 500,
  maxReportedFailures: 50,
  now: () => new Date(),
};

/**
* Resubmits stored records to the search index, either every record or only
* those whose latest upsert never reached it.
*/
export class Reindexer {
  private readonly options: ReindexerOptions;

  constructor(
    private readonly licitacoes: LicitacaoRepository,
    private readonly index: SearchIndex,
    options: Partial<ReindexerOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
  * Walk the store in internalId order; failed documents stay lagging
  * @param signal - Checked between batches
  */
  async reindex(mode: ReindexMode, signal?: AbortSignal): Promise<ReindexResult> {
    const result: ReindexResult = { indexed: 0, failed: 0, failures: [] };
    let afterId = 0;

    logger.info('Reindex started', { mode });

    while (!signal?.aborted) {
      const batch = await this.licitacoes.findForReindex(mode, this.options.batchSize, afterId);
      const last = batch[batch.length - 1];
      if (!last) break;
      afterId = last.internalId;

      let failedIds = new Set<number>();
      try {
        await this.index.indexBatch(batch);
      } catch (error) {
        if (!(error instanceof IndexWriteFailureError)) {
          throw error;
        }
        failedIds = new Set(error.failedIds);
        result.failed += error.failures.length;
        const room = this.options.maxReportedFailures - result.failures.length;
        result.failures.push(...error.failures.slice(0, Math.max(0, room)));
      }

      const succeeded = batch.map(l => l.internalId).filter(id => !failedIds.has(id));
      if (succeeded.length > 0) {
        await this.licitacoes.markIndexed(succeeded, this.options.now());
      }
      result.indexed += succeeded.length;

      logger.debug('Reindexed batch', { mode, afterId, indexed: succeeded.length, failed: failedIds.size });
    }

    logger.info('Reindex finished', { mode, indexed: result.indexed, failed: result.failed });
    return result;
  }
}
