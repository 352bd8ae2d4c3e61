import { Pool } from 'pg';
import { z } from 'zod';

import { getLogger } from '@kernel/logger';
import { toError } from '@errors';

import type { SyncRunOutcome } from '../../application/SyncRunOutcome';
import type { SyncRunRepository } from '../../application/ports/SyncRunRepository';
import { translatePgError } from './pgErrors';

const logger = getLogger('licitacoes:sync-runs');

const MAX_LIST_LIMIT = 200;

const outcomeSchema = z.object({
  modalidade: z.number(),
  dataInicial: z.string(),
  dataFinal: z.string(),
  status: z.enum(['completed', 'partial', 'failed', 'cancelled', 'up_to_date']),
  quantidade: z.number(),
  skipped: z.number(),
  skippedRecords: z.array(z.object({
    externalId: z.string().nullable(),
    field: z.string(),
    value: z.unknown(),
    reason: z.string(),
  }).transform(r => ({ externalId: r.externalId, field: r.field, value: r.value, reason: r.reason }))),
  pageErrors: z.array(z.object({
    dataInicial: z.string(),
    dataFinal: z.string(),
    page: z.number(),
    reason: z.string(),
  })),
  pagesProcessed: z.number(),
  duplicatesInRun: z.number(),
  watermark: z.object({
    modalidade: z.number(),
    lastSyncedDate: z.string().nullable(),
    cursor: z.object({ dataInicial: z.string(), dataFinal: z.string(), pagina: z.number() }).nullable(),
    updatedAt: z.string(),
  }),
  failure: z.object({
    stage: z.enum(['fetch', 'store', 'index']),
    page: z.number(),
    modalidade: z.number(),
    code: z.string(),
    message: z.string(),
  }).nullable(),
  startedAt: z.string(),
  durationMs: z.number(),
});

/**
* Append-only run log. The full outcome is kept as jsonb next to a few
* columns for querying by modality and status.
*/
export class PostgresSyncRunRepository implements SyncRunRepository {
  constructor(private pool: Pool) {}

  async record(outcome: SyncRunOutcome): Promise<void> {
    try {
      await this.pool.query(
        `INSERT INTO sync_runs (modalidade, status, data_inicial, data_final, started_at, duration_ms, outcome)
        VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb)`,
        [
          outcome.modalidade,
          outcome.status,
          outcome.dataInicial,
          outcome.dataFinal,
          outcome.startedAt,
          outcome.durationMs,
          JSON.stringify(outcome),
        ]
      );
    } catch (error) {
      logger.error('Failed to record sync run', toError(error), { modalidade: outcome.modalidade });
      throw translatePgError(error);
    }
  }

  async listRecent(limit: number): Promise<SyncRunOutcome[]> {
    const safeLimit = Math.min(Math.max(1, limit), MAX_LIST_LIMIT);
    try {
      const { rows } = await this.pool.query<{ id: string; outcome: unknown }>(
        'SELECT id, outcome FROM sync_runs ORDER BY id DESC LIMIT $1',
        [safeLimit]
      );

      const outcomes: SyncRunOutcome[] = [];
      for (const row of rows) {
        const parsed = outcomeSchema.safeParse(row.outcome);
        if (parsed.success) {
          outcomes.push(parsed.data);
        } else {
          logger.warn('Skipping unreadable sync run', { id: row.id });
        }
      }
      return outcomes;
    } catch (error) {
      logger.error('Failed to list sync runs', toError(error));
      throw translatePgError(error);
    }
  }
}
