import { Pool } from 'pg';
import { z } from 'zod';

import { getLogger } from '@kernel/logger';
import { toError } from '@errors';

import { SyncWatermark, type SyncCursor } from '../../domain/entities/SyncWatermark';
import type { SyncWatermarkRepository } from '../../application/ports/SyncWatermarkRepository';
import { translatePgError } from './pgErrors';

const logger = getLogger('licitacoes:watermarks');

const ymd = z.string().regex(/^\d{8}$/);

const cursorSchema = z.object({
  dataInicial: ymd,
  dataFinal: ymd,
  pagina: z.number().int().positive(),
});

interface SyncWatermarkRow {
  modalidade: number;
  last_synced_date: string | null;
  cursor: unknown;
  updated_at: Date;
}

/**
* Repository implementation for SyncWatermark using PostgreSQL.
*
* One row per modality; the cursor is stored as jsonb. A cursor that no
* longer parses is dropped, which restarts its window from page 1.
*/
export class PostgresSyncWatermarkRepository implements SyncWatermarkRepository {
  constructor(private pool: Pool) {}

  async get(modalidade: number): Promise<SyncWatermark | null> {
    let row: SyncWatermarkRow | undefined;
    try {
      const { rows } = await this.pool.query<SyncWatermarkRow>(
        `SELECT modalidade, last_synced_date, cursor, updated_at
        FROM sync_watermarks
        WHERE modalidade = $1`,
        [modalidade]
      );
      row = rows[0];
    } catch (error) {
      logger.error('Failed to load sync watermark', toError(error), { modalidade });
      throw translatePgError(error);
    }
    if (!row) return null;

    let cursor: SyncCursor | null = null;
    if (row.cursor !== null) {
      const parsed = cursorSchema.safeParse(row.cursor);
      if (parsed.success) {
        cursor = parsed.data;
      } else {
        logger.warn('Discarding unreadable sync cursor', { modalidade });
      }
    }

    return SyncWatermark.reconstitute(row.modalidade, row.last_synced_date, cursor, row.updated_at);
  }

  async save(watermark: SyncWatermark): Promise<void> {
    try {
      await this.pool.query(
        `INSERT INTO sync_watermarks (modalidade, last_synced_date, cursor, updated_at)
        VALUES ($1, $2, $3::jsonb, $4)
        ON CONFLICT (modalidade) DO UPDATE SET
          last_synced_date = EXCLUDED.last_synced_date,
          cursor = EXCLUDED.cursor,
          updated_at = EXCLUDED.updated_at`,
        [
          watermark.modalidade,
          watermark.lastSyncedDate,
          watermark.cursor ? JSON.stringify(watermark.cursor) : null,
          watermark.updatedAt,
        ]
      );
    } catch (error) {
      logger.error('Failed to save sync watermark', toError(error), { modalidade: watermark.modalidade });
      throw translatePgError(error);
    }
  }
}
