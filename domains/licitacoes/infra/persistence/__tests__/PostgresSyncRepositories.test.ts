import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Pool } from 'pg';

import { PostgresSyncWatermarkRepository } from '../PostgresSyncWatermarkRepository';
import { PostgresSyncRunRepository } from '../PostgresSyncRunRepository';
import { SyncWatermark } from '../../../domain/entities/SyncWatermark';
import type { SyncRunOutcome } from '../../../application/SyncRunOutcome';
import { StoreConflictError } from '../../../domain/errors';

vi.mock('@kernel/logger', () => ({
  getLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

const UPDATED_AT = new Date('2025-06-01T12:00:00.000Z');

function outcome(overrides: Partial<SyncRunOutcome> = {}): SyncRunOutcome {
  return {
    modalidade: 6,
    dataInicial: '20250501',
    dataFinal: '20250531',
    status: 'partial',
    quantidade: 40,
    skipped: 1,
    skippedRecords: [{ externalId: 'X-1', field: 'valorTotalEstimado', value: 'abc', reason: 'not a number' }],
    pageErrors: [{ dataInicial: '20250501', dataFinal: '20250531', page: 2, reason: 'no data array' }],
    pagesProcessed: 3,
    duplicatesInRun: 0,
    watermark: { modalidade: 6, lastSyncedDate: null, cursor: null, updatedAt: '2025-06-01T12:00:00.000Z' },
    failure: null,
    startedAt: '2025-06-01T11:59:00.000Z',
    durationMs: 60000,
    ...overrides,
  };
}

describe('PostgresSyncWatermarkRepository', () => {
  let pool: { query: ReturnType<typeof vi.fn> };
  let repo: PostgresSyncWatermarkRepository;

  beforeEach(() => {
    pool = { query: vi.fn().mockResolvedValue({ rows: [] }) };
    repo = new PostgresSyncWatermarkRepository(pool as unknown as Pool);
  });

  it('returns null for a modality never synchronized', async () => {
    expect(await repo.get(6)).toBeNull();
  });

  it('reads the date and cursor', async () => {
    pool.query.mockResolvedValue({
      rows: [{
        modalidade: 6,
        last_synced_date: '20250430',
        cursor: { dataInicial: '20250430', dataFinal: '20250531', pagina: 4 },
        updated_at: UPDATED_AT,
      }],
    });

    const watermark = await repo.get(6);

    expect(watermark?.lastSyncedDate).toBe('20250430');
    expect(watermark?.resumePageFor({ dataInicial: '20250430', dataFinal: '20250531' })).toBe(5);
  });

  it('drops a cursor that does not parse', async () => {
    pool.query.mockResolvedValue({
      rows: [{ modalidade: 6, last_synced_date: '20250430', cursor: { pagina: 'x' }, updated_at: UPDATED_AT }],
    });

    const watermark = await repo.get(6);

    expect(watermark?.cursor).toBeNull();
    expect(watermark?.lastSyncedDate).toBe('20250430');
  });

  it('upserts by modality with the cursor as json', async () => {
    const watermark = SyncWatermark.initial(8, UPDATED_AT)
      .withPageCompleted({ dataInicial: '20250501', dataFinal: '20250531' }, 2, UPDATED_AT);

    await repo.save(watermark);

    expect(pool.query).toHaveBeenCalledWith(
      expect.stringContaining('ON CONFLICT (modalidade) DO UPDATE'),
      [8, null, '{"dataInicial":"20250501","dataFinal":"20250531","pagina":2}', UPDATED_AT]
    );
  });

  it('surfaces a write conflict as StoreConflictError', async () => {
    pool.query.mockRejectedValue(Object.assign(new Error('deadlock detected'), { code: '40P01' }));

    await expect(repo.save(SyncWatermark.initial(6, UPDATED_AT))).rejects.toBeInstanceOf(StoreConflictError);
  });
});

describe('PostgresSyncRunRepository', () => {
  let pool: { query: ReturnType<typeof vi.fn> };
  let repo: PostgresSyncRunRepository;

  beforeEach(() => {
    pool = { query: vi.fn().mockResolvedValue({ rows: [] }) };
    repo = new PostgresSyncRunRepository(pool as unknown as Pool);
  });

  it('appends the outcome with its query columns', async () => {
    const run = outcome();

    await repo.record(run);

    expect(pool.query).toHaveBeenCalledWith(
      expect.stringContaining('INSERT INTO sync_runs'),
      [6, 'partial', '20250501', '20250531', '2025-06-01T11:59:00.000Z', 60000, JSON.stringify(run)]
    );
  });

  it('lists recent runs and skips rows that do not parse', async () => {
    const run = outcome({ status: 'completed', pageErrors: [] });
    pool.query.mockResolvedValue({ rows: [{ id: '2', outcome: run }, { id: '1', outcome: { status: 'weird' } }] });

    expect(await repo.listRecent(10)).toEqual([run]);
    expect(pool.query).toHaveBeenCalledWith(expect.stringContaining('ORDER BY id DESC'), [10]);
  });

  it('caps the listing size', async () => {
    await repo.listRecent(10000);

    expect(pool.query).toHaveBeenCalledWith(expect.any(String), [200]);
  });
});
