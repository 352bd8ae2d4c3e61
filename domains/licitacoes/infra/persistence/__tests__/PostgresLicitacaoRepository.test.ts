import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Pool, PoolClient } from 'pg';

import { PostgresLicitacaoRepository, type LicitacaoRow } from '../PostgresLicitacaoRepository';
import type { LicitacaoInput } from '../../../domain/entities/Licitacao';
import { StoreConflictError } from '../../../domain/errors';
import { DatabaseError } from '@errors';

vi.mock('@kernel/logger', () => ({
  getLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

const SYNCED_AT = new Date('2025-06-01T12:00:00.000Z');

function input(externalId: string, overrides: Partial<LicitacaoInput> = {}): LicitacaoInput {
  return {
    externalId,
    objetoCompra: `Contratação ${externalId}`,
    informacaoComplementar: null,
    orgao: 'Prefeitura Municipal de Teste',
    orgaoCnpj: '12345678000190',
    modalidade: 'Pregão - Eletrônico',
    codigoModalidade: 6,
    uf: 'SP',
    municipio: 'Campinas',
    valorEstimado: 2500.75,
    dataAberturaProposta: new Date('2025-05-10T13:00:00.000Z'),
    dataEncerramentoProposta: null,
    dataPublicacao: null,
    situacao: 'Divulgada no PNCP',
    linkSistemaOrigem: null,
    rawPayload: { numeroControlePNCP: externalId },
    ...overrides,
  };
}

function row(internalId: number, externalId: string, overrides: Partial<LicitacaoRow> = {}): LicitacaoRow {
  return {
    internal_id: String(internalId),
    external_id: externalId,
    objeto_compra: `Contratação ${externalId}`,
    informacao_complementar: null,
    orgao: 'Prefeitura Municipal de Teste',
    orgao_cnpj: '12345678000190',
    modalidade: 'Pregão - Eletrônico',
    codigo_modalidade: 6,
    uf: 'SP',
    municipio: 'Campinas',
    valor_estimado: '2500.75',
    data_abertura_proposta: new Date('2025-05-10T13:00:00.000Z'),
    data_encerramento_proposta: null,
    data_publicacao: null,
    situacao: 'Divulgada no PNCP',
    link_sistema_origem: null,
    raw_payload: { numeroControlePNCP: externalId },
    synced_at: SYNCED_AT,
    indexed_at: null,
    ...overrides,
  };
}

function pgError(code: string): Error {
  return Object.assign(new Error('could not serialize access'), { code });
}

describe('PostgresLicitacaoRepository', () => {
  let client: { query: ReturnType<typeof vi.fn>; release: ReturnType<typeof vi.fn> };
  let pool: { query: ReturnType<typeof vi.fn>; connect: ReturnType<typeof vi.fn> };
  let repo: PostgresLicitacaoRepository;

  beforeEach(() => {
    client = { query: vi.fn().mockResolvedValue({ rows: [] }), release: vi.fn() };
    pool = { query: vi.fn().mockResolvedValue({ rows: [] }), connect: vi.fn().mockResolvedValue(client) };
    repo = new PostgresLicitacaoRepository(pool as unknown as Pool);
  });

  describe('upsertBatch', () => {
    it('upserts in one statement inside its own transaction', async () => {
      client.query.mockImplementation(async (sql: string) =>
        sql.startsWith('INSERT') ? { rows: [row(7, 'B'), row(3, 'A')] } : { rows: [] }
      );

      const stored = await repo.upsertBatch([input('A'), input('B')]);

      const statements = client.query.mock.calls.map(call => String(call[0]).trim().split(/\s+/)[0]);
      expect(statements).toEqual(['BEGIN', 'INSERT', 'COMMIT']);
      expect(client.release).toHaveBeenCalledTimes(1);
      // input order, not RETURNING order
      expect(stored.map(l => [l.internalId, l.externalId])).toEqual([[3, 'A'], [7, 'B']]);
      expect(stored[0]?.valorEstimado).toBe(2500.75);
    });

    it('binds one array per column', async () => {
      client.query.mockImplementation(async (sql: string) =>
        sql.startsWith('INSERT') ? { rows: [row(1, 'A')] } : { rows: [] }
      );

      await repo.upsertBatch([input('A')]);

      const insert = client.query.mock.calls.find(call => String(call[0]).startsWith('INSERT'));
      const params: unknown[] = insert?.[1] ?? [];
      expect(params).toHaveLength(16);
      expect(params[0]).toEqual(['A']);
      expect(params[9]).toEqual([2500.75]);
      expect(params[10]).toEqual(['2025-05-10T13:00:00.000Z']);
      expect(params[11]).toEqual([null]);
      expect(params[15]).toEqual(['{"numeroControlePNCP":"A"}']);
      expect(String(insert?.[0])).toContain('ON CONFLICT (external_id) DO UPDATE');
    });

    it('joins a caller transaction without managing it', async () => {
      const callerClient = { query: vi.fn().mockResolvedValue({ rows: [row(1, 'A')] }), release: vi.fn() };

      await repo.upsertBatch([input('A')], callerClient as unknown as PoolClient);

      expect(callerClient.query).toHaveBeenCalledTimes(1);
      expect(callerClient.release).not.toHaveBeenCalled();
      expect(pool.connect).not.toHaveBeenCalled();
    });

    it('maps a serialization failure to StoreConflictError and rolls back', async () => {
      client.query.mockImplementation(async (sql: string) => {
        if (sql.startsWith('INSERT')) throw pgError('40001');
        return { rows: [] };
      });

      await expect(repo.upsertBatch([input('A')])).rejects.toBeInstanceOf(StoreConflictError);
      expect(client.query).toHaveBeenCalledWith('ROLLBACK');
      expect(client.release).toHaveBeenCalledTimes(1);
    });

    it('maps a deadlock to StoreConflictError', async () => {
      client.query.mockImplementation(async (sql: string) => {
        if (sql.startsWith('INSERT')) throw pgError('40P01');
        return { rows: [] };
      });

      await expect(repo.upsertBatch([input('A')])).rejects.toBeInstanceOf(StoreConflictError);
    });

    it('wraps other driver errors in DatabaseError', async () => {
      client.query.mockImplementation(async (sql: string) => {
        if (sql.startsWith('INSERT')) throw pgError('23502');
        return { rows: [] };
      });

      await expect(repo.upsertBatch([input('A')])).rejects.toBeInstanceOf(DatabaseError);
    });

    it('does nothing for an empty batch', async () => {
      expect(await repo.upsertBatch([])).toEqual([]);
      expect(pool.connect).not.toHaveBeenCalled();
    });
  });

  describe('reads', () => {
    it('maps a row back to the entity', async () => {
      pool.query.mockResolvedValue({ rows: [row(5, 'A', { valor_estimado: null, raw_payload: null })] });

      const found = await repo.findById(5);

      expect(found?.internalId).toBe(5);
      expect(found?.valorEstimado).toBeNull();
      expect(found?.rawPayload).toEqual({});
      expect(found?.isIndexLagging()).toBe(true);
    });

    it('returns null for an unknown id', async () => {
      expect(await repo.findById(99)).toBeNull();
    });

    it('scans lagging rows by keyset', async () => {
      await repo.findForReindex('lagging', 500, 42);

      const [sql, params] = pool.query.mock.calls[0] ?? [];
      expect(String(sql)).toContain('indexed_at IS NULL OR indexed_at < synced_at');
      expect(params).toEqual([42, 500]);
    });

    it('scans every row in all mode', async () => {
      await repo.findForReindex('all', 100000, 0);

      const [sql, params] = pool.query.mock.calls[0] ?? [];
      expect(String(sql)).not.toContain('indexed_at IS NULL');
      expect(params).toEqual([0, 5000]);
    });

    it('counts index lag', async () => {
      pool.query.mockResolvedValue({ rows: [{ count: '12' }] });

      expect(await repo.countIndexLag()).toBe(12);
    });
  });

  describe('markIndexed', () => {
    it('updates indexed_at for the given ids, never before synced_at', async () => {
      const at = new Date('2025-06-01T12:00:05.000Z');

      await repo.markIndexed([1, 2], at);

      expect(pool.query).toHaveBeenCalledWith(
        expect.stringContaining('SET indexed_at = GREATEST($2::timestamptz, synced_at)'),
        [[1, 2], at]
      );
    });

    it('skips an empty id list', async () => {
      await repo.markIndexed([], new Date());

      expect(pool.query).not.toHaveBeenCalled();
    });
  });

  describe('ping', () => {
    it('reports reachability', async () => {
      expect(await repo.ping()).toBe(true);

      pool.query.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));
      expect(await repo.ping()).toBe(false);
    });
  });
});
