import { describe, it, expect, beforeEach, vi } from 'vitest';
import { errors } from '@elastic/elasticsearch';

import { ElasticsearchIndexService, diffMappings, type ElasticsearchClientLike } from '../ElasticsearchIndexService';
import { INDEX_MAPPINGS } from '../mapping';
import { Licitacao } from '../../../domain/entities/Licitacao';
import { IndexSchemaConflictError, IndexWriteFailureError, SearchUnavailableError } from '../../../domain/errors';

vi.mock('@kernel/logger', () => ({
  getLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

function createMockClient() {
  return {
    indices: {
      exists: vi.fn().mockResolvedValue(false),
      create: vi.fn().mockResolvedValue({ acknowledged: true }),
      getMapping: vi.fn(),
    },
    bulk: vi.fn().mockResolvedValue({ errors: false, took: 1, items: [] }),
    search: vi.fn(),
    delete: vi.fn().mockResolvedValue({ result: 'deleted' }),
    cluster: {
      health: vi.fn().mockResolvedValue({ status: 'green' }),
    },
  } satisfies ElasticsearchClientLike;
}

function licitacao(id: number): Licitacao {
  return Licitacao.create({
    externalId: `ext-${id}`,
    objetoCompra: `Objeto ${id}`,
    informacaoComplementar: null,
    orgao: 'Órgão',
    orgaoCnpj: null,
    modalidade: 'Pregão - Eletrônico',
    codigoModalidade: 6,
    uf: 'SP',
    municipio: null,
    valorEstimado: 10.5,
    dataAberturaProposta: new Date('2025-05-10T12:00:00.000Z'),
    dataEncerramentoProposta: null,
    dataPublicacao: null,
    situacao: null,
    linkSistemaOrigem: null,
    rawPayload: { secret: 'not indexed' },
  }, id, new Date('2025-05-11T00:00:00.000Z'));
}

describe('ElasticsearchIndexService', () => {
  let client: ReturnType<typeof createMockClient>;
  let service: ElasticsearchIndexService;

  beforeEach(() => {
    vi.clearAllMocks();
    client = createMockClient();
    service = new ElasticsearchIndexService(client, { index: 'licitacoes-test' });
  });

  describe('createIndex', () => {
    it('creates the index with settings and mappings when absent', async () => {
      await service.createIndex();

      expect(client.indices.create).toHaveBeenCalledTimes(1);
      const params = client.indices.create.mock.calls[0]?.[0];
      expect(params.index).toBe('licitacoes-test');
      expect(params.mappings).toBe(INDEX_MAPPINGS);
      expect(params.settings.analysis.analyzer.portugues_folded.filter).toEqual([
        'lowercase',
        'asciifolding',
        'portuguese_stop',
        'portuguese_light_stemmer',
      ]);
    });

    it('is a no-op the second time', async () => {
      await service.createIndex();
      client.indices.exists.mockResolvedValue(true);
      client.indices.getMapping.mockResolvedValue({ 'licitacoes-test': { mappings: INDEX_MAPPINGS } });

      await service.createIndex();

      expect(client.indices.create).toHaveBeenCalledTimes(1);
      expect(client.indices.getMapping).toHaveBeenCalledTimes(1);
    });

    it('reports an incompatible mapping without altering it', async () => {
      client.indices.exists.mockResolvedValue(true);
      client.indices.getMapping.mockResolvedValue({
        'licitacoes-test': {
          mappings: { properties: { ...INDEX_MAPPINGS.properties, uf: { type: 'text' } } },
        },
      });

      await expect(service.createIndex()).rejects.toBeInstanceOf(IndexSchemaConflictError);
      await expect(service.createIndex()).rejects.toThrow('uf: expected type keyword, found text');
      expect(client.indices.create).not.toHaveBeenCalled();
    });

    it('maps an unreachable cluster to SearchUnavailable', async () => {
      client.indices.exists.mockRejectedValue(new errors.ConnectionError('connect ECONNREFUSED'));

      await expect(service.createIndex()).rejects.toBeInstanceOf(SearchUnavailableError);
    });
  });

  describe('diffMappings', () => {
    it('flags missing fields and changed analyzers', () => {
      const { objeto_compra: _omitted, ...rest } = INDEX_MAPPINGS.properties ?? {};
      const mismatches = diffMappings(INDEX_MAPPINGS, {
        properties: { ...rest, orgao_nome: { type: 'text', analyzer: 'standard' } },
      });

      expect(mismatches).toEqual([
        'objeto_compra: missing',
        'orgao_nome: expected analyzer portugues_folded, found standard',
      ]);
    });
  });

  describe('indexBatch', () => {
    it('does nothing for an empty batch', async () => {
      await service.indexBatch([]);
      expect(client.bulk).not.toHaveBeenCalled();
    });

    it('upserts by internalId without the raw payload', async () => {
      await service.indexBatch([licitacao(1), licitacao(2)]);

      const params = client.bulk.mock.calls[0]?.[0];
      expect(params.refresh).toBe(false);
      expect(params.operations).toHaveLength(4);
      expect(params.operations[0]).toEqual({ index: { _index: 'licitacoes-test', _id: '1' } });
      expect(params.operations[1]).toMatchObject({ internal_id: 1, external_id: 'ext-1', uf: 'SP' });
      expect(params.operations[1]).not.toHaveProperty('raw_payload');
      expect(params.operations[2]).toEqual({ index: { _index: 'licitacoes-test', _id: '2' } });
    });

    it('passes the configured refresh policy', async () => {
      const waiting = new ElasticsearchIndexService(client, { index: 'licitacoes-test', refresh: 'wait_for' });
      await waiting.indexDocument(licitacao(1));

      expect(client.bulk.mock.calls[0]?.[0].refresh).toBe('wait_for');
    });

    it('reports only the failed subset', async () => {
      client.bulk.mockResolvedValue({
        errors: true,
        took: 1,
        items: [
          { index: { _id: '1', status: 200, result: 'updated' } },
          { index: { _id: '2', status: 400, error: { type: 'mapper_parsing_exception', reason: 'failed to parse' } } },
          { index: { _id: '3', status: 429, error: { type: 'es_rejected_execution_exception' } } },
        ],
      });

      const error = await service.indexBatch([licitacao(1), licitacao(2), licitacao(3)]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(IndexWriteFailureError);
      if (!(error instanceof IndexWriteFailureError)) return;
      expect(error.failures).toEqual([
        { internalId: 2, reason: 'failed to parse' },
        { internalId: 3, reason: 'es_rejected_execution_exception' },
      ]);
    });

    it('reports the whole batch when the request itself fails', async () => {
      client.bulk.mockRejectedValue(new errors.ConnectionError('socket hang up'));

      const error = await service.indexBatch([licitacao(1), licitacao(2)]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(IndexWriteFailureError);
      if (!(error instanceof IndexWriteFailureError)) return;
      expect(error.failedIds).toEqual([1, 2]);
    });
  });

  describe('deleteDocument', () => {
    it('ignores a missing document', async () => {
      await service.deleteDocument(5);

      expect(client.delete).toHaveBeenCalledWith(
        { index: 'licitacoes-test', id: '5' },
        { ignore: [404] }
      );
    });
  });

  describe('search', () => {
    it('returns raw hits, total and aggregations', async () => {
      client.search.mockResolvedValue({
        took: 1,
        timed_out: false,
        _shards: { total: 1, successful: 1, failed: 0 },
        hits: {
          total: { value: 42, relation: 'eq' },
          hits: [{ _index: 'licitacoes-test', _id: '9', _score: 1.5, _source: { internal_id: 9 } }],
        },
        aggregations: { ufs: { buckets: [] } },
      });

      const result = await service.search({
        query: { match_all: {} },
        sort: [],
        from: 0,
        size: 10,
        track_total_hits: true,
      });

      expect(client.search.mock.calls[0]?.[0].index).toBe('licitacoes-test');
      expect(result).toEqual({
        total: 42,
        hits: [{ id: '9', score: 1.5, source: { internal_id: 9 } }],
        aggregations: { ufs: { buckets: [] } },
      });
    });

    it('maps transport failures to SearchUnavailable', async () => {
      client.search.mockRejectedValue(new errors.TimeoutError('Request timed out'));

      await expect(service.search({
        query: { match_all: {} },
        sort: [],
        from: 0,
        size: 10,
        track_total_hits: true,
      })).rejects.toBeInstanceOf(SearchUnavailableError);
    });
  });

  describe('healthCheck', () => {
    it('reports the cluster status', async () => {
      client.cluster.health.mockResolvedValue({ status: 'yellow' });
      expect(await service.healthCheck()).toEqual({ reachable: true, clusterStatus: 'yellow' });
    });

    it('never throws for an unreachable cluster', async () => {
      client.cluster.health.mockRejectedValue(new errors.ConnectionError('connect ECONNREFUSED'));
      expect(await service.healthCheck()).toEqual({ reachable: false, clusterStatus: 'unknown' });
    });
  });
});
