import { NotFoundError, getErrorMessage } from '@errors';
import { getLogger } from '@kernel/logger';

import type { Licitacao } from '../domain/entities/Licitacao';
import {
  buildAggregationQuery,
  buildSearchQuery,
  shapeSearchResponse,
  type BucketCount,
  type QueryBuilderOptions,
  type SearchRequest,
  type SearchResult,
} from '../infra/search/QueryBuilder';
import type { LicitacaoRepository } from './ports/LicitacaoRepository';
import type { SearchHealth, SearchIndex } from './ports/SearchIndex';

const logger = getLogger('licitacoes:search-service');

// ============================================================================
// Type Definitions
// ============================================================================

export interface ModalidadeCount {
  nome: string;
  count: number;
}

export interface UfCount {
  sigla: string;
  count: number;
}

export interface LicitacaoStats {
  totalLicitacoes: number;
  valorTotal: number;
  valorMedio: number | null;
  valorMax: number | null;
  valorMin: number | null;
  porSituacao: Array<{ situacao: string; count: number }>;
  porMes: Array<{ mes: string; count: number }>;
  /** Stored records not yet indexed since their latest upsert */
  indexLag: number;
}

export interface HealthReport {
  healthy: boolean;
  search: SearchHealth;
  database: { reachable: boolean };
  timestamp: string;
}

/**
* Read side of the service: searches run against the index, single records
* are served from the system of record.
*/
export class LicitacaoSearchService {
  constructor(
    private readonly index: SearchIndex,
    private readonly licitacoes: LicitacaoRepository,
    private readonly queryOptions?: QueryBuilderOptions
  ) {}

  /**
  * @throws ValidationError for an invalid page
  * @throws SearchUnavailableError
  */
  async search(request: SearchRequest): Promise<SearchResult> {
    const built = buildSearchQuery(request, this.queryOptions);
    const raw = await this.index.search(built.engine);
    return shapeSearchResponse(raw, built);
  }

  /**
  * @throws NotFoundError when no record has this internalId
  */
  async getById(internalId: number): Promise<Licitacao> {
    const licitacao = await this.licitacoes.findById(internalId);
    if (!licitacao) {
      throw new NotFoundError('Licitacao');
    }
    return licitacao;
  }

  async listModalidades(): Promise<ModalidadeCount[]> {
    const buckets = await this.aggregateBuckets('modalidades');
    return buckets.map(b => ({ nome: b.key, count: b.count }));
  }

  async listUfs(): Promise<UfCount[]> {
    const buckets = await this.aggregateBuckets('ufs');
    return buckets.map(b => ({ sigla: b.key, count: b.count }));
  }

  async stats(): Promise<LicitacaoStats> {
    const built = buildAggregationQuery(['valorEstimado', 'situacoes', 'publicacoesPorMes'], this.queryOptions);
    const [raw, indexLag] = await Promise.all([
      this.index.search(built.engine),
      this.licitacoes.countIndexLag(),
    ]);
    const { aggregations, total } = shapeSearchResponse(raw, built);
    const valor = aggregations.valorEstimado;

    return {
      totalLicitacoes: total,
      valorTotal: valor?.sum ?? 0,
      valorMedio: valor?.avg ?? null,
      valorMax: valor?.max ?? null,
      valorMin: valor?.min ?? null,
      porSituacao: (aggregations.situacoes ?? []).map(b => ({ situacao: b.key, count: b.count })),
      porMes: (aggregations.publicacoesPorMes ?? []).map(b => ({ mes: b.key, count: b.count })),
      indexLag,
    };
  }

  /**
  * Reachability of both back ends; never throws
  */
  async health(): Promise<HealthReport> {
    const [search, databaseReachable] = await Promise.all([
      this.index.healthCheck(),
      this.licitacoes.ping().catch((error: unknown) => {
        logger.warn('Database ping failed', { error: getErrorMessage(error) });
        return false;
      }),
    ]);

    return {
      healthy: search.reachable && databaseReachable,
      search,
      database: { reachable: databaseReachable },
      timestamp: new Date().toISOString(),
    };
  }

  private async aggregateBuckets(name: 'modalidades' | 'ufs'): Promise<BucketCount[]> {
    const built = buildAggregationQuery([name], this.queryOptions);
    const raw = await this.index.search(built.engine);
    return shapeSearchResponse(raw, built).aggregations[name] ?? [];
  }
}
