import { errors, type estypes } from '@elastic/elasticsearch';

import { getLogger } from '@kernel/logger';
import { getErrorMessage, toError } from '@errors';

import type {
  EngineSearchRequest,
  RawSearchResponse,
  SearchHealth,
  SearchIndex,
} from '../../application/ports/SearchIndex';
import type { Licitacao } from '../../domain/entities/Licitacao';
import {
  IndexSchemaConflictError,
  IndexWriteFailureError,
  SearchUnavailableError,
  type IndexWriteItemFailure,
} from '../../domain/errors';
import { INDEX_MAPPINGS, INDEX_SETTINGS, toIndexDocument } from './mapping';

const logger = getLogger('licitacoes:search');

// ============================================================================
// Type Definitions
// ============================================================================

interface TransportOptions {
  ignore?: number[];
}

/**
* The subset of the Elasticsearch client this service calls
*/
export interface ElasticsearchClientLike {
  indices: {
    exists(params: estypes.IndicesExistsRequest): Promise<boolean>;
    create(params: estypes.IndicesCreateRequest): Promise<unknown>;
    getMapping(params: estypes.IndicesGetMappingRequest): Promise<estypes.IndicesGetMappingResponse>;
  };
  bulk(params: estypes.BulkRequest): Promise<estypes.BulkResponse>;
  search(params: estypes.SearchRequest): Promise<estypes.SearchResponse<Record<string, unknown>>>;
  delete(params: estypes.DeleteRequest, options?: TransportOptions): Promise<unknown>;
  cluster: {
    health(params?: estypes.ClusterHealthRequest): Promise<estypes.ClusterHealthResponse>;
  };
}

export interface ElasticsearchIndexServiceOptions {
  index: string;
  /** Refresh policy for bulk writes */
  refresh?: boolean | 'wait_for';
}

// ============================================================================
// Helpers
// ============================================================================

function isTransportFailure(error: unknown): boolean {
  if (
    error instanceof errors.ConnectionError ||
    error instanceof errors.TimeoutError ||
    error instanceof errors.NoLivingConnectionsError
  ) {
    return true;
  }
  if (error instanceof errors.ResponseError) {
    const status = error.statusCode ?? 0;
    return status === 404 || status === 429 || status >= 500;
  }
  return false;
}

function propertyType(prop: estypes.MappingProperty | undefined): string | undefined {
  if (!prop) return undefined;
  if ('type' in prop && typeof prop.type === 'string') return prop.type;
  return 'properties' in prop && prop.properties ? 'object' : undefined;
}

function propertyAnalyzer(prop: estypes.MappingProperty | undefined): string | undefined {
  if (!prop || !('analyzer' in prop)) return undefined;
  return typeof prop.analyzer === 'string' ? prop.analyzer : undefined;
}

/**
* Differences that make an existing mapping unusable by this service
*/
export function diffMappings(
  expected: estypes.MappingTypeMapping,
  actual: estypes.MappingTypeMapping | undefined
): string[] {
  const mismatches: string[] = [];
  const actualProps = actual?.properties ?? {};

  for (const [field, want] of Object.entries(expected.properties ?? {})) {
    const have = actualProps[field];
    if (!have) {
      mismatches.push(`${field}: missing`);
      continue;
    }
    const wantType = propertyType(want);
    const haveType = propertyType(have);
    if (wantType !== haveType) {
      mismatches.push(`${field}: expected type ${wantType}, found ${haveType}`);
      continue;
    }
    const wantAnalyzer = propertyAnalyzer(want);
    if (wantAnalyzer !== undefined && propertyAnalyzer(have) !== wantAnalyzer) {
      mismatches.push(`${field}: expected analyzer ${wantAnalyzer}, found ${propertyAnalyzer(have) ?? 'default'}`);
    }
  }
  return mismatches;
}

function normalizeClusterStatus(status: string | undefined): SearchHealth['clusterStatus'] {
  const lower = status?.toLowerCase();
  return lower === 'green' || lower === 'yellow' || lower === 'red' ? lower : 'unknown';
}

function totalHits(total: number | estypes.SearchTotalHits | undefined): number {
  if (total === undefined) return 0;
  return typeof total === 'number' ? total : total.value;
}

// ============================================================================
// Service
// ============================================================================

/**
* Sole reader and writer of the Licitação index
*/
export class ElasticsearchIndexService implements SearchIndex {
  private readonly index: string;
  private readonly refresh: boolean | 'wait_for';

  constructor(
    private readonly client: ElasticsearchClientLike,
    options: ElasticsearchIndexServiceOptions
  ) {
    this.index = options.index;
    this.refresh = options.refresh ?? false;
  }

  /**
  * Create the index, or verify an existing one
  * @throws IndexSchemaConflictError when the existing mapping is incompatible
  * @throws SearchUnavailableError when the cluster cannot be reached
  */
  async createIndex(): Promise<void> {
    try {
      const exists = await this.client.indices.exists({ index: this.index });
      if (!exists) {
        try {
          await this.client.indices.create({
            index: this.index,
            settings: INDEX_SETTINGS,
            mappings: INDEX_MAPPINGS,
          });
          logger.info('Index created', { index: this.index });
          return;
        } catch (error) {
          // Lost a creation race: verify whatever the winner created
          if (!(error instanceof errors.ResponseError) || error.statusCode !== 400 ||
            !getErrorMessage(error).includes('resource_already_exists_exception')) {
            throw error;
          }
        }
      }

      const response = await this.client.indices.getMapping({ index: this.index });
      const actual = response[this.index]?.mappings ?? Object.values(response)[0]?.mappings;
      const mismatches = diffMappings(INDEX_MAPPINGS, actual);
      if (mismatches.length > 0) {
        throw new IndexSchemaConflictError(this.index, mismatches);
      }
      logger.debug('Index already exists with a compatible mapping', { index: this.index });
    } catch (error) {
      if (error instanceof IndexSchemaConflictError) {
        logger.error('Index mapping conflict', error, { index: this.index, mismatches: error.mismatches });
        throw error;
      }
      if (isTransportFailure(error)) {
        throw new SearchUnavailableError('Search engine unreachable while creating the index', { cause: toError(error) });
      }
      throw error;
    }
  }

  /**
  * Upsert documents by internalId
  * @throws IndexWriteFailureError listing only the documents that failed
  */
  async indexBatch(docs: Licitacao[]): Promise<void> {
    if (docs.length === 0) return;

    const operations: NonNullable<estypes.BulkRequest['operations']> = [];
    for (const doc of docs) {
      operations.push({ index: { _index: this.index, _id: String(doc.internalId) } });
      operations.push(toIndexDocument(doc));
    }

    let response: estypes.BulkResponse;
    try {
      response = await this.client.bulk({ operations, refresh: this.refresh });
    } catch (error) {
      const reason = getErrorMessage(error);
      logger.error('Bulk request failed', toError(error), { index: this.index, count: docs.length });
      throw new IndexWriteFailureError(docs.map(d => ({ internalId: d.internalId, reason })));
    }

    if (!response.errors) {
      logger.debug('Indexed batch', { index: this.index, count: docs.length });
      return;
    }

    const failures: IndexWriteItemFailure[] = [];
    response.items.forEach((item, position) => {
      const result = item.index;
      if (!result?.error) return;
      const fallback = docs[position];
      const internalId = result._id ? Number(result._id) : fallback?.internalId;
      if (internalId === undefined || Number.isNaN(internalId)) return;
      failures.push({
        internalId,
        reason: result.error.reason ?? result.error.type,
      });
    });

    if (failures.length > 0) {
      logger.warn('Bulk request partially failed', {
        index: this.index,
        failed: failures.length,
        total: docs.length,
      });
      throw new IndexWriteFailureError(failures);
    }
  }

  async indexDocument(doc: Licitacao): Promise<void> {
    await this.indexBatch([doc]);
  }

  async deleteDocument(internalId: number): Promise<void> {
    try {
      await this.client.delete({ index: this.index, id: String(internalId) }, { ignore: [404] });
    } catch (error) {
      if (isTransportFailure(error)) {
        throw new SearchUnavailableError('Search engine unreachable while deleting a document', { cause: toError(error) });
      }
      throw error;
    }
  }

  /**
  * Execute a built query and return the raw hits and aggregations
  * @throws SearchUnavailableError
  */
  async search(request: EngineSearchRequest): Promise<RawSearchResponse> {
    let response: estypes.SearchResponse<Record<string, unknown>>;
    try {
      response = await this.client.search({ index: this.index, ...request });
    } catch (error) {
      if (isTransportFailure(error)) {
        logger.warn('Search engine unavailable', { index: this.index, error: getErrorMessage(error) });
        throw new SearchUnavailableError('Search unavailable', { cause: toError(error) });
      }
      throw error;
    }

    return {
      total: totalHits(response.hits.total),
      hits: response.hits.hits.map(hit => ({
        id: hit._id ?? '',
        score: hit._score ?? null,
        source: hit._source ?? {},
      })),
      aggregations: response.aggregations ?? {},
    };
  }

  /**
  * Cluster reachability; never throws
  */
  async healthCheck(): Promise<SearchHealth> {
    try {
      const health = await this.client.cluster.health({ timeout: '5s' });
      return { reachable: true, clusterStatus: normalizeClusterStatus(health.status) };
    } catch (error) {
      logger.warn('Search engine health check failed', { error: getErrorMessage(error) });
      return { reachable: false, clusterStatus: 'unknown' };
    }
  }
}
