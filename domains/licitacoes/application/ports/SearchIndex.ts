import type { estypes } from '@elastic/elasticsearch';

import type { Licitacao } from '../../domain/entities/Licitacao';

/**
* Structured request in the engine's query DSL, as built by the query builder
*/
export interface EngineSearchRequest {
  query: estypes.QueryDslQueryContainer;
  sort: estypes.SortCombinations[];
  from: number;
  size: number;
  track_total_hits: true;
  aggs?: Record<string, estypes.AggregationsAggregationContainer>;
}

export interface RawSearchHit {
  id: string;
  score: number | null;
  source: Record<string, unknown>;
}

/**
* Engine response passed back uninterpreted
*/
export interface RawSearchResponse {
  total: number;
  hits: RawSearchHit[];
  aggregations: Record<string, unknown>;
}

export interface SearchHealth {
  reachable: boolean;
  clusterStatus: 'green' | 'yellow' | 'red' | 'unknown';
}

/**
* The search engine side of the pipeline
*/
export interface SearchIndex {
  /**
  * Create the index, or verify an existing one is compatible
  * @throws {IndexSchemaConflictError}
  */
  createIndex(): Promise<void>;

  /**
  * Upsert documents by internalId
  * @throws {IndexWriteFailureError} Carrying only the documents that failed
  */
  indexBatch(docs: Licitacao[]): Promise<void>;

  indexDocument(doc: Licitacao): Promise<void>;

  /**
  * Remove a document; a missing document is not an error
  */
  deleteDocument(internalId: number): Promise<void>;

  /**
  * @throws {SearchUnavailableError}
  */
  search(request: EngineSearchRequest): Promise<RawSearchResponse>;

  /**
  * Never throws
  */
  healthCheck(): Promise<SearchHealth>;
}
