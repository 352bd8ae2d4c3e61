/**
 * Search Engine Configuration
 *
 * Elasticsearch connection settings and search API bounds.
 */

import { parseIntEnv } from './env';

/** Elasticsearch refuses from + size beyond index.max_result_window (default 10 000) */
export const MAX_RESULT_WINDOW = 10000;

export const searchConfig = {
  /** Cluster URL */
  host: process.env['ELASTICSEARCH_HOST'] || 'http://localhost:9200',

  /** Index holding the Licitação documents */
  index: process.env['ELASTICSEARCH_INDEX'] || 'licitacoes',

  /** Basic auth username (optional) */
  username: process.env['ELASTICSEARCH_USERNAME'] || undefined,

  /** Basic auth password (optional) */
  password: process.env['ELASTICSEARCH_PASSWORD'] || undefined,

  /** Per-request timeout in milliseconds */
  requestTimeoutMs: parseIntEnv('ELASTICSEARCH_REQUEST_TIMEOUT_MS', 10000),

  /** Default page size for GET /licitacoes */
  defaultPageSize: parseIntEnv('SEARCH_DEFAULT_PAGE_SIZE', 10),

  /** Maximum page size; larger requests are clamped */
  maxPageSize: parseIntEnv('SEARCH_MAX_PAGE_SIZE', 100),

  /** Bucket count for distinct-value aggregations */
  termsAggregationSize: parseIntEnv('SEARCH_TERMS_AGG_SIZE', 100),
} as const;

(function validateSearchConfig() {
  if (searchConfig.defaultPageSize < 1) {
    throw new Error('SEARCH_DEFAULT_PAGE_SIZE must be >= 1');
  }
  if (searchConfig.maxPageSize < searchConfig.defaultPageSize) {
    throw new Error('SEARCH_MAX_PAGE_SIZE must be >= SEARCH_DEFAULT_PAGE_SIZE');
  }
  if (searchConfig.maxPageSize > MAX_RESULT_WINDOW) {
    throw new Error(`SEARCH_MAX_PAGE_SIZE must be <= ${MAX_RESULT_WINDOW}`);
  }
})();
