/**
 * Environment Validation Schema
 *
 * Zod-based schema providing type-safe validation for all environment variables.
 * Used by validateConfig() for fail-fast boot validation.
 *
 * @module @config/schema
 */

import { z } from 'zod';

// ============================================================================
// Reusable validators
// ============================================================================

const intString = z.string().trim().regex(/^-?\d+$/, { message: 'Must be an integer' });

const positiveIntString = intString.refine(v => Number(v) > 0, { message: 'Must be > 0' });

const nonNegativeIntString = intString.refine(v => Number(v) >= 0, { message: 'Must be >= 0' });

const urlString = z.string().url();

const postgresUrl = z.string().regex(/^postgres(ql)?:\/\//, {
  message: 'DATABASE_URL must be a postgres:// or postgresql:// connection string',
});

const intList = z.string().regex(/^\s*\d+(\s*,\s*\d+)*\s*$/, {
  message: 'Must be a comma-separated list of integers',
});

// ============================================================================
// Environment schema
// ============================================================================

export const envSchema = z.object({
  // -- Core --
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).optional(),
  PORT: positiveIntString.optional(),
  HOST: z.string().min(1).optional(),
  HTTP_REQUEST_TIMEOUT_MS: positiveIntString.optional(),
  HTTP_BODY_LIMIT: positiveIntString.optional(),

  // -- Database --
  DATABASE_URL: postgresUrl,
  DB_POOL_SIZE: positiveIntString.optional(),
  DB_STATEMENT_TIMEOUT_MS: positiveIntString.optional(),
  DB_CONNECTION_TIMEOUT_MS: positiveIntString.optional(),
  DB_IDLE_TIMEOUT_MS: positiveIntString.optional(),

  // -- Search engine --
  ELASTICSEARCH_HOST: urlString.optional(),
  ELASTICSEARCH_INDEX: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/, {
    message: 'Index names must be lowercase and may contain only a-z, 0-9, _ and -',
  }).optional(),
  ELASTICSEARCH_USERNAME: z.string().min(1).optional(),
  ELASTICSEARCH_PASSWORD: z.string().min(1).optional(),
  ELASTICSEARCH_REQUEST_TIMEOUT_MS: positiveIntString.optional(),

  // -- Procurement portal --
  PNCP_BASE_URL: urlString.optional(),
  PNCP_TIMEOUT_MS: positiveIntString.optional(),
  PNCP_PAGE_SIZE: positiveIntString.optional(),

  // -- Sync --
  SYNC_INTERVAL_MINUTES: nonNegativeIntString.optional(),
  SYNC_LOOKBACK_DAYS: positiveIntString.optional(),
  SYNC_MODALIDADES: intList.optional(),
  SYNC_FETCH_MAX_RETRIES: nonNegativeIntString.optional(),
  SYNC_INDEX_MAX_RETRIES: nonNegativeIntString.optional(),
  SYNC_STORE_MAX_RETRIES: nonNegativeIntString.optional(),
  SYNC_MAX_REPORTED_SKIPS: nonNegativeIntString.optional(),

  // -- Retry --
  RETRY_BASE_DELAY_MS: positiveIntString.optional(),
  RETRY_MAX_DELAY_MS: positiveIntString.optional(),
  RETRY_BACKOFF_MULTIPLIER: z.string().regex(/^\d+(\.\d+)?$/).optional(),

  // -- Search API --
  SEARCH_DEFAULT_PAGE_SIZE: positiveIntString.optional(),
  SEARCH_MAX_PAGE_SIZE: positiveIntString.optional(),
  SEARCH_TERMS_AGG_SIZE: positiveIntString.optional(),
}).refine(
  (data) => !data.ELASTICSEARCH_USERNAME === !data.ELASTICSEARCH_PASSWORD,
  { message: 'ELASTICSEARCH_USERNAME and ELASTICSEARCH_PASSWORD must be set together', path: ['ELASTICSEARCH_PASSWORD'] }
);

export type EnvConfig = z.infer<typeof envSchema>;
