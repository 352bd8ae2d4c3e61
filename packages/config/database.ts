/**
 * Database Configuration
 *
 * Connection pool and query settings for the system of record.
 */

import { parseIntEnv } from './env';

export const dbConfig = {
  /** Connection pool size */
  poolSize: parseIntEnv('DB_POOL_SIZE', 10),

  /** Statement timeout in milliseconds */
  statementTimeoutMs: parseIntEnv('DB_STATEMENT_TIMEOUT_MS', 30000),

  /** Connection timeout in milliseconds */
  connectionTimeoutMs: parseIntEnv('DB_CONNECTION_TIMEOUT_MS', 5000),

  /** Idle connection lifetime in milliseconds */
  idleTimeoutMs: parseIntEnv('DB_IDLE_TIMEOUT_MS', 30000),
} as const;
