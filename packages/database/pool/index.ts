import { Pool } from 'pg';

import { dbConfig } from '@config';
import { getLogger } from '@kernel/logger';

const logger = getLogger('database:pool');

let poolInstance: Pool | null = null;
let poolInitPromise: Promise<Pool> | null = null;

/**
* Get the database connection string from environment
* Lazy validation - only called when connection is needed
*/
function getConnectionString(): string {
  const connectionString = process.env['DATABASE_URL'];

  if (!connectionString) {
    throw new Error(
      'DATABASE_NOT_CONFIGURED: DATABASE_URL environment variable is required. ' +
      'Please set it to your PostgreSQL connection string.'
    );
  }

  return connectionString;
}

/**
* Build a pool from dbConfig without connecting
*/
export function createPool(connectionString: string = getConnectionString()): Pool {
  const pool = new Pool({
    connectionString,
    statement_timeout: dbConfig.statementTimeoutMs,
    max: dbConfig.poolSize,
    idleTimeoutMillis: dbConfig.idleTimeoutMs,
    connectionTimeoutMillis: dbConfig.connectionTimeoutMs,
    keepAlive: true,
  });

  // Idle client errors would otherwise crash the process
  pool.on('error', (err) => {
    logger.error('Unexpected pool error', err);
  });

  return pool;
}

/**
* Lazy initialization of the shared pool, validated with one round trip.
* Concurrent callers share the same initialization promise.
*/
export async function getPool(): Promise<Pool> {
  if (poolInstance) return poolInstance;
  if (poolInitPromise) return poolInitPromise;

  poolInitPromise = (async () => {
    const pool = createPool();
    try {
      await pool.query('SELECT 1');
    } catch (error) {
      poolInitPromise = null;
      await pool.end().catch((endError: unknown) => {
        logger.warn('Failed to close unvalidated pool', { error: String(endError) });
      });
      const err = error instanceof Error ? error : new Error(String(error));
      throw new Error(`Failed to validate database connection: ${err.message}`, { cause: err });
    }

    logger.info('Database pool validated successfully');
    poolInstance = pool;
    return pool;
  })();

  return poolInitPromise;
}

/**
* Close the shared pool; safe to call when it was never opened
*/
export async function closePool(): Promise<void> {
  const pool = poolInstance;
  poolInstance = null;
  poolInitPromise = null;
  if (pool) {
    await pool.end();
    logger.info('Database pool closed');
  }
}

/**
* Get connection metrics for monitoring
*/
export function getConnectionMetrics(): {
  totalConnections: number;
  idleConnections: number;
  waitingClients: number;
} {
  if (!poolInstance) {
    return { totalConnections: 0, idleConnections: 0, waitingClients: 0 };
  }

  return {
    totalConnections: poolInstance.totalCount,
    idleConnections: poolInstance.idleCount,
    waitingClients: poolInstance.waitingCount,
  };
}
