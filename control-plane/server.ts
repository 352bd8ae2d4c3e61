import { httpConfig, syncConfig, validateEnv } from '@config';
import { closePool, getPool } from '@database/pool';
import { getLogger } from '@kernel/logger';
import { registerShutdownHandler, setupShutdownHandlers } from '@shutdown';

import { buildServer } from './api/http';
import { initializeContainer } from './services/container';

try {
  validateEnv();
} catch (error) {
  // Config modules may have failed to load; the logger is not usable yet
  process.stderr.write(`[startup] Environment validation failed: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
}

const logger = getLogger('server');

async function start(): Promise<void> {
  setupShutdownHandlers();

  const pool = await getPool();
  registerShutdownHandler('database-pool', closePool);

  const container = initializeContainer({
    dbPool: pool,
    modalidades: syncConfig.modalidades,
    lookbackDays: syncConfig.lookbackDays,
  });
  registerShutdownHandler('container', () => container.close());

  // Refuses to start against an index with an incompatible mapping
  await container.index.createIndex();

  const app = await buildServer({
    search: container.searchService,
    sync: container.orchestrator,
    runs: container.runs,
    reindexer: container.reindexer,
  });
  await app.listen({ port: httpConfig.port, host: httpConfig.host });
  registerShutdownHandler('http', async () => {
    await app.close();
  });
  logger.info(`Server started on port ${httpConfig.port}`);

  if (syncConfig.intervalMinutes > 0) {
    container.scheduler.start(syncConfig.intervalMinutes * 60_000);
    // Registered last so it runs first: no new pages while HTTP drains
    registerShutdownHandler('sync-scheduler', () => container.scheduler.stop());
  } else {
    logger.info('Periodic sync disabled (SYNC_INTERVAL_MINUTES=0)');
  }
}

start().catch((error: unknown) => {
  logger.fatal('Failed to start server', error instanceof Error ? error : new Error(String(error)));
  process.exit(1);
});
