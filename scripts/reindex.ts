import { syncConfig, validateEnv } from '@config';
import { closePool, getPool } from '@database/pool';
import { getLogger } from '@kernel/logger';

import { initializeContainer } from '../control-plane/services/container';

/**
 * Reindex CLI
 *
 * Usage: tsx scripts/reindex.ts [lagging|all]
 *
 *   lagging (default)  Resubmit records whose latest upsert never reached the index
 *   all                Resubmit every stored record
 */

const logger = getLogger('scripts:reindex');

function parseMode(arg: string | undefined): 'lagging' | 'all' {
  if (arg === undefined || arg === 'lagging') return 'lagging';
  if (arg === 'all') return 'all';
  console.error(`Unknown mode "${arg}". Usage: tsx scripts/reindex.ts [lagging|all]`);
  process.exit(1);
}

async function main(): Promise<void> {
  validateEnv();
  const mode = parseMode(process.argv[2]);

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const container = initializeContainer({
    dbPool: await getPool(),
    modalidades: syncConfig.modalidades,
    lookbackDays: syncConfig.lookbackDays,
  });

  try {
    await container.index.createIndex();
    const result = await container.reindexer.reindex(mode, controller.signal);
    console.log(`Indexed ${result.indexed}, failed ${result.failed}${controller.signal.aborted ? ' (interrupted)' : ''}`);
    for (const failure of result.failures) {
      console.log(`  ! ${failure.internalId}: ${failure.reason}`);
    }
    process.exitCode = result.failed > 0 ? 1 : 0;
  } finally {
    await container.close();
    await closePool();
  }
}

main().catch((error: unknown) => {
  logger.fatal('Reindex failed', error instanceof Error ? error : new Error(String(error)));
  process.exit(1);
});
