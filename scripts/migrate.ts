import knex, { type Knex } from 'knex';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { writeFileSync, mkdirSync } from 'node:fs';

import { SqlMigrationSource } from '../migrations/SqlMigrationSource';

const ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '..');
const SQL_DIR = join(ROOT, 'migrations', 'sql');

/**
 * Database Migration CLI
 *
 * Commands:
 *   up | latest       Run all pending migrations
 *   down | rollback   Rollback last batch (--all for everything)
 *   status            Show applied vs pending migrations
 *   make <name>       Create a new migration (up + down SQL files)
 */

/**
 * Replace the userinfo of a connection string before it reaches a log line
 */
function sanitizeConnectionString(connStr: string): string {
  try {
    const url = new URL(connStr);
    if (url.username || url.password) {
      url.username = '***';
      url.password = '***';
    }
    return url.toString();
  } catch {
    return connStr.replace(/:\/\/[^@]*@/, '://***:***@');
  }
}

function createKnexInstance(connectionString: string): Knex {
  const isProduction = process.env['NODE_ENV'] === 'production';

  return knex({
    client: 'pg',
    connection: {
      connectionString,
      ...(isProduction ? { ssl: { rejectUnauthorized: true } } : {}),
    },
    // min 0 lets the process exit once migrations are done
    pool: { min: 0, max: 2 },
    migrations: {
      tableName: 'schema_migrations',
      migrationSource: new SqlMigrationSource(),
    },
  });
}

async function runUp(db: Knex): Promise<void> {
  console.log('Running all pending migrations...');
  const [batch, log]: [number, string[]] = await db.migrate.latest();
  if (log.length === 0) {
    console.log('Already up to date.');
    return;
  }
  console.log(`Batch ${batch}: ${log.length} migration(s) applied:`);
  for (const name of log) {
    console.log(`  + ${name}`);
  }
}

async function runRollback(db: Knex): Promise<void> {
  const all = process.argv.includes('--all');
  console.log(all ? 'Rolling back all migrations...' : 'Rolling back last batch...');
  const [batch, log]: [number, string[]] = await db.migrate.rollback(undefined, all);
  if (log.length === 0) {
    console.log('Nothing to rollback.');
    return;
  }
  console.log(`Batch ${batch}: ${log.length} migration(s) rolled back:`);
  for (const name of log) {
    console.log(`  - ${name}`);
  }
}

async function runStatus(db: Knex): Promise<void> {
  const [completed, pending]: [Array<{ name: string }>, Array<{ file: string }>] = await db.migrate.list();
  console.log(`\nCompleted migrations (${completed.length}):`);
  for (const item of completed) {
    console.log(`  [x] ${item.name}`);
  }
  console.log(`\nPending migrations (${pending.length}):`);
  for (const item of pending) {
    console.log(`  [ ] ${item.file}`);
  }
  console.log('');
}

function runMake(name: string | undefined): void {
  if (!name) {
    console.error('Usage: npm run migrate:make -- <name>');
    process.exit(1);
  }

  const timestamp = new Date().toISOString().replace(/[-:T]/g, '').slice(0, 14);
  const safeName = name.replace(/[^a-z0-9_]/gi, '_').toLowerCase();
  const baseName = `${timestamp}_${safeName}`;
  const createdAt = new Date().toISOString();

  mkdirSync(SQL_DIR, { recursive: true });
  const upFile = join(SQL_DIR, `${baseName}.up.sql`);
  const downFile = join(SQL_DIR, `${baseName}.down.sql`);
  writeFileSync(upFile, `-- Migration: ${name}\n-- Created: ${createdAt}\n\n`);
  writeFileSync(downFile, `-- Rollback: ${name}\n-- Created: ${createdAt}\n\n`);

  console.log('Created migration files:');
  console.log(`  UP:   ${upFile}`);
  console.log(`  DOWN: ${downFile}`);
}

function printHelp(): void {
  console.log(`
Usage: tsx scripts/migrate.ts <command>

Commands:
  up, latest       Run all pending migrations
  down, rollback   Rollback the last batch (--all for everything)
  status           Show migration status (applied / pending)
  make <name>      Create a new migration (paired .up.sql + .down.sql)
`);
}

async function withDb(run: (db: Knex) => Promise<void>): Promise<void> {
  const connectionString = process.env['DATABASE_URL'];
  if (!connectionString) {
    console.error('Error: DATABASE_URL environment variable is required.');
    process.exit(1);
  }

  const db = createKnexInstance(connectionString);
  try {
    await run(db);
  } finally {
    await db.destroy();
  }
}

async function main(): Promise<void> {
  const command = process.argv[2];

  switch (command) {
    case 'up':
    case 'latest':
      await withDb(runUp);
      break;
    case 'down':
    case 'rollback':
      await withDb(runRollback);
      break;
    case 'status':
      await withDb(runStatus);
      break;
    case 'make':
      runMake(process.argv[3]);
      break;
    default:
      printHelp();
      if (command) process.exit(1);
      break;
  }
}

main().catch((error: unknown) => {
  const rawMessage = error instanceof Error ? error.message : String(error);
  console.error('Migration failed:', sanitizeConnectionString(rawMessage));
  process.exit(1);
});
