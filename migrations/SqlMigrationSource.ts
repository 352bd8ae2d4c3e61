import { readdirSync, readFileSync, existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Knex } from 'knex';

const SQL_DIR = join(dirname(fileURLToPath(import.meta.url)), 'sql');

/**
 * Knex MigrationSource over raw .sql files in migrations/sql/.
 *
 * Each migration is a pair of files:
 *   - <name>.up.sql   forward migration
 *   - <name>.down.sql rollback migration
 *
 * Knex wraps each migration in a transaction, except when the forward file
 * uses CREATE INDEX CONCURRENTLY, which PostgreSQL refuses inside one.
 */
export class SqlMigrationSource implements Knex.MigrationSource<string> {
  constructor(private readonly dir: string = SQL_DIR) {}

  getMigrations(): Promise<string[]> {
    const files = readdirSync(this.dir)
      .filter(f => f.endsWith('.up.sql'))
      .map(f => f.replace('.up.sql', ''))
      .sort();
    return Promise.resolve(files);
  }

  getMigrationName(migration: string): string {
    return migration;
  }

  getMigration(migration: string): Knex.Migration {
    if (!/^[a-zA-Z0-9_-]+$/.test(migration)) {
      throw new Error(
        `Invalid migration name: "${migration}". ` +
        `Migration names must contain only alphanumeric characters, underscores, and hyphens.`
      );
    }

    const upPath = join(this.dir, `${migration}.up.sql`);
    const downPath = join(this.dir, `${migration}.down.sql`);

    if (!existsSync(upPath)) {
      throw new Error(`Migration file missing: ${upPath}.`);
    }
    // Checked up front so a migration that cannot be rolled back is never applied
    if (!existsSync(downPath)) {
      throw new Error(`Migration rollback file missing: ${downPath}.`);
    }

    const upSql = readFileSync(upPath, 'utf8');

    const migrationObj: Knex.Migration = {
      up: async (knex: Knex) => {
        await knex.raw(upSql);
      },
      down: async (knex: Knex) => {
        await knex.raw(readFileSync(downPath, 'utf8'));
      },
    };

    if (/CONCURRENTLY/i.test(upSql)) {
      migrationObj.config = { transaction: false };
    }

    return migrationObj;
  }
}
