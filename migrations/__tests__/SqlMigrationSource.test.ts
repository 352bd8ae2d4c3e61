import { describe, it, expect, vi } from 'vitest';
import type { Knex } from 'knex';

import { SqlMigrationSource } from '../SqlMigrationSource';

describe('SqlMigrationSource', () => {
  const source = new SqlMigrationSource();

  it('lists migrations by their up files, in order', async () => {
    const migrations = await source.getMigrations();

    expect(migrations[0]).toBe('20250601000000_create_licitacoes');
    expect([...migrations].sort()).toEqual(migrations);
  });

  it('runs the raw SQL of both directions', async () => {
    const raw = vi.fn().mockResolvedValue(undefined);
    const knex = { raw } as unknown as Knex;
    const migration = source.getMigration('20250601000000_create_licitacoes');

    await migration.up(knex);
    await migration.down?.(knex);

    expect(String(raw.mock.calls[0]?.[0])).toContain('CREATE TABLE licitacoes');
    expect(String(raw.mock.calls[1]?.[0])).toContain('DROP TABLE IF EXISTS licitacoes');
    expect(migration.config).toBeUndefined();
  });

  it('rejects names outside the migration alphabet', () => {
    expect(() => source.getMigration('../etc/passwd')).toThrow('Invalid migration name');
  });

  it('rejects a migration without files', () => {
    expect(() => source.getMigration('19990101000000_missing')).toThrow('Migration file missing');
  });
});
