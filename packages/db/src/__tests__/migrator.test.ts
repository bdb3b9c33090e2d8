import { describe, it, expect, vi } from 'vitest';
import { listMigrationFiles, runMigrations } from '../migrator';
import { resolveTableLayout } from '../tables';

function createFakeClient(applied: string[] = []) {
  const statements: string[] = [];
  return {
    statements,
    query: vi.fn(async (text: string, _values?: unknown[]) => {
      statements.push(text.trim());
      return { rows: text.includes('SELECT name') ? applied.map((name) => ({ name })) : [] };
    }),
    release: vi.fn(),
  };
}

const logger = { info: vi.fn() };

describe('runMigrations', () => {
  it('ships the initial migration', async () => {
    expect(await listMigrationFiles()).toContain('001_initial.sql');
  });

  it('renders every placeholder against the configured layout', async () => {
    const client = createFakeClient();
    const layout = resolveTableLayout({ prefix: 'acme_', schema: 'auth' });

    const applied = await runMigrations(client, layout, logger);

    expect(applied).toContain('001_initial.sql');
    expect(client.statements[0]).toBe('CREATE SCHEMA IF NOT EXISTS "auth"');
    const migration = client.statements.find((s) => s.includes('"auth"."acme_grants"'));
    expect(migration).toBeDefined();
    expect(migration).not.toContain('{{');
    expect(migration).toContain('acme_revoked_tokens_expires_idx');
    expect(client.statements).toContain('COMMIT');
  });

  it('skips migrations already recorded', async () => {
    const files = await listMigrationFiles();
    const client = createFakeClient(files);

    const applied = await runMigrations(client, resolveTableLayout({ prefix: 'tg_' }), logger);

    expect(applied).toEqual([]);
    expect(client.statements).not.toContain('BEGIN');
  });
});
