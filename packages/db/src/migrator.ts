import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Pool } from 'pg';
import {
  DatabaseConfigSchema,
  createLogger,
  loadLayeredConfig,
  type SafeLogger,
} from '@tollgate/shared';
import { type TransactionalClient } from './client';
import { renderMigration, resolveTableLayout, type TableLayout } from './tables';

export const MIGRATIONS_DIR = join(__dirname, '..', 'migrations');

export interface MigrationClient extends TransactionalClient {
  query(text: string, values?: unknown[]): Promise<{ rows: Array<{ name: string }> }>;
}

export async function listMigrationFiles(dir: string = MIGRATIONS_DIR): Promise<string[]> {
  return (await readdir(dir)).filter((f) => f.endsWith('.sql')).sort();
}

/** Applies each pending migration in its own transaction. Returns the applied file names. */
export async function runMigrations(
  client: MigrationClient,
  layout: TableLayout,
  logger: Pick<SafeLogger, 'info'>,
  dir: string = MIGRATIONS_DIR,
): Promise<string[]> {
  if (layout.schema !== '') {
    await client.query(`CREATE SCHEMA IF NOT EXISTS "${layout.schema}"`);
  }
  await client.query(`
    CREATE TABLE IF NOT EXISTS ${layout.tables.migrations} (
      name VARCHAR(255) PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const applied = await client.query(`SELECT name FROM ${layout.tables.migrations} ORDER BY name`);
  const appliedSet = new Set(applied.rows.map((r) => r.name));

  const done: string[] = [];
  for (const file of await listMigrationFiles(dir)) {
    if (appliedSet.has(file)) continue;

    const sql = renderMigration(await readFile(join(dir, file), 'utf-8'), layout);

    await client.query('BEGIN');
    try {
      await client.query(sql);
      await client.query(`INSERT INTO ${layout.tables.migrations} (name) VALUES ($1)`, [file]);
      await client.query('COMMIT');
      logger.info({ file }, 'Migration applied');
      done.push(file);
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    }
  }
  return done;
}

async function migrate(): Promise<void> {
  const config = loadLayeredConfig(DatabaseConfigSchema);
  const logger = createLogger({ name: 'migrator' });
  const layout = resolveTableLayout({ prefix: config.TABLE_PREFIX, schema: config.DB_SCHEMA });

  const pool = new Pool({ connectionString: config.DATABASE_URL });
  const client = await pool.connect();
  try {
    const applied = await runMigrations(client, layout, logger);
    logger.info({ count: applied.length }, 'All migrations applied');
  } finally {
    client.release();
    await pool.end();
  }
}

if (require.main === module) {
  migrate().catch((err: unknown) => {
    process.stderr.write(`Migration failed: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
  });
}
