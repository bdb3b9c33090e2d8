import { Pool, type PoolConfig, type PoolClient } from 'pg';
import { type TransactionRunner } from '@tollgate/domain';
import { createLogger } from '@tollgate/shared';
import { translateDbError } from './errors';

const logger = createLogger({ name: 'db' });

let pool: Pool | null = null;

export function getPool(): Pool {
  if (!pool) throw new Error('Database pool not initialized. Call initPool first.');
  return pool;
}

export function initPool(config: PoolConfig): Pool {
  pool = new Pool(config);
  pool.on('error', (err) => {
    logger.error({ err: err.message }, 'Unexpected database pool error');
  });
  logger.info({}, 'Database pool initialized');
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info({}, 'Database pool closed');
  }
}

/** The slice of a pooled connection the transaction wrapper drives. */
export interface TransactionalClient {
  query(text: string): Promise<unknown>;
  release(err?: Error | boolean): void;
}

/**
 * BEGIN/COMMIT around `fn`, ROLLBACK on failure. Driver errors leave as
 * AuthzError kinds where one applies. A client whose rollback failed is
 * destroyed rather than returned to the pool.
 */
export function createTransactionRunner<C extends TransactionalClient>(
  connect: () => Promise<C>,
): TransactionRunner<C> {
  return async <T>(fn: (client: C) => Promise<T>): Promise<T> => {
    let client: C;
    try {
      client = await connect();
    } catch (err) {
      throw translateDbError(err);
    }

    let broken = false;
    try {
      await client.query('BEGIN');
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (err) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackErr) {
        broken = true;
        logger.error(
          { err: rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr) },
          'Rollback failed',
        );
      }
      throw translateDbError(err);
    } finally {
      client.release(broken);
    }
  };
}

export const withTransaction: TransactionRunner<PoolClient> = createTransactionRunner(() =>
  getPool().connect(),
);
