import { Pool, type PoolClient } from 'pg';
import { createLogger, errorMessage } from '@gatehouse/shared';

const logger = createLogger({ name: 'db' });

export interface PoolOptions {
  connectionString: string;
  max?: number;
  /** Server-side cap on any single statement, applied to every pooled connection. */
  statementTimeoutMs?: number;
}

let pool: Pool | null = null;

export function getPool(): Pool {
  if (!pool) throw new Error('Database pool not initialized. Call initPool first.');
  return pool;
}

/** Idempotent: a second call returns the pool created by the first. */
export function initPool(opts: PoolOptions): Pool {
  if (pool) return pool;
  pool = new Pool({
    connectionString: opts.connectionString,
    max: opts.max,
    statement_timeout: opts.statementTimeoutMs,
  });
  pool.on('error', (err) => {
    logger.error({ err: err.message }, 'Idle database client failed');
  });
  logger.info({ max: opts.max ?? 10 }, 'Database pool initialized');
  return pool;
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const closing = pool;
  pool = null;
  await closing.end();
  logger.info({}, 'Database pool closed');
}

/**
 * Runs `fn` inside BEGIN/COMMIT on one pooled client. The client is handed
 * to `fn` as the opaque `tx` the repositories expect.
 */
export async function withTransaction<T>(fn: (tx: PoolClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      logger.error({ err: errorMessage(rollbackErr) }, 'Rollback failed');
    }
    throw err;
  } finally {
    client.release();
  }
}
