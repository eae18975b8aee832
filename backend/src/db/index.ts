import { Pool, QueryResultRow } from 'pg';
import { config } from '../config';
import logger from '../utils/logger';
import { PersistenceError, errorMessage } from '../errors';

/** Result shape the repositories read; pg's QueryResult satisfies it. */
export interface QueryRows {
  rows: QueryResultRow[];
  rowCount: number | null;
}

export type QueryFn = (text: string, params?: unknown[]) => Promise<QueryRows>;

let pool: Pool | undefined;

/**
 * Shared pool, created on first use so that code paths without a
 * database never need DATABASE_URL.
 */
export function getPool(): Pool {
  if (!pool) {
    if (!config.databaseUrl) {
      throw PersistenceError.connectionError('DATABASE_URL is not set');
    }

    pool = new Pool({
      connectionString: config.databaseUrl,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });

    pool.on('error', (err) => {
      logger.error('Unexpected error on idle database client', { error: err.message });
    });
  }
  return pool;
}

export const query: QueryFn = async (text, params = []) => {
  const start = Date.now();
  const result = await getPool().query(text, params);
  logger.debug('Executed query', { text, duration: Date.now() - start, rows: result.rowCount });
  return result;
};

/** The part of a pooled client a transaction needs. */
export interface TransactionClient {
  query(text: string, params?: unknown[]): Promise<QueryRows>;
  release(): void;
}

/**
 * Run `work` inside BEGIN/COMMIT on `client`, rolling back on error and
 * always releasing the client. A failed ROLLBACK is logged; the error
 * from `work` is the one rethrown.
 */
export async function runInTransaction<T>(
  client: TransactionClient,
  work: (runQuery: QueryFn) => Promise<T>
): Promise<T> {
  try {
    await client.query('BEGIN');
    const result = await work((text, params = []) => client.query(text, params));
    await client.query('COMMIT');
    return result;
  } catch (error: unknown) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError: unknown) {
      logger.error('Transaction rollback failed', { error: errorMessage(rollbackError) });
    }
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Run `work` in a transaction on a dedicated client from the shared pool.
 */
export async function withTransaction<T>(work: (runQuery: QueryFn) => Promise<T>): Promise<T> {
  return runInTransaction(await getPool().connect(), work);
}

export type TransactionRunner = typeof withTransaction;

/** End the shared pool; the next query opens a new one. */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = undefined;
  }
}
