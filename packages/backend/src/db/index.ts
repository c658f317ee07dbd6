import pg from 'pg';
import { config } from '../config.js';
import { logger } from '../lib/logger.js';
import { StorageUnavailableError, error_message } from '../lib/errors.js';

const { Pool } = pg;

let pool: pg.Pool | null = null;

export type DbClient = pg.PoolClient;

export function get_pool(): pg.Pool {
  if (!pool) {
    pool = new Pool({
      connectionString: config.database_url,
    });

    pool.on('error', (err) => {
      logger.error('database pool error', { error: err.message });
    });
  }
  return pool;
}

export async function close_pool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

function to_storage_error(error: unknown): StorageUnavailableError {
  if (error instanceof StorageUnavailableError) return error;
  return new StorageUnavailableError(`Storage request failed: ${error_message(error)}`, { cause: error });
}

export async function query<T extends pg.QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<pg.QueryResult<T>> {
  const start = Date.now();
  let result: pg.QueryResult<T>;
  try {
    result = await get_pool().query<T>(text, params);
  } catch (error) {
    throw to_storage_error(error);
  }
  const duration_ms = Date.now() - start;

  logger.debug('query executed', {
    query: text.substring(0, 100),
    rows: result.rowCount,
    duration_ms,
  });

  return result;
}

export async function client_query<T extends pg.QueryResultRow>(
  client: DbClient,
  text: string,
  params?: unknown[]
): Promise<pg.QueryResult<T>> {
  try {
    return await client.query<T>(text, params);
  } catch (error) {
    throw to_storage_error(error);
  }
}

/**
 * Runs `fn` inside BEGIN/COMMIT on a dedicated client. Anything thrown by `fn`
 * rolls the transaction back and is rethrown unchanged.
 */
export async function with_transaction<T>(fn: (client: DbClient) => Promise<T>): Promise<T> {
  let client: DbClient;
  try {
    client = await get_pool().connect();
  } catch (error) {
    throw to_storage_error(error);
  }

  try {
    await client_query(client, 'BEGIN');
    const result = await fn(client);
    await client_query(client, 'COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollback_error) {
      logger.error('transaction rollback failed', { error: error_message(rollback_error) });
    }
    throw error;
  } finally {
    client.release();
  }
}
