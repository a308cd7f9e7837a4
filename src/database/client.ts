/**
 * PostgreSQL database client with connection pooling
 * Provides plain and transactional query execution with timeout support
 */

import pg from 'pg';
import { getConfig } from '../config.js';

const { Pool } = pg;

let pool: pg.Pool | null = null;

/**
 * Anything that can run a parameterised statement: a pool, a checked-out
 * client inside a transaction, or a test stub.
 */
export interface Queryable {
  query<T extends pg.QueryResultRow = pg.QueryResultRow>(
    sql: string,
    params?: unknown[]
  ): Promise<{ rows: T[]; rowCount: number | null }>;
}

/**
 * Get or create the database connection pool
 */
export function getPool(): pg.Pool {
  if (!pool) {
    const config = getConfig();
    pool = new Pool({
      connectionString: config.databaseUrl,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
      statement_timeout: config.queryTimeoutMs,
    });

    pool.on('error', (err) => {
      console.error('Unexpected error on idle client', err);
    });
  }
  return pool;
}

/**
 * Close the database connection pool
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

function wrapClient(client: pg.PoolClient): Queryable {
  return {
    async query<T extends pg.QueryResultRow = pg.QueryResultRow>(sql: string, params?: unknown[]) {
      const result = await client.query<T>(sql, params);
      return { rows: result.rows, rowCount: result.rowCount };
    },
  };
}

/**
 * Execute a statement on a pooled connection
 */
export async function rawQuery<T extends pg.QueryResultRow = pg.QueryResultRow>(
  sql: string,
  params?: unknown[]
): Promise<pg.QueryResult<T>> {
  const client = await getPool().connect();

  try {
    return await client.query<T>(sql, params);
  } finally {
    client.release();
  }
}

/**
 * Pool-backed Queryable, one connection per statement
 */
export const poolQueryable: Queryable = {
  async query<T extends pg.QueryResultRow = pg.QueryResultRow>(sql: string, params?: unknown[]) {
    const result = await rawQuery<T>(sql, params);
    return { rows: result.rows, rowCount: result.rowCount };
  },
};

/**
 * Run work inside BEGIN/COMMIT on a single connection; ROLLBACK on failure
 */
export async function withTransaction<T>(work: (client: Queryable) => Promise<T>): Promise<T> {
  const client = await getPool().connect();

  try {
    await client.query('BEGIN');
    try {
      const result = await work(wrapClient(client));
      await client.query('COMMIT');
      return result;
    } catch (workError) {
      await client.query('ROLLBACK');
      throw workError;
    }
  } finally {
    client.release();
  }
}

/**
 * Test database connectivity
 */
export async function testConnection(): Promise<boolean> {
  try {
    const result = await rawQuery<{ connected: number }>('SELECT 1 as connected');
    return result.rows[0]?.connected === 1;
  } catch (error) {
    console.error('Connection test failed:', error);
    return false;
  }
}
