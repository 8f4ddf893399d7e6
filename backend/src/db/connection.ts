/**
 * @fileoverview PostgreSQL connection module, used when the geocode cache is
 * stored in the database instead of a JSON file.
 */

import pg from 'pg';
import type { Pool, QueryResultRow } from 'pg';

let pool: Pool | null = null;

/**
 * Connection settings taken from the validated configuration.
 */
export interface PoolSettings {
  connectionString: string;
  ssl: boolean;
  max: number;
}

/**
 * Creates the connection pool. Calling it again returns the existing pool.
 *
 * @example
 * initPool({ connectionString: process.env.DATABASE_URL, ssl: false, max: 5 });
 */
export function initPool(settings: PoolSettings): Pool {
  if (pool) return pool;

  pool = new pg.Pool({
    connectionString: settings.connectionString,
    ssl: settings.ssl ? { rejectUnauthorized: false } : undefined,
    max: settings.max,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });
  return pool;
}

function getPool(): Pool {
  if (!pool) {
    throw new Error('Database pool not initialised. Call initPool() first.');
  }
  return pool;
}

/**
 * Executes a SQL query and returns all matching rows.
 *
 * @template T - The expected type of each row in the result set
 * @param {string} text - The SQL query string with optional $1, $2, etc. placeholders
 * @param {unknown[]} [params] - Optional array of parameter values for the query
 * @returns {Promise<T[]>} A promise that resolves to an array of rows
 *
 * @example
 * const rows = await query<CacheRow>('SELECT district, lat, lon FROM geocode_cache');
 */
export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<T[]> {
  const result = await getPool().query<T>(text, params);
  return result.rows;
}

/**
 * Executes a SQL query and returns the first matching row or null.
 */
export async function queryOne<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<T | null> {
  const rows = await query<T>(text, params);
  return rows[0] ?? null;
}

/**
 * Checks if the database connection is healthy.
 *
 * @returns {Promise<boolean>} true if a trivial query succeeds
 */
export async function healthCheck(): Promise<boolean> {
  if (!pool) return false;
  try {
    await pool.query('SELECT 1');
    return true;
  } catch {
    return false;
  }
}

/**
 * Closes the pool, if one was created.
 */
export async function closePool(): Promise<void> {
  if (!pool) return;
  const current = pool;
  pool = null;
  await current.end();
}
