/**
 * The process-wide `pg` pool used by the PostgreSQL document stores and
 * the migration runner. Opened from the environment on first use.
 *
 * @module utils/db
 */

import pg from 'pg';
import { getDbConfig, type DbConfig } from '../config.js';

let shared: pg.Pool | null = null;

export function openPool(config: DbConfig): pg.Pool {
  return new pg.Pool({
    connectionString: config.connectionString ?? undefined,
    max: config.maxConnections,
    statement_timeout: config.statementTimeoutMs,
    ssl: config.ssl,
  });
}

export function getPool(): pg.Pool {
  if (!shared) shared = openPool(getDbConfig());
  return shared;
}

export async function query<T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params?: unknown[],
): Promise<pg.QueryResult<T>> {
  return getPool().query<T>(text, params);
}

/** Drain the shared pool; the next {@link getPool} opens a fresh one. */
export async function closePool(): Promise<void> {
  const pool = shared;
  shared = null;
  if (pool) await pool.end();
}
