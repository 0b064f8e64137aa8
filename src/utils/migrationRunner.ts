/**
 * Runner for the numbered SQL files that create the document tables.
 *
 * Applied files are recorded in `schema_migrations`. A session-level
 * advisory lock keeps two instances starting at once from applying the
 * same file twice.
 *
 * @module utils/migrationRunner
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { silentLogger, type Logger } from '../logging/logger.js';
import { getPool } from './db.js';

/** `src/migrations`, or `dist/migrations` beside the compiled runner. */
const DEFAULT_MIGRATIONS_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '..',
  'migrations',
);

/** Arbitrary key shared by every runner of this schema. */
const MIGRATION_LOCK_KEY = 727_001;

/** The part of a `pg` pool client the runner uses. */
export interface MigrationClient {
  query(text: string, params?: unknown[]): Promise<{ rows: Array<Record<string, unknown>> }>;
  release(): void;
}

export interface MigrationPool {
  connect(): Promise<MigrationClient>;
}

export interface MigrationOptions {
  migrationsDir?: string;
  pool?: MigrationPool;
  logger?: Logger;
}

/** `.sql` files in `migrationsDir`, in name order; empty when the directory is missing. */
export function getMigrationFiles(migrationsDir: string = DEFAULT_MIGRATIONS_DIR): string[] {
  if (!fs.existsSync(migrationsDir)) return [];
  return fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql'))
    .sort();
}

async function appliedFiles(client: MigrationClient): Promise<Set<string>> {
  await client.query(
    `CREATE TABLE IF NOT EXISTS schema_migrations (
       filename TEXT PRIMARY KEY,
       applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
     )`,
  );
  const result = await client.query('SELECT filename FROM schema_migrations');
  return new Set(result.rows.map((row) => String(row['filename'])));
}

async function applyFile(client: MigrationClient, dir: string, file: string): Promise<void> {
  const sql = fs.readFileSync(path.join(dir, file), 'utf-8');
  await client.query('BEGIN');
  try {
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (filename) VALUES ($1)', [file]);
    await client.query('COMMIT');
  } catch (err) {
    await client.query('ROLLBACK');
    throw new Error(`Migration ${file} failed: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Apply every pending file, each in its own transaction. Stops at the
 * first failure, leaving the earlier files applied.
 *
 * @returns Filenames applied by this run
 */
export async function runMigrations(options: MigrationOptions = {}): Promise<string[]> {
  const dir = options.migrationsDir ?? DEFAULT_MIGRATIONS_DIR;
  const logger = (options.logger ?? silentLogger).child({ component: 'migrations' });
  const pool: MigrationPool = options.pool ?? getPool();
  const client = await pool.connect();
  const applied: string[] = [];

  try {
    await client.query('SELECT pg_advisory_lock($1)', [MIGRATION_LOCK_KEY]);
    try {
      const done = await appliedFiles(client);
      for (const file of getMigrationFiles(dir)) {
        if (done.has(file)) continue;
        await applyFile(client, dir, file);
        logger.info('Applied migration', { file });
        applied.push(file);
      }
    } finally {
      await client.query('SELECT pg_advisory_unlock($1)', [MIGRATION_LOCK_KEY]);
    }
  } finally {
    client.release();
  }

  return applied;
}
