/**
 * Unit tests for the migration runner utility.
 *
 * Tests migration file discovery and ordering without
 * requiring a live database connection.
 */

import { describe, it, expect, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  getMigrationFiles,
  runMigrations,
  type MigrationClient,
  type MigrationPool,
} from './migrationRunner.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const MIGRATIONS_DIR = path.resolve(__dirname, '..', 'migrations');

function tempMigrations(files: Record<string, string>): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'migrations-'));
  for (const [name, sql] of Object.entries(files)) {
    fs.writeFileSync(path.join(dir, name), sql);
  }
  return dir;
}

/** Pool whose single client records every statement and reports `applied` as done. */
function recordingPool(applied: string[], failOn?: string) {
  const statements: string[] = [];
  const release = vi.fn();
  const client: MigrationClient = {
    async query(text: string, params?: unknown[]) {
      statements.push(params ? `${text} ${JSON.stringify(params)}` : text);
      if (failOn && text.includes(failOn)) throw new Error('syntax error');
      if (text.startsWith('SELECT filename')) {
        return { rows: applied.map((filename) => ({ filename })) };
      }
      return { rows: [] };
    },
    release,
  };
  const pool: MigrationPool = { connect: async () => client };
  return { pool, statements, release };
}

describe('migrationRunner', () => {
  describe('getMigrationFiles', () => {
    it('should find the challenge document migration', () => {
      expect(getMigrationFiles(MIGRATIONS_DIR)).toEqual(['001_create_challenge_documents.sql']);
    });

    it('should return files in sorted order and skip non-SQL files', () => {
      const dir = tempMigrations({
        '002_b.sql': 'SELECT 2;',
        'README.md': '# notes',
        '001_a.sql': 'SELECT 1;',
      });
      expect(getMigrationFiles(dir)).toEqual(['001_a.sql', '002_b.sql']);
    });

    it('should return empty array for non-existent directory', () => {
      const files = getMigrationFiles('/non/existent/path');
      expect(files).toEqual([]);
    });
  });

  describe('runMigrations', () => {
    it('applies only pending files, each in its own transaction', async () => {
      const dir = tempMigrations({ '001_a.sql': 'SELECT 1;', '002_b.sql': 'SELECT 2;' });
      const { pool, statements, release } = recordingPool(['001_a.sql']);

      const applied = await runMigrations({ migrationsDir: dir, pool });

      expect(applied).toEqual(['002_b.sql']);
      expect(statements[0]).toBe('SELECT pg_advisory_lock($1) [727001]');
      expect(statements.slice(3)).toEqual([
        'BEGIN',
        'SELECT 2;',
        'INSERT INTO schema_migrations (filename) VALUES ($1) ["002_b.sql"]',
        'COMMIT',
        'SELECT pg_advisory_unlock($1) [727001]',
      ]);
      expect(release).toHaveBeenCalledOnce();
    });

    it('rolls back and names the failing file', async () => {
      const dir = tempMigrations({ '001_bad.sql': 'CREATE TABLEE x;' });
      const { pool, statements, release } = recordingPool([], 'TABLEE');

      await expect(runMigrations({ migrationsDir: dir, pool })).rejects.toThrow(
        'Migration 001_bad.sql failed: syntax error',
      );
      expect(statements.slice(-2)).toEqual(['ROLLBACK', 'SELECT pg_advisory_unlock($1) [727001]']);
      expect(release).toHaveBeenCalledOnce();
    });
  });
});
