/**
 * Apply pending SQL migrations and exit.
 *
 * Usage: `npm run migrate`. Reads from `MIGRATIONS_DIR` when set,
 * otherwise from `src/migrations` under the working directory.
 *
 * @module db/migrate
 */

import path from 'node:path';
import { createLogger, parseLogLevel } from '../logging/logger.js';
import { closePool } from '../utils/db.js';
import { runMigrations } from '../utils/migrationRunner.js';

const logger = createLogger({
  level: parseLogLevel(process.env['LOG_LEVEL']),
  context: { component: 'migrate' },
});

const migrationsDir = process.env['MIGRATIONS_DIR'] ?? path.resolve('src', 'migrations');

try {
  const applied = await runMigrations({ migrationsDir, logger });
  logger.info('Migrations applied', { count: applied.length, files: applied });
} catch (err) {
  logger.fatal('Migration failed', err, { migrationsDir });
  process.exitCode = 1;
} finally {
  await closePool();
}
