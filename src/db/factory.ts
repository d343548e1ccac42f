import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import * as schema from './schema.js';
import { initializeDatabase } from './init.js';
import { createComponentLogger } from '../utils/logger.js';
import { MEMORY_DB_PATH } from '../config/registry/parsers.js';
import { createDatabaseError, ErrorCodes } from '../core/errors.js';
import type { Config } from '../config/index.js';
import type { DatabaseDeps } from '../core/types.js';

const logger = createComponentLogger('db-factory');

/**
 * Open the SQLite database named by `configuration.database.path`, apply
 * pending migrations and wrap it with drizzle.
 */
export function createDatabaseConnection(configuration: Pick<Config, 'database'>): DatabaseDeps {
  const { path: dbPath, busyTimeoutMs, skipInit, verbose } = configuration.database;

  if (dbPath !== MEMORY_DB_PATH) {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  let sqlite: Database.Database;
  try {
    sqlite = new Database(dbPath, { timeout: busyTimeoutMs });
  } catch (error) {
    throw createDatabaseError('open', error, ErrorCodes.CONNECTION_ERROR);
  }

  // WAL lets readers proceed while another worker writes
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma(`busy_timeout = ${busyTimeoutMs}`);

  if (!skipInit) {
    const result = initializeDatabase(sqlite, { verbose });

    if (!result.success) {
      sqlite.close();
      throw createDatabaseError(
        'migration',
        new Error(result.errors.join(', ')),
        ErrorCodes.MIGRATION_ERROR
      );
    }

    if (result.migrationsApplied.length > 0) {
      logger.info(
        { migrations: result.migrationsApplied, count: result.migrationsApplied.length },
        'Applied migrations'
      );
    }
  }

  logger.debug({ path: dbPath }, 'Database connection opened');

  return { db: drizzle(sqlite, { schema }), sqlite };
}
