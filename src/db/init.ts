/**
 * Schema migrations
 *
 * Applies the SQL files under db/migrations/ in name order and records each
 * one in `_migrations`, so startup is idempotent and concurrent workers that
 * share a database file converge on the same schema.
 */

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import type Database from 'better-sqlite3';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('init');

const moduleDir = dirname(fileURLToPath(import.meta.url));

export interface InitResult {
  success: boolean;
  alreadyInitialized: boolean;
  migrationsApplied: string[];
  errors: string[];
}

export interface MigrationStatus {
  initialized: boolean;
  appliedMigrations: string[];
  pendingMigrations: string[];
  totalMigrations: number;
}

interface MigrationFile {
  name: string;
  path: string;
}

function ensureMigrationTable(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      applied_at TEXT DEFAULT CURRENT_TIMESTAMP NOT NULL
    )
  `);
}

function getAppliedMigrations(sqlite: Database.Database): string[] {
  ensureMigrationTable(sqlite);
  return sqlite
    .prepare<[], { name: string }>('SELECT name FROM _migrations ORDER BY id')
    .all()
    .map((row) => row.name);
}

/**
 * Locate the migrations directory. Compiled code in dist/db/ reads the SQL
 * files from src/db/migrations/, which tsc does not copy.
 */
function getMigrationFiles(): MigrationFile[] {
  const candidates = [
    resolve(moduleDir, 'migrations'),
    resolve(moduleDir, '../../src/db/migrations'),
  ];
  const migrationsDir = candidates.find((path) => existsSync(path));
  if (!migrationsDir) {
    return [];
  }

  return readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort()
    .map((file) => ({ name: file, path: resolve(migrationsDir, file) }));
}

function hasUserTables(sqlite: Database.Database): boolean {
  const row = sqlite
    .prepare<[], { count: number }>(
      `SELECT COUNT(*) AS count FROM sqlite_master
       WHERE type = 'table' AND name NOT LIKE 'sqlite_%' AND name != '_migrations'`
    )
    .get();
  return (row?.count ?? 0) > 0;
}

/**
 * Split a drizzle-kit style migration into statements, dropping leading
 * comment lines from each.
 */
export function splitStatements(sql: string): string[] {
  return sql
    .split(/-->\s*statement-breakpoint/i)
    .map((chunk) => {
      const lines = chunk.split('\n');
      const firstSql = lines.findIndex((line) => {
        const trimmed = line.trim();
        return trimmed !== '' && !trimmed.startsWith('--');
      });
      return firstSql === -1 ? '' : lines.slice(firstSql).join('\n').trim();
    })
    .filter((statement) => statement !== '');
}

function applyMigration(sqlite: Database.Database, migration: MigrationFile): void {
  const statements = splitStatements(readFileSync(migration.path, 'utf-8'));
  for (const statement of statements) {
    sqlite.exec(statement);
  }
  sqlite.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
}

/**
 * Apply all pending migrations in one transaction.
 *
 * Safe to call on every start. Another process applying the same migrations
 * concurrently waits on the write lock, then finds nothing pending.
 */
export function initializeDatabase(
  sqlite: Database.Database,
  options: { verbose?: boolean } = {}
): InitResult {
  const result: InitResult = {
    success: false,
    alreadyInitialized: false,
    migrationsApplied: [],
    errors: [],
  };

  try {
    const migrationFiles = getMigrationFiles();
    if (migrationFiles.length === 0) {
      result.errors.push('No migration files found in src/db/migrations/');
      return result;
    }

    // IMMEDIATE takes the write lock up front so the pending list can't go stale
    sqlite.transaction(() => {
      const applied = new Set(getAppliedMigrations(sqlite));
      result.alreadyInitialized = hasUserTables(sqlite);

      for (const migration of migrationFiles) {
        if (applied.has(migration.name)) continue;
        if (options.verbose) {
          logger.info({ migration: migration.name }, 'Applying migration');
        }
        applyMigration(sqlite, migration);
        result.migrationsApplied.push(migration.name);
      }
    }).immediate();

    result.success = true;
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    result.errors.push(message);
    logger.error({ error: message }, 'Database initialization failed');
  }

  return result;
}

export function getMigrationStatus(sqlite: Database.Database): MigrationStatus {
  const appliedMigrations = getAppliedMigrations(sqlite);
  const allMigrations = getMigrationFiles().map((m) => m.name);

  return {
    initialized: hasUserTables(sqlite),
    appliedMigrations,
    pendingMigrations: allMigrations.filter((m) => !appliedMigrations.includes(m)),
    totalMigrations: allMigrations.length,
  };
}
