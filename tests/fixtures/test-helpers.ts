import type { FastifyInstance } from 'fastify';
import { createDatabaseConnection } from '../../src/db/factory.js';
import { closeDatabase } from '../../src/db/connection.js';
import { createRepositories } from '../../src/db/repositories/index.js';
import { wireContext } from '../../src/core/factory/context-wiring.js';
import { createServer } from '../../src/restapi/server.js';
import type { AppContext } from '../../src/core/context.js';
import type { DatabaseDeps } from '../../src/core/types.js';
import type { Repositories } from '../../src/core/interfaces/repositories.js';
import type { ContentGenerator } from '../../src/services/content-generator.service.js';
import { buildConfig, type Config } from '../../src/config/index.js';
import { cleanupDbFiles, ensureDataDirectory } from './db-utils.js';

export interface TestDb extends DatabaseDeps {
  path: string;
}

/**
 * Config pointing at a test database file
 */
export function createTestConfig(dbPath: string, overrides: Partial<Config> = {}): Config {
  const base = buildConfig();
  return {
    ...base,
    ...overrides,
    database: { ...base.database, skipInit: false, path: dbPath, ...overrides.database },
  };
}

/**
 * Create a fresh, fully migrated database at `dbPath`.
 * Any file left over from a previous run is removed first.
 */
export function setupTestDb(dbPath: string): TestDb {
  ensureDataDirectory();
  cleanupDbFiles(dbPath);

  const { db, sqlite } = createDatabaseConnection(createTestConfig(dbPath));
  return { db, sqlite, path: dbPath };
}

/**
 * Close the test database and delete its files
 */
export function cleanupTestDb(testDb: TestDb): void {
  closeDatabase(testDb.sqlite);
  cleanupDbFiles(testDb.path);
}

/**
 * Create repositories for unit tests that don't need a full AppContext.
 */
export function createTestRepositories(testDb: TestDb): Repositories {
  return createRepositories({ db: testDb.db, sqlite: testDb.sqlite });
}

/**
 * Wire an AppContext over an existing test database
 */
export function createTestContext(testDb: TestDb, generator?: ContentGenerator): AppContext {
  return wireContext({
    config: createTestConfig(testDb.path),
    db: testDb.db,
    sqlite: testDb.sqlite,
    generator,
  });
}

/**
 * Build a Fastify instance for `app.inject()` tests
 */
export async function createTestServer(testDb: TestDb): Promise<FastifyInstance> {
  return createServer(createTestContext(testDb));
}

/**
 * Remove every row, keeping the schema. Cards go first for the foreign key.
 */
export function clearTables(testDb: TestDb): void {
  testDb.sqlite.exec('DELETE FROM cards; DELETE FROM topics;');
}
