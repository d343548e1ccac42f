/**
 * Core/shared types used across transports (REST, CLI).
 *
 * Keep this file free of any transport-specific concerns.
 */

import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type Database from 'better-sqlite3';
import type * as schema from '../db/schema.js';

/**
 * Type-safe Drizzle database with full schema type information.
 */
export type AppDb = BetterSQLite3Database<typeof schema>;

/**
 * Database dependencies for repository factory functions.
 * Passed to repository factories instead of a module-level handle.
 */
export interface DatabaseDeps {
  /** Drizzle ORM database instance with schema types */
  db: AppDb;
  /** Raw better-sqlite3 database instance for transactions and raw SQL */
  sqlite: Database.Database;
}
