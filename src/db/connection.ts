/**
 * Transaction helpers for the SQLite store.
 *
 * The connection itself is created by db/factory.ts and carried by the
 * AppContext; nothing here holds a global handle.
 */

import type Database from 'better-sqlite3';

/**
 * Run `fn` inside a better-sqlite3 transaction.
 * Commits when `fn` returns, rolls back and rethrows when it throws.
 */
export function transactionWithDb<T>(sqlite: Database.Database, fn: () => T): T {
  return sqlite.transaction(fn)();
}

/**
 * Close a connection. Closing twice is a no-op.
 */
export function closeDatabase(sqlite: Database.Database): void {
  if (sqlite.open) {
    sqlite.close();
  }
}
