/**
 * Database access for one-shot CLI commands
 */

import type { Config } from '../../config/index.js';
import type { DatabaseDeps } from '../../core/types.js';
import { createDatabaseConnection } from '../../db/factory.js';
import { closeDatabase } from '../../db/connection.js';

/**
 * Open the configured database without applying migrations, run `fn`,
 * then close the connection whatever the outcome.
 */
export async function withDatabase<T>(
  configuration: Config,
  fn: (deps: DatabaseDeps) => T | Promise<T>
): Promise<T> {
  const deps = createDatabaseConnection({
    database: { ...configuration.database, skipInit: true },
  });
  try {
    return await fn(deps);
  } finally {
    closeDatabase(deps.sqlite);
  }
}
