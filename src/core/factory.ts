/**
 * Application Context Factory
 *
 * Opens the database described by the config and wires repositories and
 * services around it.
 */

import type { AppContext } from './context.js';
import type { Config } from '../config/index.js';
import { createComponentLogger } from '../utils/logger.js';
import { createDatabaseConnection } from '../db/factory.js';
import { closeDatabase } from '../db/connection.js';
import { wireContext } from './factory/context-wiring.js';

/**
 * Create a new Application Context
 *
 * @returns Fully initialized AppContext with migrations applied
 */
export function createAppContext(config: Config): AppContext {
  const logger = createComponentLogger('app');

  const { db, sqlite } = createDatabaseConnection(config);
  logger.info({ path: config.database.path }, 'Using SQLite backend');

  return wireContext({ config, db, sqlite, logger });
}

/**
 * Release the database connection held by an AppContext.
 */
export function shutdownAppContext(context: AppContext): void {
  closeDatabase(context.sqlite);
  context.logger.info('AppContext shutdown complete');
}
