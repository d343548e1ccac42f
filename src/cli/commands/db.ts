/**
 * Database CLI Commands
 *
 * Apply and inspect schema migrations.
 */

import type { Command } from 'commander';
import type { Config } from '../../config/index.js';
import { initializeDatabase, getMigrationStatus } from '../../db/init.js';
import { withDatabase } from '../utils/context.js';
import { formatOutput, type OutputFormat } from '../utils/output.js';
import { handleCliError } from '../utils/errors.js';
import { createDatabaseError, ErrorCodes } from '../../core/errors.js';

type GlobalOptions = {
  format: OutputFormat;
};

export function addDbCommands(program: Command, configuration: Config): void {
  program
    .command('db:init')
    .description('Apply pending schema migrations')
    .option('--verbose', 'Log each applied migration', false)
    .action(async (_options: unknown, cmd: Command) => {
      const { verbose } = cmd.opts<{ verbose: boolean }>();
      const { format } = cmd.optsWithGlobals<GlobalOptions>();
      try {
        const result = await withDatabase(configuration, ({ sqlite }) =>
          initializeDatabase(sqlite, { verbose })
        );
        console.log(formatOutput(result, format));
        if (!result.success) {
          throw createDatabaseError(
            'migration',
            new Error(result.errors.join(', ')),
            ErrorCodes.MIGRATION_ERROR
          );
        }
      } catch (error) {
        handleCliError(error);
      }
    });

  program
    .command('db:status')
    .description('Show applied and pending migrations')
    .action(async (_options: unknown, cmd: Command) => {
      const { format } = cmd.optsWithGlobals<GlobalOptions>();
      try {
        const status = await withDatabase(configuration, ({ sqlite }) => getMigrationStatus(sqlite));
        console.log(formatOutput({ path: configuration.database.path, ...status }, format));
      } catch (error) {
        handleCliError(error);
      }
    });
}
