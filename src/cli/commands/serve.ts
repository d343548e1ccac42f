/**
 * Serve CLI Command
 *
 * Starts the HTTP API. This is the default command.
 */

import { resolve } from 'node:path';
import { InvalidArgumentError, type Command } from 'commander';
import type { Config } from '../../config/index.js';
import { runServer } from '../../restapi/server.js';
import { handleCliError } from '../utils/errors.js';

type ServeOptions = {
  host?: string;
  port?: number;
  db?: string;
};

export function parsePortOption(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

/**
 * Apply command-line overrides on top of the environment config
 */
export function applyServeOptions(configuration: Config, options: ServeOptions): Config {
  return {
    ...configuration,
    rest: {
      ...configuration.rest,
      host: options.host ?? configuration.rest.host,
      port: options.port ?? configuration.rest.port,
    },
    database: {
      ...configuration.database,
      path: options.db === undefined ? configuration.database.path : resolve(options.db),
    },
  };
}

export function addServeCommand(program: Command, configuration: Config): void {
  program
    .command('serve', { isDefault: true })
    .description('Start the HTTP API')
    .option('--host <host>', 'Interface to bind')
    .option('--port <port>', 'Port to listen on', parsePortOption)
    .option('--db <path>', 'SQLite database file')
    .action(async (_options: unknown, cmd: Command) => {
      try {
        await runServer(applyServeOptions(configuration, cmd.opts<ServeOptions>()));
      } catch (error) {
        handleCliError(error);
      }
    });
}
