/**
 * CLI Main Program
 *
 * Commander.js program setup for the cardforge CLI.
 */

import { Command, Option } from 'commander';
import type { Config } from '../config/index.js';
import { addServeCommand } from './commands/serve.js';
import { addDbCommands } from './commands/db.js';
import { addConfigCommands } from './commands/config.js';
import { OUTPUT_FORMATS } from './utils/output.js';
import { VERSION } from '../version.js';

/**
 * Create the Commander.js program
 */
export function createProgram(configuration: Config): Command {
  const program = new Command();

  program
    .name('cardforge')
    .description('Topics and learning cards over HTTP, stored in SQLite')
    .version(VERSION)
    .addOption(
      new Option('--format <format>', 'Output format').choices(OUTPUT_FORMATS).default('json')
    );

  addServeCommand(program, configuration);
  addDbCommands(program, configuration);
  addConfigCommands(program);

  return program;
}

/**
 * Run the CLI program
 */
export async function runCli(argv: string[], configuration: Config): Promise<void> {
  const program = createProgram(configuration);
  await program.parseAsync(argv, { from: 'user' });
}
