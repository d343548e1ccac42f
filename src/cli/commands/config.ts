/**
 * Config CLI Commands
 */

import type { Command } from 'commander';
import { configRegistry, getAllEnvVars } from '../../config/registry/index.js';
import { formatOutput, type OutputFormat } from '../utils/output.js';

type GlobalOptions = {
  format: OutputFormat;
};

export interface EnvVarReport {
  envKey: string;
  section: string;
  description: string;
  defaultValue: unknown;
  /** Raw value from the environment, absent when unset */
  value?: string;
}

/**
 * Every recognised environment variable with its current raw value.
 */
export function buildEnvReport(env: NodeJS.ProcessEnv = process.env): EnvVarReport[] {
  return getAllEnvVars(configRegistry).map(({ envKey, section, description, defaultValue }) => {
    const value = env[envKey];
    return {
      envKey,
      section,
      description,
      defaultValue,
      ...(value !== undefined ? { value } : {}),
    };
  });
}

export function addConfigCommands(program: Command): void {
  program
    .command('config:env')
    .description('List recognised environment variables and their values')
    .action((_options: unknown, cmd: Command) => {
      const { format } = cmd.optsWithGlobals<GlobalOptions>();
      const report = buildEnvReport();

      // Table mode shows one line per variable: the set value, else the default
      const output =
        format === 'table'
          ? Object.fromEntries(report.map((v) => [v.envKey, v.value ?? v.defaultValue]))
          : report;
      console.log(formatOutput(output, format));
    });
}
