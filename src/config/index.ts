/**
 * Centralized configuration module for Cardforge
 *
 * Configuration is built from the registry at src/config/registry/.
 * Each option declares envKey, default, description, schema, and parser.
 *
 * To add a new config option:
 *   1. Find or create the section in src/config/registry/sections/
 *   2. Add the option with envKey, defaultValue, description, schema
 *   3. Add the option's schema to configSchema below
 *
 * Usage:
 *   import { config } from './config/index.js';
 *   console.log(config.database.path);
 */

import { z } from 'zod';
import {
  configRegistry,
  databaseSection,
  restSection,
  loggingSection,
  runtimeSection,
  buildConfigFromRegistry,
  formatZodErrors,
} from './registry/index.js';
import { createValidationError } from '../core/errors.js';

// =============================================================================
// CONFIG SCHEMA
// =============================================================================

const database = databaseSection.options;
const rest = restSection.options;
const logging = loggingSection.options;
const runtime = runtimeSection.options;

export const configSchema = z.object({
  database: z.object({
    path: database.path.schema,
    skipInit: database.skipInit.schema,
    verbose: database.verbose.schema,
    busyTimeoutMs: database.busyTimeoutMs.schema,
  }),
  rest: z.object({
    host: rest.host.schema,
    port: rest.port.schema,
    bodyLimit: rest.bodyLimit.schema,
    corsOrigins: rest.corsOrigins.schema,
  }),
  logging: z.object({
    level: logging.level.schema,
    debug: logging.debug.schema,
  }),
  runtime: z.object({
    nodeEnv: runtime.nodeEnv.schema,
  }),
});

export type Config = z.infer<typeof configSchema>;

// =============================================================================
// BUILD CONFIGURATION
// =============================================================================

/**
 * Build configuration from registry metadata and the current environment.
 * Returns a fresh object on every call.
 */
export function buildConfig(): Config {
  const result = configSchema.safeParse(buildConfigFromRegistry(configRegistry));

  if (!result.success) {
    const errors = formatZodErrors(result.error);
    throw createValidationError(
      'config',
      `Configuration validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}`
    );
  }

  return result.data;
}

// Create the singleton config instance
export const config: Config = buildConfig();
