/**
 * Registry-driven config building.
 *
 * Reads every registered option from the environment using its parser.
 * The resulting raw object is validated by the typed schema in config/index.ts.
 */

import { z } from 'zod';
import type { ConfigRegistry, ConfigSectionMeta, ConfigOptionMeta, ParserType } from './types.js';
import {
  parseBoolean,
  parseInt_,
  parsePort,
  parseString,
  parseStringArray,
  resolveDataPath,
} from './parsers.js';

// =============================================================================
// VALIDATION HELPERS
// =============================================================================

/**
 * Format Zod validation errors into human-readable messages
 */
export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((err) => {
    const path = err.path.map(String).join('.');
    return `${path}: ${err.message}`;
  });
}

/**
 * Get all environment variables from the registry
 */
export interface EnvVarInfo {
  envKey: string;
  description: string;
  defaultValue: unknown;
  section: string;
}

export function getAllEnvVars(registry: ConfigRegistry): EnvVarInfo[] {
  const envVars: EnvVarInfo[] = [];

  for (const [sectionKey, section] of Object.entries(registry.sections)) {
    for (const option of Object.values(section.options)) {
      envVars.push({
        envKey: option.envKey,
        description: option.description,
        defaultValue: option.defaultValue,
        section: sectionKey,
      });
    }
  }

  return envVars;
}

// =============================================================================
// CONFIG BUILDING FROM REGISTRY
// =============================================================================

/**
 * Infer parser type from Zod schema when not explicitly specified
 */
export function inferParserFromSchema(schema: z.ZodTypeAny): ParserType {
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodNumber) return 'int';
  if (schema instanceof z.ZodArray) return 'stringArray';
  if (schema instanceof z.ZodOptional) return inferParserFromSchema(schema.unwrap());
  return 'string';
}

function numericDefault(option: ConfigOptionMeta): number {
  return typeof option.defaultValue === 'number' ? option.defaultValue : 0;
}

/**
 * Parse an environment variable value using the option's parser
 */
export function parseEnvValue(option: ConfigOptionMeta, envValue: string | undefined): unknown {
  const parserType: ParserType = option.parse ?? inferParserFromSchema(option.schema);

  // Path defaults are resolved too, so they land under the data dir
  if (parserType === 'path') {
    return resolveDataPath(envValue, String(option.defaultValue));
  }

  if (envValue === undefined || envValue === '') {
    return option.defaultValue;
  }

  switch (parserType) {
    case 'boolean':
      return parseBoolean(envValue, option.defaultValue === true);

    case 'int':
      return parseInt_(envValue, numericDefault(option));

    case 'port':
      return parsePort(envValue, numericDefault(option));

    case 'stringArray':
      return parseStringArray(envValue, []);

    case 'string':
      if (option.allowedValues) {
        return parseString(envValue, String(option.defaultValue), option.allowedValues);
      }
      return envValue;
  }
}

/**
 * Build a config section from registry metadata
 */
function buildSectionFromRegistry(section: ConfigSectionMeta): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, option] of Object.entries(section.options)) {
    result[key] = parseEnvValue(option, option.envKey ? process.env[option.envKey] : undefined);
  }

  return result;
}

/**
 * Build the raw config object from registry metadata.
 * This is the single source of truth - no manual env var reading needed.
 */
export function buildConfigFromRegistry(registry: ConfigRegistry): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, section] of Object.entries(registry.sections)) {
    result[key] = buildSectionFromRegistry(section);
  }

  return result;
}
