/**
 * Config Registry Type Definitions
 *
 * Metadata-driven configuration with Zod validation.
 * Each config option declares envKey, default, description, schema, and parser.
 */

import type { z } from 'zod';

// =============================================================================
// PARSER TYPES
// =============================================================================

/**
 * Built-in parser types for common env var conversions
 */
export type ParserType =
  | 'string' // Direct string value
  | 'boolean' // '1', 'true' -> true
  | 'int' // parseInt
  | 'port' // parseInt with 1-65535 validation
  | 'path' // Resolve relative to data dir
  | 'stringArray'; // CSV parsing

// =============================================================================
// CONFIG OPTION TYPES
// =============================================================================

/**
 * Metadata for a single configuration option
 */
export interface ConfigOptionMeta<T = unknown> {
  /** Environment variable key (e.g., 'CARDFORGE_DB_PATH') */
  envKey: string;

  /** Default value when env var is not set */
  defaultValue: T;

  description: string;

  /** Zod schema for validation */
  schema: z.ZodType<T>;

  /** Parser type; inferred from the schema when omitted */
  parse?: ParserType;

  /** Allowed values for string enums (used with 'string' parser) */
  allowedValues?: readonly string[];
}

// =============================================================================
// CONFIG SECTION TYPES
// =============================================================================

/**
 * Metadata for a configuration section (group of related options)
 */
export interface ConfigSectionMeta {
  /** Section name (e.g., 'database', 'rest') */
  name: string;

  description: string;

  /** Options in this section, keyed by config property name */
  options: Record<string, ConfigOptionMeta>;
}

// =============================================================================
// CONFIG REGISTRY TYPE
// =============================================================================

/**
 * Complete registry of all configuration options
 */
export interface ConfigRegistry {
  sections: Record<string, ConfigSectionMeta>;
}
