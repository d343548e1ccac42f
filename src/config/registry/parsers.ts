/**
 * Config Parser Functions
 *
 * Type-safe parsers for environment variable values.
 * These handle string-to-type conversion with defaults and validation.
 */

import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

// =============================================================================
// PROJECT ROOT
// =============================================================================

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
export const projectRoot = resolve(__dirname, '../../..');

/** SQLite's in-memory database name; never resolved against the data dir */
export const MEMORY_DB_PATH = ':memory:';

// =============================================================================
// PRIMITIVE PARSERS
// =============================================================================

/**
 * Parse a string env var as boolean.
 * Accepts '1', 'true' (case-insensitive) as true.
 */
export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return value === '1' || value.toLowerCase() === 'true';
}

/**
 * Parse a string env var as integer.
 */
export function parseInt_(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a string env var as a valid port number (1-65535).
 */
export function parsePort(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0 || parsed >= 65536) {
    return fallback;
  }
  return parsed;
}

/**
 * Parse a string env var with validation against allowed values.
 */
export function parseString(
  value: string | undefined,
  defaultValue: string,
  allowedValues?: readonly string[]
): string {
  if (value === undefined || value === '') return defaultValue;
  const lower = value.toLowerCase();
  if (allowedValues && !allowedValues.includes(lower)) {
    return defaultValue;
  }
  return lower;
}

/**
 * Parse a comma-separated env var, dropping empty items.
 */
export function parseStringArray(value: string | undefined, defaultValue: string[]): string[] {
  if (value === undefined || value === '') return defaultValue;
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

// =============================================================================
// PATH HELPERS
// =============================================================================

/**
 * Expand tilde (~) to home directory in file paths.
 */
export function expandTilde(filePath: string): string {
  if (filePath.startsWith('~/') || filePath === '~') {
    const home = process.env.HOME || process.env.USERPROFILE || '';
    return filePath.replace(/^~/, home);
  }
  return filePath;
}

/**
 * Get the base data directory.
 * Priority:
 * 1. CARDFORGE_DATA_DIR environment variable
 * 2. projectRoot/data
 */
export function getDataDir(): string {
  const dataDir = process.env.CARDFORGE_DATA_DIR;
  if (dataDir) {
    return expandTilde(dataDir);
  }
  return resolve(projectRoot, 'data');
}

/**
 * Resolve a data path with priority:
 * 1. Specific env var override (highest priority)
 * 2. CARDFORGE_DATA_DIR + relative path
 * 3. projectRoot/data + relative path (default)
 */
export function resolveDataPath(envVar: string | undefined, relativePath: string): string {
  if (envVar === MEMORY_DB_PATH || (!envVar && relativePath === MEMORY_DB_PATH)) {
    return MEMORY_DB_PATH;
  }
  if (envVar) {
    return expandTilde(envVar);
  }
  return resolve(getDataDir(), relativePath);
}
