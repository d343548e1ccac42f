/**
 * CLI Output Formatting
 */

import { isObject } from '../../utils/type-guards.js';

export const OUTPUT_FORMATS = ['json', 'table'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function formatOutput(result: unknown, format: OutputFormat = 'json'): string {
  if (format === 'json' || !isObject(result)) {
    return JSON.stringify(result, null, 2);
  }
  return formatObjectAsKeyValue(result);
}

function formatValue(value: unknown): string {
  if (Array.isArray(value)) {
    return value.length === 0 ? '-' : value.map(String).join(', ');
  }
  if (value === null || value === undefined) return '-';
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

function formatObjectAsKeyValue(obj: Record<string, unknown>): string {
  const keys = Object.keys(obj);
  const width = Math.max(0, ...keys.map((k) => k.length));
  return keys.map((key) => `${key.padEnd(width)}  ${formatValue(obj[key])}`).join('\n');
}
