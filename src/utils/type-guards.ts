/**
 * Type guard utilities for runtime type validation
 *
 * Request bodies and query strings arrive as `unknown`; these guards narrow
 * them without casting.
 */

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

/**
 * Type guard to check if a value is an object (not null, not array)
 */
export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isArray(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(isString);
}

/**
 * Parse a path segment as a positive integer id.
 * Only plain digit strings qualify; '12abc', '-1' and '0' do not.
 */
export function parseIdParam(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value > 0 ? value : undefined;
  }
  if (!isString(value) || !/^\d+$/.test(value)) {
    return undefined;
  }
  const id = Number(value);
  return Number.isSafeInteger(id) && id > 0 ? id : undefined;
}

/**
 * Read a single query-string value. Repeated keys arrive as arrays; the
 * first occurrence wins.
 */
export function getQueryValue(query: unknown, key: string): string | undefined {
  if (!isObject(query)) return undefined;
  const value = query[key];
  if (isString(value)) return value;
  if (isArray(value) && isString(value[0])) return value[0];
  return undefined;
}
