/**
 * Shared helpers for repository implementations
 */

/**
 * Get current ISO timestamp
 */
export function now(): string {
  return new Date().toISOString();
}

/**
 * True when `error` is SQLite rejecting a duplicate value.
 * Pass `column` as `table.column` to match one specific constraint.
 */
export function isUniqueConstraintError(error: unknown, column?: string): boolean {
  if (!(error instanceof Error)) return false;

  const code = 'code' in error ? String(error.code) : '';
  const isUnique =
    code === 'SQLITE_CONSTRAINT_UNIQUE' || error.message.includes('UNIQUE constraint failed');
  if (!isUnique) return false;

  return column === undefined || error.message.includes(column);
}
