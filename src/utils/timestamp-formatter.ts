/**
 * Timestamp formatting for API responses
 *
 * Timestamps are stored as ISO-8601 UTC text. Responses always carry a
 * normalized ISO string, or null when the stored value cannot be parsed.
 */

export function toIsoTimestamp(value: string | null | undefined): string | null {
  if (!value) return null;

  const date = new Date(value);
  if (Number.isNaN(date.getTime())) return null;

  return date.toISOString();
}
