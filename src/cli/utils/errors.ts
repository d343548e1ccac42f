/**
 * CLI Error Handling
 */

import { mapError } from '../../utils/error-mapper.js';

/**
 * Print an error as JSON on stderr and mark the process as failed.
 */
export function handleCliError(error: unknown): void {
  const mapped = mapError(error);

  const output = {
    error: mapped.message,
    code: mapped.code,
    ...(mapped.details ? { details: mapped.details } : {}),
  };

  console.error(JSON.stringify(output, null, 2));
  process.exitCode = 1;
}
