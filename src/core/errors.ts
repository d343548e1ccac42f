/**
 * Core error definitions - transport-agnostic
 *
 * This module contains all error classes, codes, and factory functions
 * that can be used by any layer (db, services, restapi, cli).
 */

export class CardforgeError extends Error {
  constructor(
    message: string,
    public code: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CardforgeError';
  }
}

/**
 * Error codes for programmatic handling
 */
export const ErrorCodes = {
  // Validation errors (1000-1999)
  MISSING_REQUIRED_FIELD: 'E1000',
  INVALID_PARAMETER: 'E1004',
  INVALID_CARD_TYPE: 'E1006',

  // Resource errors (2000-2999)
  NOT_FOUND: 'E2000',
  ALREADY_EXISTS: 'E2001',

  // Database errors (4000-4999)
  DATABASE_ERROR: 'E4000',
  MIGRATION_ERROR: 'E4001',
  CONNECTION_ERROR: 'E4002',
  TRANSACTION_ERROR: 'E4004',

  // System errors (5000-5999)
  UNKNOWN_ERROR: 'E5000',
  INTERNAL_ERROR: 'E5001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * Database-specific errors
 */
export class DatabaseError extends CardforgeError {
  constructor(
    message: string,
    code: string = ErrorCodes.DATABASE_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = 'DatabaseError';
  }
}

// =============================================================================
// FACTORIES
// =============================================================================

/**
 * Create a validation error for a single request field.
 * The message is reported to the client as-is.
 */
export function createValidationError(
  field: string,
  message: string,
  code: ErrorCode = ErrorCodes.INVALID_PARAMETER
): CardforgeError {
  return new CardforgeError(message, code, { field });
}

/**
 * Create a validation error for a value outside the card type set.
 * The allowed set travels with the error so responses can list it.
 */
export function createInvalidCardTypeError(
  field: string,
  message: string,
  allowedTypes: readonly string[]
): CardforgeError {
  return new CardforgeError(message, ErrorCodes.INVALID_CARD_TYPE, {
    field,
    allowedTypes: [...allowedTypes],
  });
}

/**
 * Create a not found error with resource details
 */
export function createNotFoundError(resource: string, identifier?: string | number): CardforgeError {
  return new CardforgeError(`${resource} not found`, ErrorCodes.NOT_FOUND, {
    resource,
    identifier,
  });
}

/**
 * Create an error for a resource whose unique key is already taken
 */
export function createAlreadyExistsError(
  resource: string,
  details?: Record<string, unknown>
): CardforgeError {
  return new CardforgeError(`${resource} already exists`, ErrorCodes.ALREADY_EXISTS, {
    resource,
    ...details,
  });
}

/**
 * Wrap a low-level store failure. The original error is kept as `cause`.
 */
export function createDatabaseError(
  operation: string,
  error: unknown,
  code: ErrorCode = ErrorCodes.DATABASE_ERROR
): DatabaseError {
  const message = error instanceof Error ? error.message : String(error);
  const wrapped = new DatabaseError(`Database error during ${operation}: ${message}`, code, {
    operation,
  });
  wrapped.cause = error;
  return wrapped;
}
