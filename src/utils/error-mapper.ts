import { CardforgeError, ErrorCodes } from '../core/errors.js';
import { isStringArray } from './type-guards.js';
import { createComponentLogger } from './logger.js';

const logger = createComponentLogger('error-mapper');

export interface MappedError {
  message: string;
  code: string;
  statusCode: number; // HTTP Status hint
  details?: Record<string, unknown>;
  /** Allowed card types, for validation errors raised against the card type set */
  allowedTypes?: string[];
}

/**
 * Map any error to a standardized internal format
 */
export function mapError(error: unknown): MappedError {
  // 1. Handle known CardforgeError
  if (error instanceof CardforgeError) {
    const allowedTypes = error.context?.allowedTypes;
    return {
      message: error.message,
      code: error.code,
      statusCode: getStatusCodeForErrorCode(error.code),
      details: error.context,
      ...(isStringArray(allowedTypes) ? { allowedTypes } : {}),
    };
  }

  // 2. Handle Fastify/HTTP style errors with status codes (bad JSON, body too large)
  if (error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number') {
    return {
      message: error.message,
      code: 'code' in error && typeof error.code === 'string' ? error.code : 'HTTP_ERROR',
      statusCode: error.statusCode,
    };
  }

  // 3. Handle Standard Errors
  if (error instanceof Error) {
    logger.warn({ error: error.message }, 'Unmapped internal error');
    return {
      message: error.message,
      code: ErrorCodes.INTERNAL_ERROR,
      statusCode: 500,
    };
  }

  // 4. Fallback
  logger.warn({ error: String(error) }, 'Unmapped unknown error');
  return {
    message: String(error),
    code: ErrorCodes.UNKNOWN_ERROR,
    statusCode: 500,
  };
}

export function getStatusCodeForErrorCode(code: string): number {
  switch (code) {
    case ErrorCodes.MISSING_REQUIRED_FIELD:
    case ErrorCodes.INVALID_PARAMETER:
    case ErrorCodes.INVALID_CARD_TYPE:
      return 400;

    case ErrorCodes.NOT_FOUND:
      return 404;

    case ErrorCodes.ALREADY_EXISTS:
      return 409;

    default:
      return 500;
  }
}
