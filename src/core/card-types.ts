/**
 * The closed set of card types.
 *
 * Every handler that accepts or filters on `card_type` validates through
 * this module; the order here is the order reported in `allowed_types`.
 */

import { createInvalidCardTypeError } from './errors.js';

export const VALID_CARD_TYPES = ['flashcard', 'summary', 'quiz', 'task', 'usecase', 'mindmap'] as const;

export type CardType = (typeof VALID_CARD_TYPES)[number];

export function isCardType(value: unknown): value is CardType {
  return VALID_CARD_TYPES.some((type) => type === value);
}

/**
 * Narrow `value` to a CardType or throw a 400-class validation error that
 * carries the allowed set.
 */
export function assertCardType(value: unknown, field: string, message: string): CardType {
  if (!isCardType(value)) {
    throw createInvalidCardTypeError(field, message, VALID_CARD_TYPES);
  }
  return value;
}

/**
 * Resolve an optional `?type=` filter. Absent and empty values mean
 * "no filter"; anything else must be a valid card type.
 */
export function parseCardTypeFilter(value: string | undefined): CardType | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return assertCardType(value, 'type', 'Invalid card_type');
}
