/**
 * Card service
 *
 * Listing, partial update and deletion of individual cards.
 */

import type { Repositories, UpdateCardInput } from '../core/interfaces/repositories.js';
import type { Card } from '../db/schema.js';
import { createNotFoundError, createValidationError } from '../core/errors.js';
import { assertCardType, parseCardTypeFilter } from '../core/card-types.js';
import { isObject, isString } from '../utils/type-guards.js';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('card-service');

export class CardService {
  constructor(private readonly repos: Repositories) {}

  async listCards(type: string | undefined): Promise<Card[]> {
    const cardType = parseCardTypeFilter(type);
    return this.repos.cards.list({ cardType });
  }

  /**
   * Apply a partial update. Fields that are absent or null are left alone;
   * a body that is not an object changes nothing.
   */
  async updateCard(cardId: number | undefined, body: unknown): Promise<Card> {
    const existing = cardId === undefined ? undefined : await this.repos.cards.getById(cardId);
    if (!existing) {
      throw createNotFoundError('Card', cardId);
    }

    const fields = isObject(body) ? body : {};
    const input: UpdateCardInput = {};

    const cardType = fields.card_type;
    if (cardType !== undefined && cardType !== null) {
      input.cardType = assertCardType(cardType, 'card_type', 'Invalid card_type');
    }

    const content = fields.content;
    if (content !== undefined && content !== null) {
      if (!isString(content)) {
        throw createValidationError('content', 'content must be a string');
      }
      input.content = content;
    }

    const updated = await this.repos.cards.update(existing.id, input);
    if (!updated) {
      // Deleted between the lookup and the write
      throw createNotFoundError('Card', existing.id);
    }

    logger.debug({ cardId: updated.id, fields: Object.keys(input) }, 'Updated card');
    return updated;
  }

  async deleteCard(cardId: number | undefined): Promise<{ id: number }> {
    if (cardId === undefined || !(await this.repos.cards.delete(cardId))) {
      throw createNotFoundError('Card', cardId);
    }

    logger.debug({ cardId }, 'Deleted card');
    return { id: cardId };
  }
}
