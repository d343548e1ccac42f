/**
 * Card Repository
 *
 * Factory function that accepts DatabaseDeps for dependency injection.
 */

import { and, asc, eq, type SQL } from 'drizzle-orm';
import { cards, type Card } from '../schema.js';
import type { DatabaseDeps } from '../../core/types.js';
import type {
  ICardRepository,
  ListCardsFilter,
  UpdateCardInput,
} from '../../core/interfaces/repositories.js';

export type { ListCardsFilter, UpdateCardInput } from '../../core/interfaces/repositories.js';

/**
 * Create a card repository with injected database dependencies
 */
export function createCardRepository(deps: DatabaseDeps): ICardRepository {
  const { db } = deps;

  const repo: ICardRepository = {
    async getById(id: number): Promise<Card | undefined> {
      return db.select().from(cards).where(eq(cards.id, id)).get();
    },

    async list(filter: ListCardsFilter = {}): Promise<Card[]> {
      const conditions: SQL[] = [];

      if (filter.topicId !== undefined) {
        conditions.push(eq(cards.topicId, filter.topicId));
      }
      if (filter.cardType !== undefined) {
        conditions.push(eq(cards.cardType, filter.cardType));
      }

      return db
        .select()
        .from(cards)
        .where(conditions.length > 0 ? and(...conditions) : undefined)
        .orderBy(asc(cards.id))
        .all();
    },

    async update(id: number, input: UpdateCardInput): Promise<Card | undefined> {
      const updates: Partial<Pick<Card, 'cardType' | 'content'>> = {};
      if (input.cardType !== undefined) updates.cardType = input.cardType;
      if (input.content !== undefined) updates.content = input.content;

      // Nothing to write; report the card as it stands
      if (Object.keys(updates).length === 0) {
        return repo.getById(id);
      }

      const [updated] = db.update(cards).set(updates).where(eq(cards.id, id)).returning().all();
      return updated;
    },

    async delete(id: number): Promise<boolean> {
      const result = db.delete(cards).where(eq(cards.id, id)).run();
      return result.changes > 0;
    },
  };

  return repo;
}
