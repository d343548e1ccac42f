/**
 * Topic Repository
 *
 * Factory function that accepts DatabaseDeps for dependency injection.
 */

import { asc, eq } from 'drizzle-orm';
import { topics, cards, type Topic, type Card } from '../schema.js';
import { now, isUniqueConstraintError } from './base.js';
import type { DatabaseDeps } from '../../core/types.js';
import { transactionWithDb } from '../connection.js';
import {
  createAlreadyExistsError,
  createDatabaseError,
  CardforgeError,
  ErrorCodes,
} from '../../core/errors.js';
import type {
  ITopicRepository,
  CreateTopicWithCardsInput,
  TopicWithCards,
} from '../../core/interfaces/repositories.js';

export type { CreateTopicWithCardsInput, TopicWithCards } from '../../core/interfaces/repositories.js';

/**
 * Create a topic repository with injected database dependencies
 */
export function createTopicRepository(deps: DatabaseDeps): ITopicRepository {
  const { db, sqlite } = deps;

  const repo: ITopicRepository = {
    async createWithCards(input: CreateTopicWithCardsInput): Promise<TopicWithCards> {
      const createdAt = now();

      try {
        return transactionWithDb(sqlite, () => {
          const topic = db.insert(topics).values({ name: input.name, createdAt }).returning().get();
          if (!topic) {
            throw new Error(`Failed to create topic ${input.name}`);
          }

          const created: Card[] = [];
          for (const card of input.cards) {
            const row = db
              .insert(cards)
              .values({ topicId: topic.id, cardType: card.cardType, content: card.content, createdAt })
              .returning()
              .get();
            if (!row) {
              throw new Error(`Failed to create ${card.cardType} card for topic ${topic.id}`);
            }
            created.push(row);
          }

          return { topic, cards: created };
        });
      } catch (error) {
        if (isUniqueConstraintError(error, 'topics.name')) {
          throw createAlreadyExistsError('Topic', { name: input.name });
        }
        if (error instanceof CardforgeError) throw error;
        throw createDatabaseError('create topic', error, ErrorCodes.TRANSACTION_ERROR);
      }
    },

    async getById(id: number): Promise<Topic | undefined> {
      return db.select().from(topics).where(eq(topics.id, id)).get();
    },

    async getByName(name: string): Promise<Topic | undefined> {
      return db.select().from(topics).where(eq(topics.name, name)).get();
    },

    async list(): Promise<Topic[]> {
      return db.select().from(topics).orderBy(asc(topics.id)).all();
    },
  };

  return repo;
}
