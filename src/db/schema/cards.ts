/**
 * Cards table
 */

import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import { VALID_CARD_TYPES } from '../../core/card-types.js';
import { topics } from './topics.js';

/**
 * Cards - one generated learning artifact, owned by exactly one topic
 */
export const cards = sqliteTable(
  'cards',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    topicId: integer('topic_id')
      .notNull()
      .references(() => topics.id),
    cardType: text('card_type', { enum: VALID_CARD_TYPES }).notNull(),
    content: text('content').notNull(),
    createdAt: text('created_at').notNull(),
  },
  (table) => [
    index('idx_cards_topic_id').on(table.topicId),
    index('idx_cards_card_type').on(table.cardType),
  ]
);

// Type exports
export type Card = typeof cards.$inferSelect;
