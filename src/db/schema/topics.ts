/**
 * Topics table
 */

import { sqliteTable, text, integer, uniqueIndex } from 'drizzle-orm/sqlite-core';

/**
 * Topics - named subjects that own a set of generated cards
 */
export const topics = sqliteTable(
  'topics',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    name: text('name').notNull(),
    createdAt: text('created_at').notNull(),
  },
  (table) => [uniqueIndex('idx_topics_name').on(table.name)]
);

// Type exports
export type Topic = typeof topics.$inferSelect;
