/**
 * Wire shapes for API responses.
 *
 * Rows use camelCase internally; clients see snake_case keys and
 * normalized ISO timestamps.
 */

import type { Topic, Card } from '../../db/schema.js';
import { toIsoTimestamp } from '../../utils/timestamp-formatter.js';

export interface TopicResponse {
  id: number;
  name: string;
  created_at: string | null;
}

export interface CardResponse {
  id: number;
  topic_id: number;
  card_type: string;
  content: string;
  created_at: string | null;
}

export function toTopicResponse(topic: Topic): TopicResponse {
  return {
    id: topic.id,
    name: topic.name,
    created_at: toIsoTimestamp(topic.createdAt),
  };
}

export function toCardResponse(card: Card): CardResponse {
  return {
    id: card.id,
    topic_id: card.topicId,
    card_type: card.cardType,
    content: card.content,
    created_at: toIsoTimestamp(card.createdAt),
  };
}
