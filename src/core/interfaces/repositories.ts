/**
 * Repository Interfaces
 *
 * Defines contracts for all repository implementations.
 * Used for dependency injection and testing.
 */

import type { Topic, Card } from '../../db/schema.js';
import type { CardType } from '../card-types.js';

// =============================================================================
// TOPIC REPOSITORY
// =============================================================================

export interface NewCardContent {
  cardType: CardType;
  content: string;
}

export interface CreateTopicWithCardsInput {
  name: string;
  /** Cards to create alongside the topic, in the order they should be returned */
  cards: NewCardContent[];
}

export interface TopicWithCards {
  topic: Topic;
  cards: Card[];
}

export interface ITopicRepository {
  /**
   * Insert a topic and its cards in one transaction.
   * @throws CardforgeError (ALREADY_EXISTS) when the name is taken
   */
  createWithCards(input: CreateTopicWithCardsInput): Promise<TopicWithCards>;
  getById(id: number): Promise<Topic | undefined>;
  getByName(name: string): Promise<Topic | undefined>;
  /** All topics, ordered by id */
  list(): Promise<Topic[]>;
}

// =============================================================================
// CARD REPOSITORY
// =============================================================================

export interface ListCardsFilter {
  topicId?: number;
  cardType?: CardType;
}

export interface UpdateCardInput {
  cardType?: CardType;
  content?: string;
}

export interface ICardRepository {
  getById(id: number): Promise<Card | undefined>;
  /** Cards matching every given filter field, ordered by id */
  list(filter?: ListCardsFilter): Promise<Card[]>;
  /** Returns the updated card, or undefined if no card has this id */
  update(id: number, input: UpdateCardInput): Promise<Card | undefined>;
  /** Returns false if no card has this id */
  delete(id: number): Promise<boolean>;
}

// =============================================================================
// AGGREGATED REPOSITORIES
// =============================================================================

export interface Repositories {
  topics: ITopicRepository;
  cards: ICardRepository;
}
