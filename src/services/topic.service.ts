/**
 * Topic service
 *
 * Validates topic requests, generates the initial cards and persists the
 * batch through the repositories. Transport-agnostic: failures are thrown
 * as CardforgeError and mapped to HTTP by the REST layer.
 */

import type { Repositories, TopicWithCards } from '../core/interfaces/repositories.js';
import type { Topic, Card } from '../db/schema.js';
import {
  createAlreadyExistsError,
  createNotFoundError,
  createValidationError,
  ErrorCodes,
} from '../core/errors.js';
import { assertCardType, parseCardTypeFilter, type CardType } from '../core/card-types.js';
import { generateCardContent, type ContentGenerator } from './content-generator.service.js';
import { isArray, isObject, isString } from '../utils/type-guards.js';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('topic-service');

function describeFormat(value: unknown): string {
  return isString(value) ? value : JSON.stringify(value);
}

export class TopicService {
  constructor(
    private readonly repos: Repositories,
    private readonly generate: ContentGenerator = generateCardContent
  ) {}

  /**
   * Create a topic with one generated card per requested format.
   * Checks run in a fixed order and the first failure wins.
   */
  async createTopic(body: unknown): Promise<TopicWithCards> {
    if (!isObject(body) || body.topic === undefined || body.topic === null) {
      throw createValidationError(
        'topic',
        "Missing 'topic' in request body",
        ErrorCodes.MISSING_REQUIRED_FIELD
      );
    }
    if (!isString(body.topic)) {
      throw createValidationError('topic', 'Topic name must be a string');
    }

    const name = body.topic.trim();
    if (name === '') {
      throw createValidationError('topic', 'Topic name cannot be empty');
    }

    const formats = body.formats;
    if (!isArray(formats) || formats.length === 0) {
      throw createValidationError('formats', 'Formats must be a non-empty list');
    }

    const cardTypes: CardType[] = formats.map((format) =>
      assertCardType(format, 'formats', `Invalid card_type in formats: '${describeFormat(format)}'`)
    );

    if (await this.repos.topics.getByName(name)) {
      throw createAlreadyExistsError('Topic', { name });
    }

    const created = await this.repos.topics.createWithCards({
      name,
      cards: cardTypes.map((cardType) => ({ cardType, content: this.generate(name, cardType) })),
    });

    logger.debug(
      { topicId: created.topic.id, cardCount: created.cards.length },
      'Created topic with cards'
    );
    return created;
  }

  async listTopics(): Promise<Topic[]> {
    return this.repos.topics.list();
  }

  /**
   * Cards of one topic, optionally narrowed to a card type.
   * An id that failed to parse is reported the same as a missing topic.
   */
  async listTopicCards(topicId: number | undefined, type: string | undefined): Promise<Card[]> {
    const topic = topicId === undefined ? undefined : await this.repos.topics.getById(topicId);
    if (!topic) {
      throw createNotFoundError('Topic', topicId);
    }

    const cardType = parseCardTypeFilter(type);
    return this.repos.cards.list({ topicId: topic.id, cardType });
  }
}
