import type { FastifyRequest, FastifyReply } from 'fastify';
import type { AppContext } from '../../core/context.js';
import { getQueryValue, isObject, parseIdParam } from '../../utils/type-guards.js';
import { toCardResponse, toTopicResponse } from '../presenters/index.js';

export class TopicsController {
  constructor(private context: AppContext) {}

  async handleCreate(request: FastifyRequest, reply: FastifyReply) {
    const { topic, cards } = await this.context.services.topics.createTopic(request.body);

    return reply.status(201).send({
      topic: toTopicResponse(topic),
      cards: cards.map(toCardResponse),
    });
  }

  async handleList() {
    const topics = await this.context.services.topics.listTopics();
    return topics.map(toTopicResponse);
  }

  async handleListCards(request: FastifyRequest) {
    const topicId = isObject(request.params) ? parseIdParam(request.params.topicId) : undefined;
    const type = getQueryValue(request.query, 'type');

    const cards = await this.context.services.topics.listTopicCards(topicId, type);
    return cards.map(toCardResponse);
  }
}
