import type { FastifyRequest } from 'fastify';
import type { AppContext } from '../../core/context.js';
import { getQueryValue, isObject, parseIdParam } from '../../utils/type-guards.js';
import { toCardResponse } from '../presenters/index.js';

function getCardId(request: FastifyRequest): number | undefined {
  return isObject(request.params) ? parseIdParam(request.params.cardId) : undefined;
}

export class CardsController {
  constructor(private context: AppContext) {}

  async handleList(request: FastifyRequest) {
    const cards = await this.context.services.cards.listCards(getQueryValue(request.query, 'type'));
    return cards.map(toCardResponse);
  }

  async handleUpdate(request: FastifyRequest) {
    const card = await this.context.services.cards.updateCard(getCardId(request), request.body);
    return toCardResponse(card);
  }

  async handleDelete(request: FastifyRequest) {
    const { id } = await this.context.services.cards.deleteCard(getCardId(request));
    return { status: 'deleted', id };
  }
}
