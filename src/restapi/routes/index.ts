import type { FastifyInstance } from 'fastify';
import type { AppContext } from '../../core/context.js';
import { TopicsController } from '../controllers/topics.controller.js';
import { CardsController } from '../controllers/cards.controller.js';
import { createComponentLogger } from '../../utils/logger.js';

const routesLogger = createComponentLogger('routes');

/**
 * Parse an optional JSON body. Empty or malformed text yields undefined.
 */
export function parseOptionalJson(body: string): unknown {
  if (body.trim() === '') return undefined;
  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch (error) {
    routesLogger.debug(
      { reason: error instanceof Error ? error.message : String(error) },
      'Ignoring malformed JSON body'
    );
    return undefined;
  }
}

/**
 * Card routes take their JSON body as optional, so a missing card is still
 * reported as 404 whatever the body holds.
 */
function useLenientJsonParser(scope: FastifyInstance): void {
  scope.removeContentTypeParser('application/json');
  scope.addContentTypeParser('application/json', { parseAs: 'string' }, (_request, body, done) => {
    done(null, parseOptionalJson(String(body)));
  });
}

/**
 * Register one handler per method and path
 */
export async function registerRoutes(app: FastifyInstance, context: AppContext): Promise<void> {
  const topicsController = new TopicsController(context);
  const cardsController = new CardsController(context);

  app.get('/health', async () => ({ status: 'ok' }));

  app.get('/topics', () => topicsController.handleList());
  app.post('/topics', (req, rep) => topicsController.handleCreate(req, rep));
  app.get('/topics/:topicId/cards', (req) => topicsController.handleListCards(req));

  await app.register(async (cards) => {
    useLenientJsonParser(cards);

    cards.get('/cards', (req) => cardsController.handleList(req));
    cards.put('/cards/:cardId', (req) => cardsController.handleUpdate(req));
    cards.delete('/cards/:cardId', (req) => cardsController.handleDelete(req));
  });
}
