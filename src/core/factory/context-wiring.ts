/**
 * Context Wiring Helper
 *
 * Assembles an AppContext from an already-open database. Used by
 * createAppContext() and by tests that bring their own connection.
 */

import type { Logger } from 'pino';
import type { AppContext } from '../context.js';
import type { Config } from '../../config/index.js';
import type { DatabaseDeps } from '../types.js';
import { createComponentLogger } from '../../utils/logger.js';
import { createRepositories } from '../../db/repositories/index.js';
import { TopicService } from '../../services/topic.service.js';
import { CardService } from '../../services/card.service.js';
import type { ContentGenerator } from '../../services/content-generator.service.js';

export interface WireContextInput extends DatabaseDeps {
  config: Config;
  logger?: Logger;
  /** Replaces the placeholder card generator */
  generator?: ContentGenerator;
}

export function wireContext(input: WireContextInput): AppContext {
  const { config, db, sqlite } = input;
  const repos = createRepositories({ db, sqlite });

  return {
    config,
    logger: input.logger ?? createComponentLogger('app'),
    db,
    sqlite,
    repos,
    services: {
      topics: new TopicService(repos, input.generator),
      cards: new CardService(repos),
    },
  };
}
