import type { DatabaseDeps } from '../../core/types.js';
import type { Repositories } from '../../core/interfaces/repositories.js';
import { createTopicRepository } from './topics.js';
import { createCardRepository } from './cards.js';

export * from './base.js';
export * from './topics.js';
export * from './cards.js';

/**
 * Build every repository over one database connection
 */
export function createRepositories(deps: DatabaseDeps): Repositories {
  return {
    topics: createTopicRepository(deps),
    cards: createCardRepository(deps),
  };
}
