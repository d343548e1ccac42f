import type { Logger } from 'pino';
import type Database from 'better-sqlite3';
import type { Config } from '../config/index.js';
import type { Repositories } from './interfaces/repositories.js';
import type { AppDb } from './types.js';
import type { TopicService } from '../services/topic.service.js';
import type { CardService } from '../services/card.service.js';

/**
 * Services built over the repositories
 */
export interface AppContextServices {
  topics: TopicService;
  cards: CardService;
}

/**
 * Application Context
 *
 * Everything a transport needs to serve requests. Built once by
 * createAppContext() and passed explicitly; there is no global handle.
 */
export interface AppContext {
  config: Config;
  logger: Logger;
  db: AppDb;
  sqlite: Database.Database;
  repos: Repositories;
  services: AppContextServices;
}
