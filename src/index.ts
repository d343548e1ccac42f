// Library entry point: build a context and serve it, or embed the pieces.

export { config, buildConfig, type Config } from './config/index.js';
export { createAppContext, shutdownAppContext } from './core/factory.js';
export { wireContext } from './core/factory/context-wiring.js';
export type { AppContext } from './core/context.js';
export { createServer, runServer } from './restapi/server.js';
export { TopicService } from './services/topic.service.js';
export { CardService } from './services/card.service.js';
export { generateCardContent, type ContentGenerator } from './services/content-generator.service.js';
export { VALID_CARD_TYPES, isCardType, type CardType } from './core/card-types.js';
export { CardforgeError, ErrorCodes } from './core/errors.js';
export type { Topic, Card } from './db/schema.js';
