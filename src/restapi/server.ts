import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import compress from '@fastify/compress';
import helmet from '@fastify/helmet';

import { createComponentLogger } from '../utils/logger.js';
import type { AppContext } from '../core/context.js';
import type { Config } from '../config/index.js';
import { createAppContext, shutdownAppContext } from '../core/factory.js';
import { config as defaultConfig } from '../config/index.js';
import { mapError } from '../utils/error-mapper.js';
import { registerRoutes } from './routes/index.js';

const restLogger = createComponentLogger('restapi');

/**
 * Validate a CORS origin URL.
 * Only http:// and https:// origins are accepted.
 */
function isValidCorsOrigin(origin: string): boolean {
  try {
    return ['http:', 'https:'].includes(new URL(origin).protocol);
  } catch {
    return false;
  }
}

/**
 * Filter configured CORS origins. An empty result disables CORS
 * (same-origin only).
 */
export function resolveCorsOrigins(origins: string[]): string[] | false {
  const validOrigins = origins.filter(isValidCorsOrigin);
  const invalidOrigins = origins.filter((origin) => !isValidCorsOrigin(origin));

  if (invalidOrigins.length > 0) {
    restLogger.warn(
      { invalidOrigins },
      'Invalid CORS origins ignored. Origins must be valid http:// or https:// URLs.'
    );
  }

  return validOrigins.length > 0 ? validOrigins : false;
}

/**
 * Create a REST API server with the provided AppContext.
 */
export async function createServer(context: AppContext): Promise<FastifyInstance> {
  const { rest, logging, runtime } = context.config;

  const app = Fastify({
    // Fastify's own logger stays off; requests are logged through pino below
    logger: false,
    disableRequestLogging: true,
    bodyLimit: rest.bodyLimit,
    connectionTimeout: 30000,
    requestTimeout: 60000,
  });

  await app.register(cors, {
    origin: resolveCorsOrigins(rest.corsOrigins),
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    maxAge: 86400,
  });

  await app.register(helmet, {
    frameguard: { action: 'deny' },
    noSniff: true,
  });

  await app.register(compress, {
    global: true,
    threshold: 1024,
    encodings: ['gzip', 'deflate'],
  });

  // Bodies that are not JSON reach the handlers as undefined
  app.addContentTypeParser('*', { parseAs: 'string' }, (_request, _body, done) => {
    done(null, undefined);
  });

  if (logging.debug) {
    app.addHook('onResponse', async (request, reply) => {
      restLogger.debug(
        {
          method: request.method,
          url: request.url,
          statusCode: reply.statusCode,
          responseTimeMs: Math.round(reply.elapsedTime),
        },
        'Request completed'
      );
    });
  }

  app.setNotFoundHandler(async (_request, reply) => {
    await reply.status(404).send({ error: 'Route not found' });
  });

  app.setErrorHandler(async (error, request, reply) => {
    const mapped = mapError(error);

    if (mapped.statusCode >= 500) {
      restLogger.error({ error, method: request.method, url: request.url }, 'REST API request failed');
    } else {
      restLogger.debug(
        { code: mapped.code, message: mapped.message, url: request.url },
        'REST API request rejected'
      );
    }

    // Hide internal details in production
    const isProduction = runtime.nodeEnv === 'production';
    const safeMessage =
      mapped.statusCode >= 500 && isProduction ? 'Internal Server Error' : mapped.message;

    await reply.status(mapped.statusCode).send({
      error: safeMessage,
      ...(mapped.allowedTypes ? { allowed_types: mapped.allowedTypes } : {}),
    });
  });

  // Handlers are set first so the card routes' scope inherits them
  await registerRoutes(app, context);

  if (logging.debug) {
    await app.ready();
    restLogger.debug({ routes: app.printRoutes({ commonPrefix: false }) }, 'Registered routes');
  }

  return app;
}

/**
 * Open the database, start listening and close both on SIGTERM/SIGINT.
 */
export async function runServer(configuration: Config = defaultConfig): Promise<FastifyInstance> {
  const { host, port } = configuration.rest;

  const context = createAppContext(configuration);
  const app = await createServer(context);

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    restLogger.info({ signal }, 'Shutting down REST API...');

    await app.close();
    shutdownAppContext(context);

    restLogger.info('REST API shutdown complete');
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      restLogger.error({ error }, 'Shutdown failed');
      process.exitCode = 1;
    });
  };
  process.once('SIGTERM', () => onSignal('SIGTERM'));
  process.once('SIGINT', () => onSignal('SIGINT'));

  await app.listen({ host, port });
  restLogger.info({ host, port }, 'REST API listening');
  return app;
}
