/**
 * Structured logging utility using pino
 *
 * Provides consistent logging across the application with:
 * - Environment-based log levels
 * - Structured JSON logging for production
 * - Pretty printing for development
 * - Component-based context
 */

import pino from 'pino';
import { config } from '../config/index.js';

// Detect test environment and suppress logs to keep test output clean
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;
const loggingEnabled = !isTest;

/**
 * Common pino options with security redaction
 */
const pinoOptions: pino.LoggerOptions = {
  level: config.logging.debug ? 'debug' : config.logging.level,
  enabled: loggingEnabled,
  redact: {
    paths: [
      'token',
      'secret',
      'password',
      'authorization',
      '*.token',
      '*.secret',
      '*.password',
      'req.headers.authorization',
      'req.headers.cookie',
    ],
    censor: '***REDACTED***',
  },
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
};

const usePrettyTransport = loggingEnabled && config.runtime.nodeEnv !== 'production';

export const logger = usePrettyTransport
  ? pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    })
  : pino(pinoOptions);

/**
 * Create a child logger with component context
 *
 * @param component - Component name (e.g., 'restapi', 'db-factory', 'topics')
 */
export function createComponentLogger(component: string): pino.Logger {
  return logger.child({ component });
}
