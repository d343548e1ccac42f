/**
 * REST API Configuration Section
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const restSection = {
  name: 'rest',
  description: 'REST API server configuration.',
  options: {
    host: {
      envKey: 'CARDFORGE_REST_HOST',
      defaultValue: '0.0.0.0',
      description: 'REST API server host.',
      schema: z.string(),
    },
    port: {
      envKey: 'CARDFORGE_REST_PORT',
      defaultValue: 5000,
      description: 'REST API server port.',
      schema: z.number().int().min(1).max(65535),
      parse: 'port',
    },
    bodyLimit: {
      envKey: 'CARDFORGE_REST_BODY_LIMIT',
      defaultValue: 1048576,
      description: 'Maximum request body size in bytes (default: 1 MiB).',
      schema: z.number().int().min(1024).max(104857600),
      parse: 'int',
    },
    corsOrigins: {
      envKey: 'CARDFORGE_REST_CORS_ORIGINS',
      defaultValue: [],
      description:
        'Comma-separated list of allowed CORS origins (http:// or https:// only). Empty disables CORS.',
      schema: z.array(z.string()),
      parse: 'stringArray',
    },
  },
} satisfies ConfigSectionMeta;
