/**
 * Dev server assembly
 * Builds the Fastify instance without listening, so tests can use inject()
 */

import Fastify, { type FastifyInstance } from 'fastify';
import FastifyCors from '@fastify/cors';
import swaggerPlugin from '@fastify/swagger';
import swaggerUiPlugin from '@fastify/swagger-ui';
import type { DevServerConfig } from './config.js';
import { registerExtractRoutes } from './extract/index.js';

export async function buildServer(config: DevServerConfig): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: { level: config.logLevel } });
  await fastify.register(FastifyCors, { origin: true });

  // Register swagger and UI before routes so the plugin hooks onRoute events
  await fastify.register(swaggerPlugin, {
    openapi: {
      info: {
        title: 'totalscan dev server',
        description: 'Dev server for trying TOTAL extraction on OCR text',
        version: '0.1.0',
      },
    },
  });

  await fastify.register(swaggerUiPlugin, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'full',
      deepLinking: false,
    },
  });

  fastify.get(
    '/health',
    {
      schema: {
        description: 'Health check',
        response: {
          200: {
            type: 'object',
            properties: {
              status: { type: 'string' },
              ts: { type: 'string' },
            },
          },
        },
      },
    },
    async () => ({ status: 'ok', ts: new Date().toISOString() })
  );

  await registerExtractRoutes(fastify, config);

  fastify.get('/openapi.json', async () => fastify.swagger());

  return fastify;
}
