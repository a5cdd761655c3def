/**
 * Extraction Routes - Main Export
 * Registers all extraction route handlers to the Fastify instance
 *
 * Routes registered:
 * - POST /api/extract-total
 * - POST /api/detect-currencies
 * - GET /api/currencies/:code
 */

import type { FastifyInstance } from 'fastify';
import type { DevServerConfig } from '../config.js';
import { registerExtractTotalRoute } from './extract-total.js';
import { registerDetectCurrenciesRoute } from './detect-currencies.js';
import { registerCurrencyInfoRoute } from './currency-info.js';

export async function registerExtractRoutes(fastify: FastifyInstance, config: DevServerConfig) {
  await registerExtractTotalRoute(fastify, config);
  await registerDetectCurrenciesRoute(fastify);
  await registerCurrencyInfoRoute(fastify);
}

export * from './common.js';
