/**
 * Detect Currencies Route Handler
 * POST /api/detect-currencies
 */

import type { FastifyInstance } from 'fastify';
import { detectCurrencies } from '@totalscan/core';
import { safeValidateDetectCurrenciesRequest } from './common.js';

export async function registerDetectCurrenciesRoute(fastify: FastifyInstance) {
  fastify.post('/api/detect-currencies', {
    schema: {
      description: 'List the ISO 4217 currencies mentioned in a text, by code or symbol',
      tags: ['Currencies'],
      summary: 'Detect currencies',
      body: {
        type: 'object',
        properties: {
          text: { type: 'string' },
        },
        examples: [{ text: 'Total 42.50 USD (39,10 €)' }],
      },
      response: {
        200: {
          type: 'object',
          properties: {
            currencies: { type: 'array', items: { type: 'string' } },
          },
        },
        400: {
          type: 'object',
          properties: {
            message: { type: 'string' },
            category: { type: 'string' },
            issues: { type: 'array', items: { type: 'string' } },
          },
        },
      },
    },
    async handler(request, reply) {
      const validated = safeValidateDetectCurrenciesRequest(request.body);
      if (!validated.success) {
        return reply.status(400).send({
          message: 'Invalid request',
          category: 'InvalidInput',
          issues: validated.error.issues.map((issue) => issue.message),
        });
      }

      return reply.status(200).send({ currencies: detectCurrencies(validated.data.text) });
    },
  });
}
