/**
 * Currency Info Route Handler
 * GET /api/currencies/:code
 */

import type { FastifyInstance } from 'fastify';
import { getCurrency } from '@totalscan/core';

export async function registerCurrencyInfoRoute(fastify: FastifyInstance) {
  fastify.get<{ Params: { code: string } }>('/api/currencies/:code', {
    schema: {
      description: 'ISO 4217 reference entry for a currency code',
      tags: ['Currencies'],
      summary: 'Currency info',
      params: {
        type: 'object',
        required: ['code'],
        properties: {
          code: { type: 'string', description: 'Three-letter code, case-insensitive' },
        },
      },
      response: {
        200: {
          type: 'object',
          properties: {
            code: { type: 'string', example: 'USD' },
            name: { type: 'string', example: 'US Dollar' },
            minorUnits: { type: 'integer', example: 2 },
            decimalSeparator: { type: 'string', enum: ['.', ','] },
          },
        },
        404: {
          type: 'object',
          properties: {
            message: { type: 'string' },
            category: { type: 'string' },
          },
        },
      },
    },
    async handler(request, reply) {
      const code = request.params.code.toUpperCase();
      const info = getCurrency(code);
      if (!info) {
        return reply.status(404).send({
          message: `Unknown currency '${code}'`,
          category: 'NotFound',
        });
      }
      return reply.status(200).send(info);
    },
  });
}
