/**
 * Extract Total Route Handler
 * POST /api/extract-total
 *
 * Validates the request body with zod, runs extractTotal and maps failure
 * categories to HTTP status codes
 */

import type { FastifyInstance } from 'fastify';
import {
  errorToLog,
  extractTotal,
  toDecimalString,
  type ExtractionContext,
  type ExtractorConfig,
} from '@totalscan/core';
import type { DevServerConfig } from '../config.js';
import { wrapPinoLogger } from '../logger.js';
import {
  EXAMPLE_RECEIPT,
  EXTRACT_TOTAL_RESPONSE_SCHEMA,
  failureBody,
  safeValidateExtractTotalRequest,
  statusForFailure,
} from './common.js';

export async function registerExtractTotalRoute(fastify: FastifyInstance, config: DevServerConfig) {
  fastify.post('/api/extract-total', {
    schema: {
      description: 'Extract the document total and its ISO 4217 currency from OCR text',
      tags: ['Extraction'],
      summary: 'Extract total',
      body: {
        type: 'object',
        properties: {
          text: { type: 'string', description: 'OCR text, one document line per line' },
          languages: {
            type: 'array',
            items: { type: 'string' },
            description: 'Keyword languages to search (all when omitted)',
          },
          defaultCurrency: { type: 'string', description: 'Currency for amounts without a symbol or code' },
          preferredCurrency: { type: 'string', description: 'Currency that breaks ties between candidates' },
        },
        examples: [{ text: EXAMPLE_RECEIPT, languages: ['en'] }],
      },
      response: EXTRACT_TOTAL_RESPONSE_SCHEMA,
    },
    async handler(request, reply) {
      const validated = safeValidateExtractTotalRequest(request.body);
      if (!validated.success) {
        return reply.status(400).send({
          message: 'Invalid request',
          category: 'InvalidInput',
          candidates: [],
          rejected: [],
          issues: validated.error.issues.map((issue) => issue.message),
        });
      }

      const { text, languages, defaultCurrency, preferredCurrency } = validated.data;

      const overrides: Partial<ExtractorConfig> = { ...config.extractor };
      if (defaultCurrency) overrides.defaultCurrency = defaultCurrency;
      if (preferredCurrency) overrides.preferredCurrency = preferredCurrency;

      const ctx: ExtractionContext = {
        logger: wrapPinoLogger(fastify.log),
        operationName: 'extractTotal',
        loggingOptions: {
          maxArrayItems: 5,
          maxDepth: 2,
          logText: 'summary',
        },
        config: overrides,
      };

      try {
        const result = extractTotal(text, languages ?? config.languages, ctx);

        if (!result.ok) {
          return reply.status(statusForFailure(result.reason)).send(failureBody(result));
        }

        return reply.status(200).send({
          total: {
            amount: result.total.amount,
            currency: result.total.currency,
            value: toDecimalString(result.total),
          },
          candidate: result.candidate,
          rejected: result.rejected,
        });
      } catch (error) {
        fastify.log.error(errorToLog(error), 'Extraction failed');
        return reply.status(500).send({
          message: error instanceof Error ? error.message : String(error),
          category: 'Internal',
          candidates: [],
          rejected: [],
        });
      }
    },
  });
}
