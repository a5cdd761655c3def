/**
 * Extraction routes - shared schemas, examples and helpers
 */

import { z } from 'zod';
import type { ExtractionFailure, ExtractionFailureReason } from '@totalscan/core';

/**
 * Request body for POST /api/extract-total
 */
export const ExtractTotalRequestSchema = z.object({
  text: z.string({ message: 'text is required' }),
  languages: z.array(z.string()).optional(),
  defaultCurrency: z.string().trim().toUpperCase().optional(),
  preferredCurrency: z.string().trim().toUpperCase().optional(),
});

export type ExtractTotalRequest = z.infer<typeof ExtractTotalRequestSchema>;

/**
 * Request body for POST /api/detect-currencies
 */
export const DetectCurrenciesRequestSchema = z.object({
  text: z.string({ message: 'text is required' }),
});

export function safeValidateExtractTotalRequest(input: unknown) {
  return ExtractTotalRequestSchema.safeParse(input);
}

export function safeValidateDetectCurrenciesRequest(input: unknown) {
  return DetectCurrenciesRequestSchema.safeParse(input);
}

/**
 * HTTP status for each failure category
 */
export function statusForFailure(reason: ExtractionFailureReason): 400 | 404 | 409 {
  switch (reason) {
    case 'InvalidInput':
      return 400;
    case 'NotFound':
      return 404;
    case 'Ambiguous':
      return 409;
  }
}

export function failureBody(result: ExtractionFailure) {
  return {
    message: result.message,
    category: result.reason,
    candidates: result.candidates,
    rejected: result.rejected,
    ...(result.issues ? { issues: result.issues } : {}),
  };
}

const MONEY_SCHEMA = {
  type: 'object',
  properties: {
    amount: { type: 'integer', description: 'Amount in minor units (cents for USD)' },
    currency: { type: 'string', example: 'USD' },
  },
};

export const CANDIDATE_SCHEMA = {
  type: 'object',
  properties: {
    amount: MONEY_SCHEMA,
    keyword: { type: 'string', example: 'TOTAL' },
    language: { type: 'string', example: 'en' },
    line: { type: 'integer' },
    raw: { type: 'string', example: '42.50 USD' },
    wellFormed: { type: 'boolean' },
  },
};

export const REJECTED_SCHEMA = {
  type: 'object',
  properties: {
    reason: {
      type: 'string',
      enum: [
        'UnknownCurrency',
        'ExchangeRate',
        'DecimalShift',
        'AmbiguousFormat',
        'PrecisionMismatch',
        'OutOfRange',
        'Negative',
      ],
    },
    message: { type: 'string' },
    raw: { type: 'string' },
    line: { type: 'integer' },
    keyword: { type: 'string' },
    currency: { type: 'string' },
  },
};

/**
 * Error response body for extraction failures
 */
export const EXTRACTION_ERROR_SCHEMA = {
  type: 'object',
  properties: {
    message: { type: 'string', example: 'No total keyword found' },
    category: { type: 'string', enum: ['InvalidInput', 'NotFound', 'Ambiguous', 'Internal'] },
    candidates: { type: 'array', items: CANDIDATE_SCHEMA },
    rejected: { type: 'array', items: REJECTED_SCHEMA },
    issues: { type: 'array', items: { type: 'string' } },
  },
};

export const EXTRACT_TOTAL_RESPONSE_SCHEMA = {
  200: {
    description: 'Total found',
    type: 'object',
    properties: {
      total: {
        type: 'object',
        properties: {
          amount: { type: 'integer' },
          currency: { type: 'string' },
          value: { type: 'string', description: 'Decimal rendering', example: '42.50' },
        },
      },
      candidate: CANDIDATE_SCHEMA,
      rejected: { type: 'array', items: REJECTED_SCHEMA },
    },
  },
  400: { description: 'Invalid input', ...EXTRACTION_ERROR_SCHEMA },
  404: { description: 'No total found', ...EXTRACTION_ERROR_SCHEMA },
  409: { description: 'Conflicting totals', ...EXTRACTION_ERROR_SCHEMA },
  500: { description: 'Internal error', ...EXTRACTION_ERROR_SCHEMA },
};

export const EXAMPLE_RECEIPT = [
  'CAFE CENTRAL',
  'Espresso            3.20 USD',
  'Croissant           4.10 USD',
  'SUBTOTAL            7.30 USD',
  'TAX                 0.60 USD',
  'TOTAL               7.90 USD',
].join('\n');

export const EXAMPLE_INVOICE_DE = [
  'Rechnung 2024-118',
  'Zwischensumme      1.180,00 EUR',
  'MwSt 19%             224,20 EUR',
  'Gesamtbetrag       1.404,20 EUR',
].join('\n');
