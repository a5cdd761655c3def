/**
 * Extractor configuration
 *
 * Every field has a default; callers pass a partial config on
 * ExtractionContext.config and it is merged over DEFAULT_EXTRACTOR_CONFIG.
 */

import { z } from 'zod';
import type { CurrencyCode } from './types/index.js';
import { isKnownCurrency } from './currency/index.js';
import { ValidationError } from './errors/index.js';
import { formatZodIssues } from './utils/zod-issues.js';

/**
 * Inclusive bounds in major units (dollars, not cents)
 */
export interface AmountRange {
  min: number;
  max: number;
}

export interface ExtractorConfig {
  /**
   * Currency for amounts written without a symbol or code
   * When unset, bare numbers never become candidates
   */
  defaultCurrency?: CurrencyCode;

  /**
   * Currency that breaks ties between conflicting candidates,
   * and wins shared symbols such as "$" or "kr"
   */
  preferredCurrency?: CurrencyCode;

  /** Lines after the keyword line that are searched for its amount */
  windowLines: number;

  /** Characters searched on each window line */
  windowChars: number;

  /** Longer texts are rejected as InvalidInput */
  maxTextLength: number;

  amountRanges: {
    /** Currencies with minor units */
    standard: AmountRange;
    /** Currencies without minor units (JPY, KRW...) */
    noDecimal: AmountRange;
  };

  /** Reject candidates that are a power of ten off a well-formed one */
  decimalShiftFilter: boolean;
}

export const DEFAULT_EXTRACTOR_CONFIG: Readonly<ExtractorConfig> = Object.freeze({
  windowLines: 2,
  windowChars: 64,
  maxTextLength: 200_000,
  amountRanges: Object.freeze({
    standard: Object.freeze({ min: 0.01, max: 1_000_000 }),
    noDecimal: Object.freeze({ min: 1, max: 100_000_000 }),
  }),
  decimalShiftFilter: true,
});

const CurrencyCodeSchema = z
  .string()
  .refine((code) => isKnownCurrency(code), { message: 'Unknown ISO 4217 currency code' });

const AmountRangeSchema = z
  .object({
    min: z.number().nonnegative(),
    max: z.number().positive(),
  })
  .refine((range) => range.min <= range.max, { message: 'min must not exceed max' });

export const ExtractorConfigSchema = z.object({
  defaultCurrency: CurrencyCodeSchema.optional(),
  preferredCurrency: CurrencyCodeSchema.optional(),
  windowLines: z.number().int().min(0).max(20),
  windowChars: z.number().int().min(8).max(1_000),
  maxTextLength: z.number().int().positive(),
  amountRanges: z.object({
    standard: AmountRangeSchema,
    noDecimal: AmountRangeSchema,
  }),
  decimalShiftFilter: z.boolean(),
});

export type ConfigResolution =
  | { ok: true; config: ExtractorConfig }
  | { ok: false; issues: string[] };

/**
 * Merge overrides over the defaults and validate, without throwing
 */
export function safeResolveExtractorConfig(overrides: Partial<ExtractorConfig> = {}): ConfigResolution {
  const merged = {
    ...DEFAULT_EXTRACTOR_CONFIG,
    ...overrides,
    amountRanges: {
      ...DEFAULT_EXTRACTOR_CONFIG.amountRanges,
      ...overrides.amountRanges,
    },
  };

  const result = ExtractorConfigSchema.safeParse(merged);
  if (!result.success) {
    return { ok: false, issues: formatZodIssues(result.error) };
  }
  return { ok: true, config: result.data };
}

/**
 * Merge overrides over the defaults and validate
 * Throws ValidationError listing every invalid field
 */
export function resolveExtractorConfig(overrides: Partial<ExtractorConfig> = {}): ExtractorConfig {
  const resolved = safeResolveExtractorConfig(overrides);
  if (!resolved.ok) {
    throw new ValidationError('Invalid extractor configuration', { issues: resolved.issues });
  }
  return resolved.config;
}
