/**
 * Input validation for extractTotal
 */

import { z } from 'zod';
import type { LanguageCode } from './types/index.js';
import { isSupportedLanguage } from './keywords/index.js';

export interface ExtractionInput {
  text: string;
  /** Omitted means every supported language */
  languages?: LanguageCode[];
}

/**
 * Build the input schema
 * - text: required, not blank, at least one letter or digit, at most maxTextLength characters
 * - languages: optional, non-empty, each a supported language code
 */
export function createExtractionInputSchema(maxTextLength: number): z.ZodType<ExtractionInput> {
  return z.object({
    text: z
      .string({ message: 'text must be a string' })
      .max(maxTextLength, `text exceeds ${maxTextLength} characters`)
      .refine((val) => val.trim().length > 0, 'text is empty')
      .refine((val) => /[\p{L}\p{N}]/u.test(val), 'text contains no letters or digits'),
    languages: z
      .array(
        z.string().refine((val) => isSupportedLanguage(val), {
          message: 'Unsupported language code',
        })
      )
      .min(1, 'At least one language is required')
      .optional(),
  });
}

export function safeValidateExtractionInput(input: unknown, maxTextLength: number) {
  return createExtractionInputSchema(maxTextLength).safeParse(input);
}
