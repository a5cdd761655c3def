/**
 * Dev server configuration, read from the environment
 *
 * PORT                        listen port (3000)
 * HOST                        listen address (0.0.0.0)
 * LOG_LEVEL                   pino level (info)
 * EXTRACT_DEFAULT_CURRENCY    currency for amounts without a symbol or code
 * EXTRACT_PREFERRED_CURRENCY  currency that breaks ties and wins shared symbols
 * EXTRACT_LANGUAGES           comma separated keyword languages (all when unset)
 */

import { z } from 'zod';
import {
  ValidationError,
  formatZodIssues,
  isKnownCurrency,
  isSupportedLanguage,
  type ExtractorConfig,
  type LanguageCode,
} from '@totalscan/core';

const optionalCurrency = z
  .string()
  .trim()
  .toUpperCase()
  .refine((val) => isKnownCurrency(val), 'Unknown ISO 4217 currency code')
  .optional();

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  EXTRACT_DEFAULT_CURRENCY: optionalCurrency,
  EXTRACT_PREFERRED_CURRENCY: optionalCurrency,
  EXTRACT_LANGUAGES: z
    .string()
    .optional()
    .transform((val) =>
      val
        ? val
            .split(',')
            .map((code) => code.trim().toLowerCase())
            .filter((code) => code.length > 0)
        : undefined
    )
    .refine(
      (codes) => codes === undefined || codes.every((code) => isSupportedLanguage(code)),
      'EXTRACT_LANGUAGES lists an unsupported language'
    ),
});

export type LogLevel = z.infer<typeof EnvSchema>['LOG_LEVEL'];

export interface DevServerConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  /** Overrides passed to every extraction */
  extractor: Partial<ExtractorConfig>;
  /** Languages used when a request names none */
  languages?: LanguageCode[];
}

/**
 * Read and validate the configuration
 * Throws ValidationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DevServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError('Invalid dev server environment', {
      issues: formatZodIssues(parsed.error),
    });
  }

  const data = parsed.data;
  const extractor: Partial<ExtractorConfig> = {};
  if (data.EXTRACT_DEFAULT_CURRENCY) extractor.defaultCurrency = data.EXTRACT_DEFAULT_CURRENCY;
  if (data.EXTRACT_PREFERRED_CURRENCY) extractor.preferredCurrency = data.EXTRACT_PREFERRED_CURRENCY;

  return {
    port: data.PORT,
    host: data.HOST,
    logLevel: data.LOG_LEVEL,
    extractor,
    ...(data.EXTRACT_LANGUAGES ? { languages: data.EXTRACT_LANGUAGES } : {}),
  };
}
