/**
 * Logging helpers for extraction
 *
 * OCR text can run to hundreds of kilobytes and a noisy page yields long
 * candidate lists, so everything logged through safeLog is summarised or
 * truncated according to LoggingOptions.
 */

import type { ExtractionContext, LoggingOptions } from '../interfaces/index.js';
import type { Logger } from '../interfaces/logger.js';
import { truncateString } from './logging.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const DEFAULT_LOGGING_OPTIONS: Required<LoggingOptions> = {
  maxArrayItems: 10,
  maxDepth: 3,
  logText: 'summary',
  silentOperations: [],
};

const TEXT_PREVIEW_LENGTH = 80;
const TEXT_MAX_LENGTH = 500;

/**
 * Check if logging should be suppressed for this operation
 */
export function isSilentOperation(ctx: ExtractionContext, defaultSilentOps: string[] = []): boolean {
  const operationName = ctx.operationName;
  if (!operationName) return false;

  const silentOps = ctx.loggingOptions?.silentOperations ?? defaultSilentOps;
  return silentOps.includes(operationName);
}

/**
 * Get merged logging options with defaults
 */
export function getLoggingOptions(ctx: ExtractionContext): Required<LoggingOptions> {
  return {
    ...DEFAULT_LOGGING_OPTIONS,
    ...ctx.loggingOptions,
  };
}

/**
 * Truncate a value for logging
 * Respects maxDepth and maxArrayItems
 */
export function truncateForLogging(
  value: unknown,
  options: Required<LoggingOptions>,
  currentDepth: number = 0
): unknown {
  if (currentDepth >= options.maxDepth) {
    if (Array.isArray(value)) return `[Array: ${value.length} items]`;
    if (value !== null && typeof value === 'object') {
      return `[Object: ${Object.keys(value).length} keys]`;
    }
    return value;
  }

  if (Array.isArray(value)) {
    if (options.maxArrayItems === 0) {
      return `[Array: ${value.length} items (truncated)]`;
    }

    const mapped = value
      .slice(0, options.maxArrayItems)
      .map((item: unknown) => truncateForLogging(item, options, currentDepth + 1));

    if (value.length > options.maxArrayItems) {
      return [...mapped, `... and ${value.length - options.maxArrayItems} more items`];
    }
    return mapped;
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = truncateForLogging(entry, options, currentDepth + 1);
    }
    return result;
  }

  return value;
}

/**
 * Describe OCR text without logging its content
 */
export function summarizeText(text: string): { length: number; lines: number; preview: string } {
  return {
    length: text.length,
    lines: text === '' ? 0 : text.split(/\r?\n/).length,
    preview: truncateString(text.replace(/\s+/g, ' ').trim(), TEXT_PREVIEW_LENGTH),
  };
}

/**
 * Log through the context's logger, honouring its LoggingOptions
 * A `text` entry in data is dropped, summarised or truncated per `logText`
 */
export function safeLog(
  logger: Logger | undefined,
  level: LogLevel,
  message: string,
  data: Record<string, unknown>,
  ctx: ExtractionContext,
  silentOperationNames: string[] = []
): void {
  if (!logger) return;
  if (isSilentOperation(ctx, silentOperationNames)) return;

  const options = getLoggingOptions(ctx);
  const processed: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    if (key === 'text' && typeof value === 'string') {
      if (options.logText === false) continue;
      processed.text =
        options.logText === 'summary' ? summarizeText(value) : truncateString(value, TEXT_MAX_LENGTH);
      continue;
    }

    processed[key] =
      value !== null && typeof value === 'object' && !key.startsWith('_')
        ? truncateForLogging(value, options)
        : value;
  }

  if (ctx.operationName && !('operation' in processed)) {
    processed.operation = ctx.operationName;
  }

  logger[level](message, processed);
}
