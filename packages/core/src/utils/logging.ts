/**
 * Logging utilities: safe serialization of values and errors
 */

import { ExtractionError, ValidationError } from '../errors/index.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Safely serialize objects for logging
 * Circular or otherwise unserializable values become a marker string
 */
export function serializeForLog(obj: unknown): unknown {
  try {
    if (obj === null || obj === undefined) return obj;
    if (typeof obj !== 'object') return obj;
    return JSON.parse(JSON.stringify(obj));
  } catch (err) {
    const errorMsg = err instanceof Error ? err.message : 'unknown error';
    return `[Unserializable object: ${errorMsg}]`;
  }
}

/**
 * Truncate a string to a maximum length, appending "..." when cut
 */
export function truncateString(str: string, maxLength: number = 500): string {
  if (str.length <= maxLength) return str;
  return str.substring(0, maxLength) + '...';
}

/**
 * Create a log object from an error
 * Extraction and validation errors keep their category and details
 */
export function errorToLog(error: unknown): Record<string, unknown> {
  if (error instanceof ExtractionError) {
    return {
      type: error.name,
      message: error.message,
      category: error.category,
      candidates: error.result.candidates.length,
      rejected: error.result.rejected.length,
    };
  }

  if (error instanceof ValidationError) {
    return {
      type: error.name,
      message: error.message,
      details: serializeForLog(error.details),
    };
  }

  if (error instanceof Error) {
    return {
      type: error.constructor.name,
      message: error.message,
      stack: error.stack,
    };
  }

  const serialized = serializeForLog(error);
  if (isRecord(serialized)) return serialized;

  return {
    type: typeof error,
    message: String(error),
  };
}
