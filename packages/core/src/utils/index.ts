/**
 * Shared utilities
 */

export { serializeForLog, truncateString, errorToLog } from './logging.js';
export {
  isSilentOperation,
  getLoggingOptions,
  truncateForLogging,
  summarizeText,
  safeLog,
} from './logging-helpers.js';
export type { LogLevel } from './logging-helpers.js';
export { formatZodIssues } from './zod-issues.js';
