// Domain types
export * from './types/index.js';

// Interfaces and contracts
export * from './interfaces/index.js';

// Errors
export { ExtractionError, ValidationError } from './errors/index.js';

// Configuration and input validation
export {
  DEFAULT_EXTRACTOR_CONFIG,
  ExtractorConfigSchema,
  resolveExtractorConfig,
  safeResolveExtractorConfig,
} from './config.js';
export type { AmountRange, ExtractorConfig, ConfigResolution } from './config.js';
export { createExtractionInputSchema, safeValidateExtractionInput } from './validation.js';
export type { ExtractionInput } from './validation.js';

// Reference data
export * from './currency/index.js';
export * from './keywords/index.js';

// Parsing and extraction
export * from './parsing/index.js';
export * from './extraction/index.js';

// Utilities
export { serializeForLog, truncateString, errorToLog, formatZodIssues } from './utils/index.js';
export {
  isSilentOperation,
  getLoggingOptions,
  truncateForLogging,
  summarizeText,
  safeLog,
} from './utils/index.js';
export type { LogLevel } from './utils/index.js';
