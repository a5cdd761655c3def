import type { Logger } from './logger.js';
import type { ExtractorConfig } from '../config.js';

/**
 * Logging options for controlling verbosity of extraction logs
 */
export interface LoggingOptions {
  /**
   * Maximum number of items to log in arrays (candidates, rejections)
   * Set to 0 to skip logging the array entirely
   * Default: 10
   */
  maxArrayItems?: number;

  /**
   * Maximum depth for nested object logging
   * Set to 0 to log only the type/count
   * Set to 1 to log top-level properties
   * Default: 3
   */
  maxDepth?: number;

  /**
   * Whether to log the OCR text itself
   * false = never log the text
   * true = log the text, truncated to 500 characters
   * "summary" = log only length, line count and a short preview
   * Default: "summary"
   */
  logText?: boolean | 'summary';

  /**
   * Specific operations to suppress logging for
   * Examples: ["extractTotal"]
   */
  silentOperations?: string[];
}

/**
 * ExtractionContext
 * Context passed to extraction operations containing injected dependencies
 */
export interface ExtractionContext {
  /** Optional logger instance */
  logger?: Logger;

  /**
   * Optional logging configuration for this operation
   * Default: { logText: "summary", maxArrayItems: 10, maxDepth: 3 }
   */
  loggingOptions?: LoggingOptions;

  /**
   * Optional operation name for context-aware logging
   * Used to match against silentOperations
   */
  operationName?: string;

  /** Extractor configuration overrides, merged over DEFAULT_EXTRACTOR_CONFIG */
  config?: Partial<ExtractorConfig>;
}
