export type { Logger } from './logger.js';
export type { ExtractionContext, LoggingOptions } from './extraction-context.js';
