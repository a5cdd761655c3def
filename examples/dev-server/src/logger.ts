import type { FastifyBaseLogger } from 'fastify';
import type { Logger } from '@totalscan/core';

/**
 * Adapt Fastify's pino logger to the extractor's Logger interface
 * Meta fields are merged into the log line next to the message
 */
export function wrapPinoLogger(pinoLogger: FastifyBaseLogger): Logger {
  return {
    debug: (message: string, meta?: Record<string, unknown>) => {
      pinoLogger.debug({ msg: message, ...meta });
    },
    info: (message: string, meta?: Record<string, unknown>) => {
      pinoLogger.info({ msg: message, ...meta });
    },
    warn: (message: string, meta?: Record<string, unknown>) => {
      pinoLogger.warn({ msg: message, ...meta });
    },
    error: (message: string, meta?: Record<string, unknown>) => {
      pinoLogger.error({ msg: message, ...meta });
    },
  };
}
