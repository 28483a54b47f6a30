import pino, { type Logger, type LoggerOptions } from 'pino';
import { config } from './config.js';

/**
 * Logger options shared by Fastify and the engine.
 * Structured JSON in production, pino-pretty in development.
 */
export function loggerOptions(): LoggerOptions {
  return {
    level: config.logLevel,
    transport:
      config.nodeEnv === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
            },
          }
        : undefined,
  };
}

let logger: Logger | null = null;

/** Process-wide logger for code outside a request */
export function getLogger(): Logger {
  if (!logger) {
    logger = pino(loggerOptions()).child({ service: 'conflict-engine' });
  }
  return logger;
}
