import pino from 'pino';

/**
 * Service logger using Pino
 *
 * - Structured JSON in production
 * - Pretty printing in development
 * - Silent under the test runner unless LOG_LEVEL says otherwise
 */

const isDevelopment = process.env.NODE_ENV !== 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

export const logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : 'info'),

  // Pretty print in development, JSON in production
  transport: isDevelopment && !isTest ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss.l',
      ignore: 'pid,hostname',
      singleLine: false,
    },
  } : undefined,

  base: {
    env: process.env.NODE_ENV || 'development',
  },
});

export type Logger = typeof logger;

/**
 * Create a child logger with specific context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
