/**
 * Logger utility
 *
 * Thin wrapper around Pino. Logs always go to stderr so stdout carries only
 * command results.
 */

import { types } from 'node:util';
import pino from 'pino';

export type { Logger } from 'pino';

export interface LoggerConfig {
  level?: string;
  environment?: string;
}

const REDACT_PATHS = [
  'token',
  'authorization',
  'api_key',
  'apiKey',
  'headers.Authorization',
  '*.token',
  '*.api_key',
  '*.apiKey',
];

/**
 * Create a Pino logger with modelctl defaults
 */
export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const environment = config.environment ?? process.env.NODE_ENV;
  const isDevelopment = environment === 'development';

  const options: pino.LoggerOptions = {
    name: 'modelctl',
    level: config.level ?? process.env.LOG_LEVEL ?? (isDevelopment ? 'debug' : 'info'),
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  if (isDevelopment) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: 2,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          errorProps: 'stack,cause',
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

/**
 * Performance timer interface
 */
export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => void;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => void;
}

/**
 * Create a performance timer for an operation
 */
export function createTimer(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
): Timer {
  const startTime = Date.now();

  logger.debug({ operation, ...context }, `Starting ${operation}`);

  return {
    end(additionalContext: Record<string, unknown> = {}): void {
      const duration = Date.now() - startTime;

      logger.info(
        { operation, duration_ms: duration, ...context, ...additionalContext },
        `Completed ${operation} in ${duration}ms`,
      );
    },

    error(error: unknown, additionalContext: Record<string, unknown> = {}): void {
      const duration = Date.now() - startTime;

      logger.error(
        {
          operation,
          duration_ms: duration,
          error: types.isNativeError(error) ? error.message : String(error),
          ...context,
          ...additionalContext,
        },
        `Failed ${operation} after ${duration}ms`,
      );
    },
  };
}
