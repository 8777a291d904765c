/**
 * Standardized Logger Utility
 *
 * Simple wrapper around Pino logger with helper functions
 * Avoids creating yet another logger interface - just use Pino!
 */

import pino from 'pino';

export type { Logger } from 'pino';

export type LogFormat = 'json' | 'pretty';

export interface CreateLoggerOptions extends pino.LoggerOptions {
  format?: LogFormat;
}

/**
 * Create a Pino logger for the image analysis server.
 *
 * Output always goes to stderr: stdout carries JSON-RPC when the stdio transport is active.
 */
export function createLogger(options: CreateLoggerOptions = {}): pino.Logger {
  const { format = 'json', ...loggerOptions } = options;

  const baseOptions: pino.LoggerOptions = {
    name: 'image-analysis-mcp',
    level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'development' ? 'debug' : 'info'),
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    ...loggerOptions,
  };

  if (format === 'pretty') {
    return pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: 2,
          colorize: false,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(baseOptions, pino.destination(2));
}

/**
 * Performance timer interface
 */
export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => void;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => void;
  checkpoint: (label: string, additionalContext?: Record<string, unknown>) => number;
}

/**
 * Create a performance timer for an operation - functional approach
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
        {
          operation,
          duration_ms: duration,
          ...context,
          ...additionalContext,
        },
        `Completed ${operation} in ${duration}ms`,
      );
    },

    error(error: unknown, additionalContext: Record<string, unknown> = {}): void {
      const duration = Date.now() - startTime;

      logger.error(
        {
          operation,
          duration_ms: duration,
          error: error instanceof Error ? error.message : String(error),
          ...context,
          ...additionalContext,
        },
        `Failed ${operation} after ${duration}ms`,
      );
    },

    checkpoint(label: string, additionalContext: Record<string, unknown> = {}): number {
      const elapsed = Date.now() - startTime;

      logger.debug(
        {
          operation,
          checkpoint: label,
          elapsed_ms: elapsed,
          ...context,
          ...additionalContext,
        },
        `${operation} checkpoint: ${label} at ${elapsed}ms`,
      );

      return elapsed;
    },
  };
}
