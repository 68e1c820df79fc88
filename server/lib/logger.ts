import pino from 'pino';

/**
 * Structured Logger Configuration
 *
 * Provides consistent, structured logging across the pipeline and API.
 * Uses pino for JSON logging in production,
 * and pino-pretty for human-readable output in development.
 *
 * Log Levels:
 * - fatal: Startup cannot continue (e.g. invalid configuration)
 * - error: Error conditions
 * - warn: Stage failures and rejected input
 * - info: Normal operational messages
 * - debug: Stage transitions and rule evaluation
 */

const isDevelopment = process.env.NODE_ENV !== 'production';
const isTest = process.env.NODE_ENV === 'test';

// Configure log level from environment
const logLevel = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

// Configure transport for pretty printing in development
const transport = isDevelopment && !isTest
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
        singleLine: false,
      },
    }
  : undefined;

/**
 * Base logger configuration
 */
export const logger = pino({
  level: isTest ? 'silent' : logLevel,
  transport,
  base: {
    env: process.env.NODE_ENV,
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = pino.Logger;

/**
 * Create a child logger with additional context
 *
 * @example
 * const routingLogger = createLogger({ module: 'routing' });
 * routingLogger.info({ decision: 'RouteSTP' }, 'Claim routed');
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

/**
 * Pre-configured loggers for the pipeline modules
 */
export const loggers = {
  config: createLogger({ module: 'config' }),
  compliance: createLogger({ module: 'compliance' }),
  routing: createLogger({ module: 'routing' }),
  classifier: createLogger({ module: 'classifier' }),
  documents: createLogger({ module: 'documents' }),
  pipeline: createLogger({ module: 'pipeline' }),
};

/**
 * Error logging helper with stack trace handling
 */
export function logError(
  loggerInstance: Logger,
  error: unknown,
  message: string,
  context?: Record<string, unknown>
) {
  const err = error instanceof Error ? error : new Error(String(error));
  loggerInstance.error(
    {
      err: {
        message: err.message,
        stack: err.stack,
        name: err.name,
      },
      ...context,
    },
    message
  );
}

/**
 * Performance timing helper
 */
export function logTiming(
  loggerInstance: Logger,
  operation: string,
  startTime: number,
  context?: Record<string, unknown>
) {
  const duration = Date.now() - startTime;
  loggerInstance.info(
    {
      operation,
      durationMs: duration,
      ...context,
    },
    `${operation} completed in ${duration}ms`
  );
}
