/**
 * Logger Service
 *
 * Structured logging with Pino.
 *
 * Log Levels:
 * - fatal: Unrecoverable failure
 * - error: Error conditions
 * - warn: Warning conditions (rate limiting, rejected keys)
 * - info: Informational messages (default)
 * - debug: Request tracing (default with NODE_ENV=development)
 * - trace: Very detailed tracing
 */

import pino from 'pino';

// =============================================================================
// Configuration
// =============================================================================

const nodeEnv = process.env.NODE_ENV;
const isTest = nodeEnv === 'test' || process.env.VITEST !== undefined;
const isDevelopment = nodeEnv === 'development' && !isTest;
const logLevel = process.env.LOG_LEVEL || (isTest ? 'silent' : isDevelopment ? 'debug' : 'info');

// =============================================================================
// Logger Instance
// =============================================================================

export const logger = pino({
  level: logLevel,
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  base: {
    app: 'wallhaven-api-client',
  },
});

export type Logger = pino.Logger;

// =============================================================================
// Child Loggers
// =============================================================================

/**
 * Create a child logger with service context
 */
export function createServiceLogger(service: string): Logger {
  return logger.child({ service });
}

export const clientLogger = createServiceLogger('wallhaven');

export default logger;
