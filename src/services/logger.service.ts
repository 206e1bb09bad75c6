/**
 * Logger Service
 *
 * Structured logging with Pino.
 *
 * Log Levels:
 * - fatal: Application crash
 * - error: Error conditions
 * - warn: Warning conditions
 * - info: Informational messages (default)
 * - debug: Debug information
 * - trace: Very detailed tracing
 */

import pino from 'pino';

// =============================================================================
// Configuration
// =============================================================================

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;
const isDevelopment = process.env.NODE_ENV !== 'production' && !isTest;
const logLevel = process.env.LOG_LEVEL || (isTest ? 'silent' : 'info');

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
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname,app,service,context',
        },
      }
    : undefined,
  base: {
    app: 'manga-organizer',
  },
});

// =============================================================================
// Child Loggers for Services
// =============================================================================

/**
 * Create a child logger with service context
 */
export function createServiceLogger(service: string) {
  return logger.child({ service });
}

export const archiveLogger = createServiceLogger('archive');
export const organizerLogger = createServiceLogger('organizer');
export const batchLogger = createServiceLogger('batch');
export const configLogger = createServiceLogger('config');
export const promptLogger = createServiceLogger('prompt');

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Log an error with context
 */
export function logError(context: string, error: unknown, metadata?: Record<string, unknown>) {
  const errorMessage = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  logger.error({
    context,
    error: errorMessage,
    stack,
    ...metadata,
  }, `[${context}] ${errorMessage}`);
}
