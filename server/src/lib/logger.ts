import pino from 'pino';
import type { Logger } from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

const logger = pino({
  level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : isProduction ? 'info' : 'debug'),
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }),
});

/**
 * Creates a child logger scoped to a single HTTP request.
 */
export function createRequestLogger(
  requestId: string,
  extra?: Record<string, unknown>,
): Logger {
  return logger.child({ requestId, ...extra });
}

/**
 * Creates a child logger for a long-lived component (analyzer, research, ...).
 */
export function createComponentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type { Logger };
export default logger;
