import pino from 'pino';

const logLevel = process.env.LOG_LEVEL ?? 'info';

export const logger = pino({
  level: logLevel,
  transport:
    process.env.NODE_ENV === 'development'
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
    service: 'review-api',
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = pino.Logger;

export interface ErrorContext {
  requestId?: string;
  method?: string;
  url?: string;
  contentItemId?: string;
  [key: string]: unknown;
}

export function logError(error: Error, context?: ErrorContext, customLogger?: Logger): void {
  const log = customLogger ?? logger;
  log.error(
    {
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      ...context,
    },
    `Error: ${error.message}`
  );
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
