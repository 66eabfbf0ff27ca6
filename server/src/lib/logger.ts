import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

function defaultLevel(): string {
  if (isProduction) return 'info';
  if (isTest) return 'silent';
  return 'debug';
}

const logger = pino({
  level: process.env.LOG_LEVEL ?? defaultLevel(),
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }),
});

export type Logger = pino.Logger;

/**
 * Creates a child logger scoped to a single pipeline run.
 */
export function createRunLogger(
  runId: string,
  extra?: Record<string, unknown>,
): Logger {
  return logger.child({ runId, ...extra });
}

export default logger;
