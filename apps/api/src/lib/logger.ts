import { type Logger, type LoggerOptions, pino } from 'pino';

export type { Logger };

export function loggerOptions(level = process.env.LOG_LEVEL): LoggerOptions {
  return {
    level: (level ?? 'info').trim() || 'info',
    base: { service: 'statbridge-api' },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

/** Process-wide logger for pipelines and the CLI; the HTTP server builds its own from the same options. */
export const logger: Logger = pino(loggerOptions());
