import pino, { type Logger } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Level from the process environment. An unknown value falls back to
 * `info`; env validation reports it later.
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  return value && isLogLevel(value) ? value : 'info';
}

/**
 * Root logger. Writes to stderr so stdout stays free for CLI output.
 */
export const logger: Logger = pino(
  {
    name: 'md-narrator',
    level: resolveLogLevel(process.env.LOG_LEVEL)
  },
  pino.destination(2)
);

// Service loggers keep their own level once created
const serviceLoggers: Logger[] = [];

export function createLogger(bindings: { service: string }): Logger {
  const child = logger.child(bindings);
  serviceLoggers.push(child);
  return child;
}

/**
 * Applies a level to the root logger and every service logger.
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
  for (const child of serviceLoggers) {
    child.level = level;
  }
}

export type { Logger };
