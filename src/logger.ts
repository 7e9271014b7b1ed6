import pino, { type Logger } from 'pino';

export type { Logger };

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Create the process logger.
 *
 * Logs go to stderr: stdout carries command output (the path printed by
 * `treehop cd` is read by a shell function).
 */
export function createLogger(level: LogLevel = 'warn'): Logger {
  return pino(
    {
      name: 'treehop',
      level,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination(2)
  );
}

/** Logger that drops everything, for tests and library callers */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
