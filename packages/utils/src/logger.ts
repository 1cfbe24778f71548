/**
 * Logger
 *
 * Pino-based structured logger shared by every package.
 * Always writes to stderr: stdout belongs to the rendered media.
 */

import { destination, pino, stdTimeFunctions, type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export interface CreateLoggerOptions {
  level?: string;
  /** Pretty-print through pino-pretty. Defaults to whether stderr is a TTY. */
  pretty?: boolean;
}

const STDERR_FD = 2;

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const level = options.level ?? process.env['LOG_LEVEL'] ?? 'warn';
  const pretty = options.pretty ?? process.stderr.isTTY === true;

  const base: LoggerOptions = {
    level,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: stdTimeFunctions.isoTime,
    base: {
      service: 'termplay',
    },
  };

  if (pretty) {
    return pino({
      ...base,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: STDERR_FD,
          colorize: true,
          ignore: 'pid,hostname,service',
        },
      },
    });
  }

  return pino(base, destination({ dest: STDERR_FD, sync: true }));
}

/**
 * Logger that drops everything. Used where a caller passes none.
 */
export const silentLogger: Logger = pino({ level: 'silent' });
