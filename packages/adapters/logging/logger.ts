/**
 * Logger
 *
 * pino root logger for wizard hosts. Components derive their own loggers
 * with `logger.child({ component })`.
 */

import { pino, type Logger } from 'pino';

export interface CreateLoggerOptions {
  level?: string;
  /** Pretty-print through pino-pretty (development) */
  pretty?: boolean;
  name?: string;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'stepwise',
    level: options.level ?? 'info',
    transport: options.pretty
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  });
}
