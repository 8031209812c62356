/**
 * Logger utility
 */

import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
  name?: string;
}

export type Logger = pino.Logger;

/**
 * Create a logger instance
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'honeytrap',
    level: options.level ?? 'info',
    transport: options.pretty
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  });
}

/**
 * Logger that drops everything; the default for components built without one.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
