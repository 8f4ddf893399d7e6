/**
 * @fileoverview Pino logger shared by the analysis pipeline. The HTTP server
 * builds its own request logger from the same options.
 */

import { pino, type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export function loggerOptions(level: LogLevel): LoggerOptions {
  return {
    level,
    base: { service: 'street-ranking' },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

export function createLogger(level: LogLevel): Logger {
  return pino(loggerOptions(level));
}

/** Logger that discards everything, for tests and library use. */
export const silentLogger: Logger = pino({ level: 'silent' });

export type { Logger };
