/**
 * Structured Logger
 * Single pino root logger; services take a child with their component name
 */

import { pino, type Logger } from 'pino';

export type { Logger } from 'pino';

export function createLogger(level: string = process.env.LOG_LEVEL ?? 'info'): Logger {
  return pino({
    level,
    base: { service: 'paid-access-core' },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

let rootLogger: Logger | null = null;

/**
 * Get the process-wide logger (lazy initialization)
 */
export function getLogger(): Logger {
  if (rootLogger === null) {
    rootLogger = createLogger();
  }
  return rootLogger;
}
