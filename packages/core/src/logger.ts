/**
 * Centralized pino logger.
 *
 * Singleton root logger; context via child loggers (getLogger('subsystem')).
 * Everything goes to stderr so stdout stays free for command output.
 */

import pino from 'pino';
import type { LogLevel } from './config.js';
import { DEFAULT_LOG_LEVEL } from './config.js';

let rootLogger: pino.Logger | null = null;
let fallbackLogger: pino.Logger | null = null;

export interface LoggerConfig {
  level: LogLevel;
}

function createLogger(level: LogLevel): pino.Logger {
  return pino(
    {
      level,
      formatters: {
        level: (label: string) => ({ level: label.toUpperCase() }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
}

/**
 * Initialize the root logger. Call once at startup.
 */
export function initLogger(config: LoggerConfig): pino.Logger {
  rootLogger = createLogger(config.level);
  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger: returns a warn-level stderr logger
 * so library code and tests never crash.
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    if (!fallbackLogger) fallbackLogger = createLogger(DEFAULT_LOG_LEVEL);
    return fallbackLogger.child({ subsystem });
  }
  return rootLogger.child({ subsystem });
}

/** Whether initLogger has been called since the last close */
export function isLoggerInitialized(): boolean {
  return rootLogger !== null;
}

/**
 * Flush and close the logger. Call during graceful shutdown.
 */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
}
