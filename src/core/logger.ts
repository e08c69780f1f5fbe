/**
 * Minimal logging seam. Parsers, forms and renderers take a Logger in their
 * options; the default writes to the console with a `[formwright]` prefix.
 */

import { loadConfig, type LogLevel } from './config.js';

export interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  info: 0,
  warn: 1,
  error: 2,
  silent: 3,
};

/**
 * Create a console-backed logger that drops messages below `level`.
 */
export function createConsoleLogger(level: LogLevel = 'warn'): Logger {
  const enabled = (messageLevel: Exclude<LogLevel, 'silent'>): boolean =>
    LEVEL_ORDER[messageLevel] >= LEVEL_ORDER[level];

  return {
    info(message, context) {
      if (enabled('info')) {
        console.info(`[formwright] ${message}`, context ?? '');
      }
    },
    warn(message, context) {
      if (enabled('warn')) {
        console.warn(`[formwright] WARNING: ${message}`, context ?? '');
      }
    },
    error(message, context) {
      if (enabled('error')) {
        console.error(`[formwright] ERROR: ${message}`, context ?? '');
      }
    },
  };
}

let sharedLogger: Logger | undefined;

/**
 * The console logger at the level configured in the environment, created on
 * first use.
 */
export function defaultLogger(): Logger {
  sharedLogger ??= createConsoleLogger(loadConfig().logLevel);
  return sharedLogger;
}
