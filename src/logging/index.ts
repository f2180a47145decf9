/**
 * Scoped console logger
 *
 * Every module gets a logger tagged with its scope. All levels write to
 * stderr so stdout carries only command output. The level is process-wide.
 */

import type { LogLevel } from '../config';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function format(scope: string, message: string, context?: Record<string, unknown>): string {
  const suffix = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
  return `[${scope}] ${message}${suffix}`;
}

/**
 * Create a logger for a module
 *
 * @example
 * ```typescript
 * const log = createLogger('resolve');
 * log.error('specimen already in another project', { name: 'SP1' });
 * // [resolve] specimen already in another project {"name":"SP1"}
 * ```
 */
export function createLogger(scope: string): Logger {
  return {
    debug(message, context) {
      if (enabled('debug')) console.error(format(scope, message, context));
    },
    info(message, context) {
      if (enabled('info')) console.error(format(scope, message, context));
    },
    warn(message, context) {
      if (enabled('warn')) console.error(format(scope, message, context));
    },
    error(message, context) {
      if (enabled('error')) console.error(format(scope, message, context));
    },
  };
}
