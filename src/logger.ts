/**
 * Structured logging using pino
 */

import pino, { type Logger as PinoLogger } from 'pino';

export type Logger = PinoLogger;

export type LoggerLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerOptions {
  level?: LoggerLevel;
}

const LEVELS: readonly LoggerLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLoggerLevel(value: string): value is LoggerLevel {
  return LEVELS.some(level => level === value);
}

/**
 * Log level from LOG_LEVEL, defaulting to info
 */
export function getLogLevel(): LoggerLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLoggerLevel(envLevel)) {
    return envLevel;
  }
  return 'info';
}

/**
 * Create a logger for a component
 *
 * @example
 * ```typescript
 * const logger = createLogger('reconciler');
 * logger.info({ resourceType: 'users' }, 'Scan completed');
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): Logger {
  return pino({
    name: component,
    level: options.level ?? getLogLevel(),
  });
}

export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
