/**
 * Console Logger - default logger for the packaging services.
 *
 * Level-filtered console output with a bracketed service prefix.
 *
 * @packageDocumentation
 */

import { loadConfig } from '../config';

import type { Logger, LogLevel } from './logger';

/** Numeric log level for comparison */
const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const CONSOLE_METHODS: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

/**
 * Console-based logger with level filtering.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: number;

  constructor(
    private readonly prefix: string,
    level: LogLevel = 'info'
  ) {
    this.minLevel = LOG_LEVEL_ORDER[level];
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.write('error', message, context, error);
  }

  private write(
    level: LogLevel,
    message: string,
    context: Record<string, unknown> | undefined,
    error?: unknown
  ): void {
    if (LOG_LEVEL_ORDER[level] < this.minLevel) {
      return;
    }
    const args: unknown[] = [`[${this.prefix}] ${message}`];
    if (error) {
      args.push(error);
    }
    if (context) {
      args.push(context);
    }
    CONSOLE_METHODS[level](...args);
  }
}

/**
 * Logger for a service, at the level taken from the environment
 */
export function createLogger(prefix: string): Logger {
  return new ConsoleLogger(prefix, loadConfig().logLevel);
}
