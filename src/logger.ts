/**
 * Structured Logging Module
 *
 * pino root logger with one child logger per module.
 * JSON output in production, pino-pretty everywhere else.
 */

import pino, { Logger } from 'pino';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

let rootLogger: Logger | null = null;

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function envLevel(): LogLevel | undefined {
  const fromEnv = process.env.LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : undefined;
}

/**
 * Initialize the root logger. Call once at startup, after the config is loaded.
 * Calling it again replaces the root logger; child loggers created earlier keep
 * the previous settings, so modules ask for their logger when they first log
 * rather than at import time.
 */
export function initLogger(config: LoggerConfig = {}): Logger {
  const level = config.level ?? envLevel() ?? 'info';
  const pretty = config.pretty ?? process.env.NODE_ENV !== 'production';

  if (pretty && level !== 'silent') {
    rootLogger = pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
          messageFormat: '[{module}] {msg}',
        },
      },
    });
  } else {
    rootLogger = pino({ level });
  }
  return rootLogger;
}

/**
 * Get the root logger instance, initializing it with defaults if needed.
 */
export function getRootLogger(): Logger {
  return rootLogger ?? initLogger();
}

/**
 * Get a scoped logger for a specific module.
 */
export function getLogger(module: string): Logger {
  return getRootLogger().child({ module });
}
