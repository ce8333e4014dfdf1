/**
 * Structured Logging Module
 *
 * pino-based structured logging with scoped child loggers.
 * JSON output in production, pino-pretty output during development.
 */

import pino, { Logger } from 'pino';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

let rootLogger: Logger | null = null;
const moduleLoggers: Logger[] = [];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function envLevel(): LogLevel | undefined {
  const value = process.env.LOG_LEVEL;
  return isLogLevel(value) ? value : undefined;
}

function createRootLogger(config: LoggerConfig): Logger {
  const level = config.level ?? envLevel() ?? 'info';
  const pretty = config.pretty ?? process.env.NODE_ENV !== 'production';

  if (pretty) {
    return pino({
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
  }
  return pino({ level });
}

/**
 * Initialize the root logger. Call once at startup.
 * Module loggers are created at import time, so a later call only
 * changes the level of the loggers already handed out.
 */
export function initLogger(config: LoggerConfig = {}): Logger {
  if (!rootLogger) {
    rootLogger = createRootLogger(config);
    return rootLogger;
  }
  const level = config.level ?? envLevel() ?? rootLogger.level;
  rootLogger.level = level;
  for (const child of moduleLoggers) {
    child.level = level;
  }
  return rootLogger;
}

/** Get the root logger instance, creating it on first use. */
export function getRootLogger(): Logger {
  return rootLogger ?? initLogger();
}

/**
 * Get a scoped logger for a specific module.
 * Auto-initializes if not already initialized.
 */
export function getLogger(module: string): Logger {
  const child = getRootLogger().child({ module });
  moduleLoggers.push(child);
  return child;
}

/** Message of an unknown thrown value, for the `error` log field. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
