/**
 * Structured Logging Module
 *
 * pino-based structured logging with scoped child loggers.
 * JSON output in production, pino-pretty everywhere else.
 * Under the node:test runner the default level is 'silent'.
 */

import pino, { Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

let rootLogger: Logger | null = null;

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && LOG_LEVELS.some((level) => level === value);
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  if (isLogLevel(fromEnv)) return fromEnv;
  return process.env.NODE_TEST_CONTEXT ? 'silent' : 'info';
}

/**
 * Initialize the root logger. Call once at startup.
 * Loggers handed out earlier keep writing through the old root.
 */
export function initLogger(config: LoggerConfig = {}): Logger {
  const level = config.level ?? defaultLevel();
  const pretty = config.pretty ?? (process.env.NODE_ENV !== 'production' && !process.env.NODE_TEST_CONTEXT);

  if (pretty) {
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

/** Get the root logger, creating it with defaults on first use. */
export function getRootLogger(): Logger {
  return rootLogger ?? initLogger();
}

/**
 * Get a scoped logger for a specific module.
 */
export function getLogger(module: string): Logger {
  return getRootLogger().child({ module });
}
