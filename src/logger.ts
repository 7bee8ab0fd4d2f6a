/**
 * Structured Logging Module
 *
 * pino-based structured logging with one child logger per module.
 * JSON output in production, pino-pretty everywhere else.
 */

import pino, { Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerConfig {
  level?: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

let rootLogger: Logger | null = null;
const moduleLoggers = new Set<Logger>();

function levelFromEnv(): LogLevel | undefined {
  const raw = process.env.LOG_LEVEL;
  return LOG_LEVELS.find((l) => l === raw);
}

/**
 * Initialize the root logger. Module loggers are created at import time, so a
 * later call only applies the new level to the existing root and its children.
 */
export function initLogger(config: LoggerConfig = {}): Logger {
  const level = config.level ?? levelFromEnv() ?? 'info';
  if (rootLogger) {
    rootLogger.level = level;
    for (const child of moduleLoggers) child.level = level;
    return rootLogger;
  }
  const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

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

/**
 * Get the root logger instance, initializing it on first use.
 */
export function getRootLogger(): Logger {
  return rootLogger ?? initLogger();
}

/**
 * Get a scoped logger for a specific module.
 */
export function getLogger(module: string): Logger {
  const child = getRootLogger().child({ module });
  moduleLoggers.add(child);
  return child;
}
