/**
 * Structured Logging Module
 *
 * pino-based logging with scoped child loggers. Pretty output for
 * interactive use, plain JSON lines in production and under test.
 */

import pino, { type Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

let rootLogger: Logger | null = null;

function levelFromEnv(): LogLevel | undefined {
  const raw = process.env.LOG_LEVEL;
  return LOG_LEVELS.find((l) => l === raw);
}

/**
 * Initialize the root logger. Call once at startup; later calls replace it.
 */
export function initLogger(config: LoggerConfig = {}): Logger {
  const level = config.level ?? levelFromEnv() ?? 'info';
  const env = process.env.NODE_ENV;
  const pretty = config.pretty ?? (env !== 'production' && env !== 'test');

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
 * Get the root logger instance, creating it on first use.
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
