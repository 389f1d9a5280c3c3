/**
 * Structured logger using pino
 *
 * Logs go to stderr as JSON so that stdout only carries resolution results.
 */

import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Primitive types that can be logged */
type LogPrimitive = string | number | boolean | null | undefined;

/** Value types that can be logged - primitives or arrays of them */
type LogValue = LogPrimitive | LogPrimitive[] | string[] | number[];

/** Structured log data */
export type LogData = Record<string, LogValue>;

export interface Logger {
  debug: (message: string, data?: LogData) => void;
  info: (message: string, data?: LogData) => void;
  warn: (message: string, data?: LogData) => void;
  error: (message: string, data?: LogData) => void;
}

export interface LoggerConfig {
  level?: LogLevel;
  silent?: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

// read the default level from LOG_LEVEL, falling back to info
export function getLogLevel(value = process.env.LOG_LEVEL): LogLevel {
  const level = value?.trim().toLowerCase();
  return LOG_LEVELS.find(l => l === level) ?? 'info';
}

const baseLogger = pino(
  {
    level: getLogLevel(),
    formatters: {
      level: label => ({ level: label }),
    },
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
  },
  pino.destination(2)
);

/**
 * Create a logger instance for a component
 */
export function createLogger(service: string, config?: LoggerConfig): Logger {
  const logger = baseLogger.child({ service });

  if (config?.level) {
    logger.level = config.level;
  }

  if (config?.silent) {
    logger.level = 'silent';
  }

  return {
    debug: (message: string, data?: LogData) => {
      if (data) {
        logger.debug(data, message);
      } else {
        logger.debug(message);
      }
    },
    info: (message: string, data?: LogData) => {
      if (data) {
        logger.info(data, message);
      } else {
        logger.info(message);
      }
    },
    warn: (message: string, data?: LogData) => {
      if (data) {
        logger.warn(data, message);
      } else {
        logger.warn(message);
      }
    },
    error: (message: string, data?: LogData) => {
      if (data) {
        logger.error(data, message);
      } else {
        logger.error(message);
      }
    },
  };
}
