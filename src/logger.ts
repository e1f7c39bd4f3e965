import pino from 'pino';
import type { LogLevel } from './config';

// structured data attached to a log line
export type LogData = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug: (message: string, data?: LogData) => void;
  info: (message: string, data?: LogData) => void;
  warn: (message: string, data?: LogData) => void;
  error: (message: string, data?: LogData) => void;
}

export interface LoggerConfig {
  level?: LogLevel;
}

// base pino logger, JSON lines on stdout
const baseLogger = pino({
  level: 'info',
  formatters: {
    level: label => ({ level: label }),
  },
  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
});

// create a logger for one component, with its own level
export function createLogger(service: string, config: LoggerConfig = {}): Logger {
  const logger = baseLogger.child({ service });

  if (config.level) {
    logger.level = config.level;
  }

  return {
    debug: (message, data) => {
      if (data) {
        logger.debug(data, message);
      } else {
        logger.debug(message);
      }
    },
    info: (message, data) => {
      if (data) {
        logger.info(data, message);
      } else {
        logger.info(message);
      }
    },
    warn: (message, data) => {
      if (data) {
        logger.warn(data, message);
      } else {
        logger.warn(message);
      }
    },
    error: (message, data) => {
      if (data) {
        logger.error(data, message);
      } else {
        logger.error(message);
      }
    },
  };
}
