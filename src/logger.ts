import { pino } from 'pino';
import type { Logger } from 'pino';
import { LOG_LEVELS, type LogLevel } from './config.js';

export type { Logger };

function toLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find(level => level === value);
}

export function createLogger(level: LogLevel = 'info'): Logger {
  return pino({
    level,
    base: {
      service: 'datasafe',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

const requestedLevel = process.env.LOG_LEVEL || undefined;

/**
 * Main logger instance. Starts at LOG_LEVEL until {@link setLogLevel}
 * applies the validated configuration.
 */
export const logger = createLogger(toLevel(requestedLevel) ?? 'info');

if (requestedLevel !== undefined && toLevel(requestedLevel) === undefined) {
  logger.warn({ variable: 'LOG_LEVEL', value: requestedLevel }, 'Invalid LOG_LEVEL, logging at info');
}

/** Child loggers created afterwards inherit the new level. */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
