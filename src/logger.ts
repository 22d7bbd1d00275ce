/**
 * Winston-backed logger
 */

import winston from 'winston';
import type { Logger } from './types.js';

const { combine, timestamp, printf, colorize, errors } = winston.format;

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

const logFormat = printf(({ level, message, timestamp, ...meta }) => {
  const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} [${level}]: ${message}${metaStr}`;
});

export interface LoggerOptions {
  /** Also append plain-text log lines to this file */
  file?: string;
}

/**
 * Create a Winston logger behind the pipeline's Logger interface
 */
export function createLogger(level: string = 'info', options: LoggerOptions = {}): Logger {
  const logger = winston.createLogger({
    level,
    format: combine(
      errors({ stack: true }),
      timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      logFormat
    ),
    transports: [
      new winston.transports.Console({
        // progress output goes to stdout; keep logs on stderr
        stderrLevels: [...LOG_LEVELS],
        format: combine(
          colorize(),
          timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
          logFormat
        ),
      }),
    ],
  });

  if (options.file) {
    logger.add(
      new winston.transports.File({
        filename: options.file,
        format: combine(timestamp(), logFormat),
      })
    );
  }

  return {
    info: (message, meta) => {
      logger.info(message, meta);
    },
    warn: (message, meta) => {
      logger.warn(message, meta);
    },
    error: (message, meta) => {
      logger.error(message, meta);
    },
    debug: (message, meta) => {
      logger.debug(message, meta);
    },
  };
}
