import path from 'path';
import winston from 'winston';
import { appConfig } from '../config';

const { logging } = appConfig;

const fileOptions = {
  ...(logging.maxSizeBytes !== undefined ? { maxsize: logging.maxSizeBytes } : {}),
  ...(logging.maxFiles !== undefined ? { maxFiles: logging.maxFiles } : {}),
};

const transports = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    )
  }),
  ...(logging.dir
    ? [
        new winston.transports.File({
          filename: path.join(logging.dir, 'error.log'),
          level: 'error',
          ...fileOptions,
        }),
        new winston.transports.File({
          filename: path.join(logging.dir, 'combined.log'),
          ...fileOptions,
        }),
      ]
    : []),
];

const logger = winston.createLogger({
  level: logging.level,
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      const metaString = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
      return `${timestamp} [${level.toUpperCase()}]: ${message} ${metaString}`;
    })
  ),
  transports,
});

export const logEvent = (event: string, meta?: Record<string, unknown>): void => {
  if (meta) {
    logger.info(event, meta);
  } else {
    logger.info(event);
  }
};

export const logError = (message: string, error?: Error, meta?: Record<string, unknown>): void => {
  const errorMeta = {
    ...meta,
    ...(error && {
      error: error.message,
      stack: error.stack
    })
  };

  logger.error(message, errorMeta);
};

export const logWarning = (message: string, meta?: Record<string, unknown>): void => {
  if (meta) {
    logger.warn(message, meta);
  } else {
    logger.warn(message);
  }
};

export const logDebug = (message: string, meta?: Record<string, unknown>): void => {
  if (meta) {
    logger.debug(message, meta);
  } else {
    logger.debug(message);
  }
};

export { logger };
