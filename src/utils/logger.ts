import winston from 'winston';
import { loadLoggingConfig } from '../config';

const loggingConfig = loadLoggingConfig();

const fileTransportLimits = {
  ...(loggingConfig.maxSizeBytes !== undefined ? { maxsize: loggingConfig.maxSizeBytes } : {}),
  ...(loggingConfig.maxFiles !== undefined ? { maxFiles: loggingConfig.maxFiles } : {}),
};

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    )
  })
];

if (loggingConfig.toFile) {
  transports.push(
    new winston.transports.File({ filename: 'logs/error.log', level: 'error', ...fileTransportLimits }),
    new winston.transports.File({ filename: 'logs/combined.log', ...fileTransportLimits })
  );
}

// Create winston logger instance
const logger = winston.createLogger({
  level: loggingConfig.level,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      const metaString = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
      return `${timestamp} [${level.toUpperCase()}]: ${message} ${metaString}`;
    })
  ),
  transports
});

export const logEvent = (event: string, meta?: Record<string, unknown>): void => {
  if (meta) {
    logger.info(`🎧 ${event}`, meta);
  } else {
    logger.info(`🎧 ${event}`);
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

  logger.error(`🎧💥 ${message}`, errorMeta);
};

export const logWarning = (message: string, meta?: Record<string, unknown>): void => {
  if (meta) {
    logger.warn(`🎧⚠️ ${message}`, meta);
  } else {
    logger.warn(`🎧⚠️ ${message}`);
  }
};

export const logDebug = (message: string, meta?: Record<string, unknown>): void => {
  if (meta) {
    logger.debug(`🎧🔍 ${message}`, meta);
  } else {
    logger.debug(`🎧🔍 ${message}`);
  }
};

export { logger };
