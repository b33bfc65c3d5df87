import { createLogger, format, transports, Logger } from 'winston';
import type { RequestHandler } from 'express';
import * as path from 'path';
import { LoggingConfig } from './types';
import { BACKEND_HEADER } from './router';

const VALID_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

/**
 * Create the service logger
 * @param config logging configuration
 * @returns winston Logger instance
 */
export function setupLogger(config: LoggingConfig): Logger {
  const level = validateLogLevel(config.level);

  const logger = createLogger({
    level: level ?? 'info',
    format: format.combine(
      format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      format.errors({ stack: true }),
      format.splat(),
      format.json()
    ),
    transports: [
      new transports.Console({
        format: format.combine(
          format.colorize(),
          format.simple()
        )
      })
    ]
  });

  if (config.file) {
    logger.add(new transports.File({
      filename: path.resolve(config.file),
      maxsize: 5242880, // 5MB
      maxFiles: 5,
      tailable: true
    }));
  }

  if (level === null) {
    logger.warn(`Invalid log level "${config.level}", falling back to "info"`);
  }

  return logger;
}

/**
 * Apply a new level and file target to an existing logger
 */
export function updateLogger(logger: Logger, config: LoggingConfig): void {
  logger.level = validateLogLevel(config.level) ?? 'info';

  const fileTransport = logger.transports.find(
    (t): t is transports.FileTransportInstance => t instanceof transports.File
  );
  if (fileTransport) {
    logger.remove(fileTransport);
  }
  if (config.file) {
    logger.add(new transports.File({
      filename: path.resolve(config.file),
      maxsize: 5242880,
      maxFiles: 5,
      tailable: true
    }));
  }
}

/**
 * @returns the normalized level, or null if winston does not know it
 */
export function validateLogLevel(level: string): string | null {
  const normalized = level.toLowerCase();
  return VALID_LEVELS.includes(normalized) ? normalized : null;
}

/**
 * Request logging middleware. Logs once the response has finished, including
 * the backend that served it.
 */
export function createRequestLogger(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const startTime = Date.now();

    res.on('finish', () => {
      const backend = res.getHeader(BACKEND_HEADER);
      logger.info('request', {
        method: req.method,
        url: req.originalUrl,
        status: res.statusCode,
        backend: typeof backend === 'string' ? backend : 'none',
        duration: `${Date.now() - startTime}ms`,
        ip: req.ip
      });
    });

    next();
  };
}
