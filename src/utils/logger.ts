import winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Structured logger handed to every component
 */
export interface Logger {
  error: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
}

export interface LoggerOptions {
  correlationId?: string;
  level?: LogLevel;
  logDir?: string;
}

/**
 * Creates a winston-backed logger for one service or crawl
 * @param serviceName - Name written into every entry and into the log file names
 * @param options - Correlation id (e.g. the search cache key), level and log directory
 */
export function createLogger(
  serviceName: string,
  options: LoggerOptions = {}
): Logger {
  const logFormat = winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  );

  const logsDir = options.logDir ?? process.env.LOG_DIR ?? path.join(process.cwd(), 'logs');
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  const dateStr = new Date().toISOString().split('T')[0]; // YYYY-MM-DD

  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf((info: winston.Logform.TransformableInfo) => {
          const { timestamp, level, message, ...meta } = info;
          const metaStr = Object.keys(meta).length
            ? JSON.stringify(meta)
            : '';
          return `${String(timestamp)} [${level}] ${String(message)} ${metaStr}`;
        })
      ),
    }),
    new winston.transports.File({
      filename: path.join(logsDir, `${serviceName}-${dateStr}.log`),
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 7,
      format: logFormat,
    }),
    new winston.transports.File({
      filename: path.join(logsDir, `${serviceName}-errors-${dateStr}.log`),
      level: 'error',
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 30,
      format: logFormat,
    }),
  ];

  const logger = winston.createLogger({
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    format: logFormat,
    defaultMeta: {
      service: serviceName,
      ...(options.correlationId && { correlationId: options.correlationId }),
    },
    transports,
  });

  return {
    error: (message: string, meta?: Record<string, unknown>) => {
      logger.error(message, meta);
    },
    warn: (message: string, meta?: Record<string, unknown>) => {
      logger.warn(message, meta);
    },
    info: (message: string, meta?: Record<string, unknown>) => {
      logger.info(message, meta);
    },
    debug: (message: string, meta?: Record<string, unknown>) => {
      logger.debug(message, meta);
    },
  };
}

/**
 * Formats an unknown thrown value for log metadata
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
