/**
 * Structured Logging System
 * =========================
 * Centralized logging using Winston with structured output and log rotation.
 */

import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';

// Log context interface
export interface LogContext {
  sweepId?: string;
  pointId?: string;
  /** Concurrency level (winston reserves `level`) */
  axisLevel?: number;
  trial?: number;
  mode?: boolean;
  [key: string]: unknown;
}

// Logger configuration interface
interface LoggerConfig {
  level: string;
  enableConsole: boolean;
  enableFile: boolean;
  logDir: string;
  maxFiles: string;
  maxSize: string;
}

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

// Default configuration
const defaultConfig: LoggerConfig = {
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
  enableConsole: process.env.LOG_CONSOLE !== 'false',
  // Harness logs are opt-in on disk: the default ./logs is where sweep artifacts go
  enableFile: process.env.LOG_FILE === 'true',
  logDir: process.env.LOG_DIR || path.join(process.cwd(), '.perfsweep', 'logs'),
  maxFiles: process.env.LOG_MAX_FILES || '14d',
  maxSize: process.env.LOG_MAX_SIZE || '20m',
};

// Custom format for structured logging
const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Console format for development (human-readable)
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr ? ' ' + metaStr : ''}`;
  })
);

// Create transports array
const transports: winston.transport[] = [];

// Console transport
if (defaultConfig.enableConsole) {
  transports.push(
    new winston.transports.Console({
      format: process.env.NODE_ENV === 'production' ? structuredFormat : consoleFormat,
      level: defaultConfig.level,
      silent: isTest && process.env.LOG_LEVEL === undefined,
      // Keep stdout for command output and workload echo
      stderrLevels: ['error', 'warn', 'info', 'debug', 'verbose', 'silly'],
    })
  );
}

// File transports with rotation
// Skip file logging in test environment to avoid file system issues
if (defaultConfig.enableFile && !isTest) {
  if (!fs.existsSync(defaultConfig.logDir)) {
    fs.mkdirSync(defaultConfig.logDir, { recursive: true });
  }

  transports.push(
    new DailyRotateFile({
      filename: path.join(defaultConfig.logDir, 'error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      format: structuredFormat,
      maxSize: defaultConfig.maxSize,
      maxFiles: defaultConfig.maxFiles,
      zippedArchive: true,
    })
  );

  transports.push(
    new DailyRotateFile({
      filename: path.join(defaultConfig.logDir, 'combined-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      format: structuredFormat,
      maxSize: defaultConfig.maxSize,
      maxFiles: defaultConfig.maxFiles,
      zippedArchive: true,
    })
  );
}

// Create Winston logger instance
const winstonLogger = winston.createLogger({
  level: defaultConfig.level,
  format: structuredFormat,
  defaultMeta: { service: 'perfsweep' },
  transports,
  // Don't exit on handled exceptions
  exitOnError: false,
});

// Logger class with package namespacing
class Logger {
  private readonly namespace: string;

  constructor(namespace: string = 'perfsweep') {
    this.namespace = namespace;
  }

  /**
   * Merge the namespace into a single call's context
   */
  private mergeContext(context?: LogContext): LogContext {
    return {
      namespace: this.namespace,
      ...context,
    };
  }

  /**
   * Log error message
   */
  error(message: string, error?: unknown, context?: LogContext): void {
    const logContext = this.mergeContext(context);

    if (error instanceof Error) {
      winstonLogger.error(message, {
        ...logContext,
        error: {
          message: error.message,
          stack: error.stack,
          name: error.name,
        },
      });
    } else if (error) {
      winstonLogger.error(message, { ...logContext, error });
    } else {
      winstonLogger.error(message, logContext);
    }
  }

  warn(message: string, context?: LogContext): void {
    winstonLogger.warn(message, this.mergeContext(context));
  }

  info(message: string, context?: LogContext): void {
    winstonLogger.info(message, this.mergeContext(context));
  }

  debug(message: string, context?: LogContext): void {
    winstonLogger.debug(message, this.mergeContext(context));
  }
}

// Export singleton instance (default logger)
export const logger = new Logger('perfsweep');

export { Logger };

// Export winston logger for advanced usage
export { winstonLogger };
