/**
 * @fileoverview Structured logger with a Pino backend
 * @module @tracklane/logger/logger
 */

import pino, { type Logger as PinoLogger, type LoggerOptions as PinoOptions } from 'pino';
import type { LogLevel, LoggerConfig, ResolvedLoggerConfig } from './types.js';
import { LoggerConfigSchema, isLogLevel } from './types.js';

const FILE_DESCRIPTORS = { stdout: 1, stderr: 2 } as const;

/**
 * Structured logger backed by Pino.
 * Provides consistent logging across packages with a shared redaction list.
 */
export class Logger {
  private logger: PinoLogger;
  private config: ResolvedLoggerConfig;

  /**
   * Creates a new Logger instance.
   * @param config - Logger configuration
   */
  constructor(config: LoggerConfig) {
    this.config = LoggerConfigSchema.parse(config);

    const fd = FILE_DESCRIPTORS[this.config.destination];
    const pinoOptions: PinoOptions = {
      level: this.config.level,
      base: {
        service: this.config.serviceName,
        ...this.config.base,
      },
      redact: this.config.redact,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    };

    if (this.config.prettyPrint) {
      this.logger = pino({
        ...pinoOptions,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            destination: fd,
          },
        },
      });
    } else {
      this.logger = pino(pinoOptions, pino.destination(fd));
    }
  }

  public trace(message: string, data?: Record<string, unknown>): void {
    this.log('trace', message, data);
  }

  public debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  public info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  public warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  /**
   * Logs an error-level message.
   * @param message - Log message
   * @param error - Error object, or any value that was thrown
   * @param data - Additional structured data
   */
  public error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log('error', message, withError(error, data));
  }

  /**
   * Logs a fatal-level message.
   * @param message - Log message
   * @param error - Error object, or any value that was thrown
   * @param data - Additional structured data
   */
  public fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log('fatal', message, withError(error, data));
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    const logData = { ...data };

    switch (level) {
      case 'trace':
        this.logger.trace(logData, message);
        break;
      case 'debug':
        this.logger.debug(logData, message);
        break;
      case 'info':
        this.logger.info(logData, message);
        break;
      case 'warn':
        this.logger.warn(logData, message);
        break;
      case 'error':
        this.logger.error(logData, message);
        break;
      case 'fatal':
        this.logger.fatal(logData, message);
        break;
    }
  }

  /**
   * Creates a child logger with additional base context.
   * @param context - Additional context to include in all logs
   * @returns A new Logger instance with the added context
   */
  public child(context: Record<string, unknown>): Logger {
    return new Logger({
      ...this.config,
      base: {
        ...this.config.base,
        ...context,
      },
    });
  }

  /**
   * Wraps an async function with start/end/failure logging.
   * @param operation - Operation name
   * @param fn - Function to execute
   * @param data - Additional context data
   * @returns Result of the function
   */
  public async withOperation<T>(
    operation: string,
    fn: () => Promise<T>,
    data?: Record<string, unknown>
  ): Promise<T> {
    const startTime = Date.now();
    this.debug(`Starting ${operation}`, { operation, phase: 'start', ...data });

    try {
      const result = await fn();
      this.debug(`Completed ${operation}`, {
        operation,
        phase: 'end',
        durationMs: Date.now() - startTime,
        ...data,
      });
      return result;
    } catch (error) {
      this.error(`Failed ${operation}`, error, {
        operation,
        phase: 'error',
        durationMs: Date.now() - startTime,
        ...data,
      });
      throw error;
    }
  }

  /**
   * Logs an outbound HTTP call.
   * 5xx is logged as error, 4xx as warn, everything else at debug.
   */
  public httpRequest(
    method: string,
    path: string,
    statusCode: number,
    durationMs: number,
    data?: Record<string, unknown>
  ): void {
    const level = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'debug';
    this.log(level, `${method} ${path} ${statusCode}`, {
      http: { method, path, statusCode, durationMs },
      ...data,
    });
  }

  public getPinoLogger(): PinoLogger {
    return this.logger;
  }

  public flush(): void {
    this.logger.flush();
  }
}

function withError(error: unknown, data?: Record<string, unknown>): Record<string, unknown> {
  const errorData: Record<string, unknown> = { ...data };

  if (error instanceof Error) {
    errorData.error = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  } else if (error !== undefined) {
    errorData.error = error;
  }

  return errorData;
}

/**
 * Creates a new logger instance.
 * @param config - Logger configuration
 */
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}

/**
 * Creates a logger from environment variables.
 * Expected environment variables:
 * - LOG_LEVEL: Log level (trace, debug, info, warn, error, fatal)
 * - SERVICE_NAME: Service name for identification
 * - LOG_PRETTY: Enable pretty printing (true/false)
 * @param serviceName - Service name (overrides env var)
 * @param overrides - Extra configuration, e.g. the destination stream
 */
export function createLoggerFromEnv(
  serviceName?: string,
  overrides?: Partial<LoggerConfig>
): Logger {
  const level = process.env.LOG_LEVEL;
  return createLogger({
    level: isLogLevel(level) ? level : 'info',
    serviceName: serviceName ?? process.env.SERVICE_NAME ?? 'unknown',
    prettyPrint: process.env.LOG_PRETTY === 'true',
    ...overrides,
  });
}
