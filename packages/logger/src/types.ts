/**
 * @fileoverview Type definitions for the structured logger
 * @module @tracklane/logger/types
 */

import { z } from 'zod';

/**
 * Logger levels
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Where log lines are written.
 * Stdio-based protocol servers must use `stderr` so stdout stays clean.
 */
export type LogDestination = 'stdout' | 'stderr';

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level */
  level?: LogLevel;
  /** Service name */
  serviceName: string;
  /** Enable pretty printing (development) */
  prettyPrint?: boolean;
  /** Custom base properties */
  base?: Record<string, unknown>;
  /** Redact sensitive fields */
  redact?: string[];
  /** Output stream */
  destination?: LogDestination;
}

/**
 * Zod schema for logger configuration validation
 */
export const LoggerConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).optional().default('info'),
  serviceName: z.string().min(1),
  prettyPrint: z.boolean().optional().default(false),
  base: z.record(z.unknown()).optional(),
  redact: z
    .array(z.string())
    .optional()
    .default(['password', 'token', 'apiToken', 'secret', 'authorization', '*.apiToken']),
  destination: z.enum(['stdout', 'stderr']).optional().default('stdout'),
});

/**
 * Configuration after defaults have been applied
 */
export type ResolvedLoggerConfig = z.output<typeof LoggerConfigSchema>;

/**
 * Numeric ordering of levels, lowest first
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

/**
 * Type guard for log level strings coming from the environment
 */
export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}
