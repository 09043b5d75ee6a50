/**
 * @fileoverview Structured logging for tracklane packages
 * @module @tracklane/logger
 *
 * @example
 * ```typescript
 * import { createLoggerFromEnv } from '@tracklane/logger';
 *
 * const logger = createLoggerFromEnv('jira-mcp', { destination: 'stderr' });
 * logger.info('Server started', { tools: 9 });
 * ```
 */

export { Logger, createLogger, createLoggerFromEnv } from './logger.js';
export {
  LoggerConfigSchema,
  LOG_LEVELS,
  isLogLevel,
  type LogLevel,
  type LogDestination,
  type LoggerConfig,
  type ResolvedLoggerConfig,
} from './types.js';
