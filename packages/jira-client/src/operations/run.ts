/**
 * @fileoverview Shared wrapper for operation handlers
 * @module @tracklane/jira-client/operations/run
 */

import type { JiraClient } from '../client.js';
import { toJiraClientError } from '../errors.js';
import type { OperationResult } from '../types.js';

/**
 * Runs an operation with timing logs. Typed failures are logged at warn;
 * a stray exception becomes an UNKNOWN failure instead of escaping.
 */
export async function runOperation<T>(
  client: JiraClient,
  operation: string,
  fn: () => Promise<OperationResult<T>>,
  data?: Record<string, unknown>
): Promise<OperationResult<T>> {
  try {
    const result = await client.logger.withOperation(operation, fn, data);
    if (!result.success) {
      client.logger.warn(`${operation} failed`, {
        operation,
        code: result.error.code,
        error: result.error.message,
        ...data,
      });
    }
    return result;
  } catch (error) {
    return { success: false, error: toJiraClientError(error) };
  }
}
