/**
 * @fileoverview Operation results as MCP tool results
 * @module @tracklane/mcp-server/format
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { OperationResult } from '@tracklane/jira-client';

export function textResult(value: unknown, isError = false): CallToolResult {
  const text = typeof value === 'string' ? value : JSON.stringify(value, null, 2);
  const result: CallToolResult = {
    content: [{ type: 'text' as const, text }],
  };
  if (isError) {
    result.isError = true;
  }
  return result;
}

/**
 * Pretty JSON of the payload, or of the serialized error with `isError` set
 */
export function toToolResult<T>(result: OperationResult<T>): CallToolResult {
  if (result.success) {
    return textResult(result.data);
  }
  return textResult({ error: result.error.toJSON() }, true);
}
