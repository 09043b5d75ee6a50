/**
 * @fileoverview MCP tool server for the rate-limited Jira client
 * @module @tracklane/mcp-server
 */

export { buildServer, DEFAULT_SERVER_INFO, type ServerInfo } from './server.js';
export { textResult, toToolResult } from './format.js';
export { toolsMetadata, type ToolName } from './tools.js';
