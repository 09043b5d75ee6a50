#!/usr/bin/env node
/**
 * Stdio entry point. Stdout carries protocol traffic only; logs go to stderr.
 */

import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { JiraClient, loadConfigFromEnv } from '@tracklane/jira-client';
import { createLoggerFromEnv } from '@tracklane/logger';
import { buildServer } from './server.js';

const logger = createLoggerFromEnv('jira-mcp', { destination: 'stderr' });

async function main(): Promise<void> {
  const client = new JiraClient(loadConfigFromEnv(), { logger });

  const info = await client.getServerInfo();
  if (info.success) {
    logger.info('Connected to Jira', { version: info.data.version, baseUrl: client.config.baseUrl });
  } else {
    logger.warn('Jira connectivity check failed', { error: info.error.toJSON() });
  }

  const server = buildServer(client);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('MCP server listening on stdio');
}

main().catch((error: unknown) => {
  logger.fatal('Failed to start stdio server', error);
  logger.flush();
  process.exit(1);
});
