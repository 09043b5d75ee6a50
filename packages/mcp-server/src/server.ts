/**
 * @fileoverview MCP server exposing the Jira operations as tools
 * @module @tracklane/mcp-server/server
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  addComment,
  addCommentArgs,
  cloneIssue,
  cloneIssueArgs,
  createIssue,
  createIssueArgs,
  getComments,
  getCommentsArgs,
  getIssue,
  getIssueArgs,
  getProjects,
  getProjectsArgs,
  logWork,
  logWorkArgs,
  searchIssues,
  searchIssuesArgs,
  updateIssue,
  updateIssueArgs,
  type JiraClient,
} from '@tracklane/jira-client';
import { toToolResult } from './format.js';
import { toolsMetadata } from './tools.js';

export interface ServerInfo {
  name: string;
  version: string;
}

export const DEFAULT_SERVER_INFO: ServerInfo = {
  name: 'tracklane-jira',
  version: '0.1.0',
};

const READ_ONLY = { readOnlyHint: true, destructiveHint: false } as const;
const WRITE = { readOnlyHint: false, destructiveHint: false } as const;

/**
 * Builds an MCP server whose tools call into the given client.
 * Tool handlers never throw; failures come back as `isError` results.
 */
export function buildServer(client: JiraClient, info: ServerInfo = DEFAULT_SERVER_INFO): McpServer {
  const server = new McpServer(info);
  const meta = toolsMetadata;

  server.registerTool(
    meta.get_issue.name,
    {
      title: meta.get_issue.title,
      description: meta.get_issue.description,
      inputSchema: getIssueArgs,
      annotations: READ_ONLY,
    },
    async (args) => toToolResult(await getIssue(client, args))
  );

  server.registerTool(
    meta.search_issues.name,
    {
      title: meta.search_issues.title,
      description: meta.search_issues.description,
      inputSchema: searchIssuesArgs,
      annotations: READ_ONLY,
    },
    async (args) => toToolResult(await searchIssues(client, args))
  );

  server.registerTool(
    meta.create_issue.name,
    {
      title: meta.create_issue.title,
      description: meta.create_issue.description,
      inputSchema: createIssueArgs,
      annotations: WRITE,
    },
    async (args) => toToolResult(await createIssue(client, args))
  );

  server.registerTool(
    meta.update_issue.name,
    {
      title: meta.update_issue.title,
      description: meta.update_issue.description,
      inputSchema: updateIssueArgs,
      annotations: WRITE,
    },
    async (args) => toToolResult(await updateIssue(client, args))
  );

  server.registerTool(
    meta.clone_issue.name,
    {
      title: meta.clone_issue.title,
      description: meta.clone_issue.description,
      inputSchema: cloneIssueArgs,
      annotations: WRITE,
    },
    async (args) => toToolResult(await cloneIssue(client, args))
  );

  server.registerTool(
    meta.add_comment.name,
    {
      title: meta.add_comment.title,
      description: meta.add_comment.description,
      inputSchema: addCommentArgs,
      annotations: WRITE,
    },
    async (args) => toToolResult(await addComment(client, args))
  );

  server.registerTool(
    meta.get_comments.name,
    {
      title: meta.get_comments.title,
      description: meta.get_comments.description,
      inputSchema: getCommentsArgs,
      annotations: READ_ONLY,
    },
    async (args) => toToolResult(await getComments(client, args))
  );

  server.registerTool(
    meta.log_work.name,
    {
      title: meta.log_work.title,
      description: meta.log_work.description,
      inputSchema: logWorkArgs,
      annotations: WRITE,
    },
    async (args) => toToolResult(await logWork(client, args))
  );

  server.registerTool(
    meta.get_projects.name,
    {
      title: meta.get_projects.title,
      description: meta.get_projects.description,
      inputSchema: getProjectsArgs,
      annotations: READ_ONLY,
    },
    async (args) => toToolResult(await getProjects(client, args))
  );

  return server;
}
