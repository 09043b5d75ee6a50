/**
 * @fileoverview Work-log operation
 * @module @tracklane/jira-client/operations/worklog
 */

import { toRichText } from '../adf.js';
import type { JiraClient, WorklogRequest } from '../client.js';
import type { OperationResult } from '../types.js';
import { LogWorkArgsSchema, parseArgs, type LogWorkArgs } from '../validation.js';
import { runOperation } from './run.js';

export interface WorklogEntry {
  id: string;
  issueKey: string;
  timeSpent: string;
  timeSpentSeconds: number;
  started: string;
}

/**
 * Formats a timestamp the way the worklog endpoint expects it
 * (`2024-01-15T10:00:00.000+0000`).
 */
export function formatWorklogStarted(date: Date): string {
  return date.toISOString().replace('Z', '+0000');
}

/**
 * Appends a work-log entry. The duration is checked locally first, so a
 * malformed value never reaches the tracker.
 */
export async function logWork(
  client: JiraClient,
  args: LogWorkArgs
): Promise<OperationResult<WorklogEntry>> {
  const parsed = parseArgs(LogWorkArgsSchema, args);
  if (!parsed.success) return parsed;
  const { issueKey, timeSpent, comment, started } = parsed.data;

  const request: WorklogRequest = {
    timeSpent,
    started: formatWorklogStarted(started ? new Date(started) : new Date()),
  };
  if (comment) {
    request.comment = toRichText(comment, client.config.apiVersion);
  }

  return runOperation<WorklogEntry>(
    client,
    'logWork',
    async () => {
      const result = await client.addWorklog(issueKey, request);
      if (!result.success) return result;
      const worklog = result.data;
      return {
        success: true,
        data: {
          id: worklog.id,
          issueKey,
          timeSpent: worklog.timeSpent,
          timeSpentSeconds: worklog.timeSpentSeconds,
          started: worklog.started,
        },
      };
    },
    { issueKey, timeSpent }
  );
}
