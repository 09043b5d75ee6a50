/**
 * @fileoverview Issue read, search, create and update operations
 * @module @tracklane/jira-client/operations/issues
 */

import { adfToText, toRichText } from '../adf.js';
import type { JiraClient } from '../client.js';
import { ValidationError, type JiraClientError } from '../errors.js';
import type { JiraIssue, JiraIssueFields, OperationResult, Page } from '../types.js';
import {
  CreateIssueArgsSchema,
  DEFAULT_SEARCH_FIELDS,
  GetIssueArgsSchema,
  SearchIssuesArgsSchema,
  UpdateIssueArgsSchema,
  parseArgs,
  type CreateIssueArgs,
  type GetIssueArgs,
  type SearchIssuesArgs,
  type UpdateIssueArgs,
} from '../validation.js';
import { runOperation } from './run.js';

/**
 * Flattened view of an issue
 */
export interface IssueSummary {
  id: string;
  key: string;
  url: string;
  summary?: string;
  description?: string;
  status?: string;
  issueType?: string;
  priority?: string;
  assignee?: string;
  reporter?: string;
  labels?: string[];
  created?: string;
  updated?: string;
  /** Non-null custom field values present in the response */
  customFields?: Record<string, unknown>;
}

/**
 * Summary plus every field returned by the tracker
 */
export interface IssueDetails extends IssueSummary {
  fields: JiraIssueFields;
}

export interface SearchIssuesResult extends Page {
  issues: IssueSummary[];
}

export interface CreatedIssue {
  id: string;
  key: string;
  self: string;
  url: string;
}

/**
 * Outcome of one independent step of a multi-call operation
 */
export type StepOutcome =
  | { status: 'succeeded' }
  | { status: 'failed'; error: JiraClientError }
  | { status: 'skipped' };

export interface UpdateIssueResult {
  key: string;
  fields: StepOutcome;
  comment: StepOutcome;
}

/**
 * Fetches an issue
 */
export async function getIssue(
  client: JiraClient,
  args: GetIssueArgs
): Promise<OperationResult<IssueDetails>> {
  const parsed = parseArgs(GetIssueArgsSchema, args);
  if (!parsed.success) return parsed;
  const { issueKey, fields } = parsed.data;

  return runOperation<IssueDetails>(
    client,
    'getIssue',
    async () => {
      const result = await client.getIssue(issueKey, fields);
      if (!result.success) return result;
      return {
        success: true,
        data: { ...summarizeIssue(result.data, client.config.baseUrl), fields: result.data.fields },
      };
    },
    { issueKey }
  );
}

/**
 * Runs one page of a JQL search. Paging is left to the caller.
 */
export async function searchIssues(
  client: JiraClient,
  args: SearchIssuesArgs
): Promise<OperationResult<SearchIssuesResult>> {
  const parsed = parseArgs(SearchIssuesArgsSchema, args);
  if (!parsed.success) return parsed;
  const { jql, startAt, maxResults } = parsed.data;
  const fields = parsed.data.fields ?? [...DEFAULT_SEARCH_FIELDS];

  return runOperation<SearchIssuesResult>(
    client,
    'searchIssues',
    async () => {
      const result = await client.searchIssues({ jql, startAt, maxResults, fields });
      if (!result.success) return result;

      const page = result.data;
      return {
        success: true,
        data: {
          issues: page.issues.map((issue) => summarizeIssue(issue, client.config.baseUrl)),
          total: page.total,
          startAt: page.startAt,
          maxResults: page.maxResults,
          hasMore: page.startAt + page.issues.length < page.total,
        },
      };
    },
    { jql }
  );
}

/**
 * Creates an issue
 */
export async function createIssue(
  client: JiraClient,
  args: CreateIssueArgs
): Promise<OperationResult<CreatedIssue>> {
  const parsed = parseArgs(CreateIssueArgsSchema, args);
  if (!parsed.success) return parsed;
  const input = parsed.data;

  const fields: Record<string, unknown> = {
    project: { key: input.projectKey },
    issuetype: { name: input.issueType },
    summary: input.summary,
  };

  if (input.description) {
    fields.description = toRichText(input.description, client.config.apiVersion);
  }

  if (input.priority) {
    fields.priority = { name: input.priority };
  }

  if (input.assigneeAccountId) {
    fields.assignee = { accountId: input.assigneeAccountId };
  }

  if (input.labels) {
    fields.labels = input.labels;
  }

  // Custom fields
  if (input.customFields) {
    Object.assign(fields, input.customFields);
  }

  return runOperation<CreatedIssue>(
    client,
    'createIssue',
    async () => {
      const result = await client.createIssue(fields);
      if (!result.success) return result;
      const { id, key, self } = result.data;
      return { success: true, data: { id, key, self, url: browseUrl(client.config.baseUrl, key) } };
    },
    { projectKey: input.projectKey }
  );
}

/**
 * Updates fields and/or adds a comment.
 *
 * The field update and the comment are separate calls; each step's outcome is
 * reported. The operation only fails as a whole when every attempted step failed.
 */
export async function updateIssue(
  client: JiraClient,
  args: UpdateIssueArgs
): Promise<OperationResult<UpdateIssueResult>> {
  const parsed = parseArgs(UpdateIssueArgsSchema, args);
  if (!parsed.success) return parsed;
  const input = parsed.data;

  const fields: Record<string, unknown> = {};

  if (input.summary !== undefined) {
    fields.summary = input.summary;
  }

  if (input.description !== undefined) {
    fields.description = toRichText(input.description, client.config.apiVersion);
  }

  if (input.priority !== undefined) {
    fields.priority = { name: input.priority };
  }

  if (input.assigneeAccountId !== undefined) {
    fields.assignee = input.assigneeAccountId ? { accountId: input.assigneeAccountId } : null;
  }

  if (input.labels !== undefined) {
    fields.labels = input.labels;
  }

  if (input.customFields) {
    Object.assign(fields, input.customFields);
  }

  const hasFields = Object.keys(fields).length > 0;
  if (!hasFields && input.comment === undefined) {
    return {
      success: false,
      error: new ValidationError('Nothing to update', {
        _root: ['Provide at least one field or a comment'],
      }),
    };
  }

  return runOperation<UpdateIssueResult>(
    client,
    'updateIssue',
    async () => {
      let fieldsOutcome: StepOutcome = { status: 'skipped' };
      if (hasFields) {
        const result = await client.updateIssueFields(input.issueKey, fields);
        fieldsOutcome = result.success
          ? { status: 'succeeded' }
          : { status: 'failed', error: result.error };
      }

      let commentOutcome: StepOutcome = { status: 'skipped' };
      if (input.comment !== undefined) {
        const result = await client.addComment(
          input.issueKey,
          toRichText(input.comment, client.config.apiVersion)
        );
        commentOutcome = result.success
          ? { status: 'succeeded' }
          : { status: 'failed', error: result.error };
      }

      const attempted = [fieldsOutcome, commentOutcome].filter(
        (outcome) => outcome.status !== 'skipped'
      );
      const firstFailure = attempted.find(
        (outcome): outcome is Extract<StepOutcome, { status: 'failed' }> =>
          outcome.status === 'failed'
      );
      if (firstFailure && attempted.every((outcome) => outcome.status === 'failed')) {
        return { success: false, error: firstFailure.error };
      }

      return {
        success: true,
        data: { key: input.issueKey, fields: fieldsOutcome, comment: commentOutcome },
      };
    },
    { issueKey: input.issueKey }
  );
}

/**
 * Flattens the commonly used fields of an issue
 */
export function summarizeIssue(issue: JiraIssue, baseUrl: string): IssueSummary {
  const fields = issue.fields;
  const summary: IssueSummary = {
    id: issue.id,
    key: issue.key,
    url: browseUrl(baseUrl, issue.key),
    summary: fields.summary,
    description: adfToText(fields.description),
    status: fields.status?.name,
    issueType: fields.issuetype?.name,
    priority: fields.priority?.name,
    assignee: fields.assignee?.displayName,
    reporter: fields.reporter?.displayName,
    labels: fields.labels,
    created: fields.created,
    updated: fields.updated,
  };

  const customFields = Object.fromEntries(
    Object.entries(fields).filter(
      ([fieldId, value]) => fieldId.startsWith('customfield_') && value !== null && value !== undefined
    )
  );
  if (Object.keys(customFields).length > 0) {
    summary.customFields = customFields;
  }

  return summary;
}

function browseUrl(baseUrl: string, key: string): string {
  return `${baseUrl}/browse/${key}`;
}
