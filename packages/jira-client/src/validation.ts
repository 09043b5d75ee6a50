/**
 * @fileoverview Argument schemas for the Jira operations
 * @module @tracklane/jira-client/validation
 *
 * Each operation exposes a raw zod shape (used by tool registration) and the
 * object schema built from it.
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';
import type { OperationResult } from './types.js';

export const ISSUE_KEY_PATTERN = /^[A-Z][A-Z0-9_]*-\d+$/;
export const PROJECT_KEY_PATTERN = /^[A-Z][A-Z0-9_]*$/;
/** One or more "<number><unit>" parts, units w/d/h/m */
export const TIME_SPENT_PATTERN = /^\d+[wdhm](\s+\d+[wdhm])*$/;

export const DEFAULT_SEARCH_FIELDS = [
  'summary',
  'status',
  'assignee',
  'issuetype',
  'priority',
  'created',
  'updated',
] as const;

// Common schemas

export const issueKeySchema = z
  .string()
  .trim()
  .toUpperCase()
  .regex(ISSUE_KEY_PATTERN, 'Issue key must be in format PROJECT-123');

export const projectKeySchema = z
  .string()
  .trim()
  .toUpperCase()
  .regex(PROJECT_KEY_PATTERN, 'Project key must be letters, digits or underscores');

const nonEmptyText = (label: string) => z.string().trim().min(1, `${label} must not be empty`);

const fieldListSchema = z.array(z.string().trim().min(1)).min(1);

const startAtSchema = z.number().int().min(0).default(0);

const maxResultsSchema = z.number().int().min(1).max(100).default(50);

const labelsSchema = z.array(z.string().trim().min(1).regex(/^\S+$/, 'Labels cannot contain spaces'));

const fieldMapSchema = z.record(z.string(), z.unknown());

export const timeSpentSchema = z
  .string()
  .trim()
  .toLowerCase()
  .regex(TIME_SPENT_PATTERN, 'Time spent must look like "2h 30m" (units w, d, h, m)')
  .transform((value) => value.split(/\s+/).join(' '));

// Operation shapes

export const getIssueArgs = {
  issueKey: issueKeySchema.describe('Issue key (e.g., PROJ-123)'),
  fields: fieldListSchema.optional().describe('Fields to return; all fields when omitted'),
};

export const searchIssuesArgs = {
  jql: nonEmptyText('JQL query').describe('JQL query string'),
  fields: fieldListSchema.optional().describe('Fields to return for each issue'),
  maxResults: maxResultsSchema.describe('Page size (1-100)'),
  startAt: startAtSchema.describe('Index of the first result'),
};

export const createIssueArgs = {
  projectKey: projectKeySchema.describe('Project key (e.g., PROJ)'),
  summary: nonEmptyText('Summary').describe('Issue summary'),
  description: z.string().optional().describe('Plain text description'),
  issueType: nonEmptyText('Issue type').default('Task').describe('Issue type name'),
  priority: nonEmptyText('Priority').optional().describe('Priority name'),
  assigneeAccountId: nonEmptyText('Assignee').optional().describe('Assignee account ID'),
  labels: labelsSchema.optional().describe('Labels'),
  customFields: fieldMapSchema.optional().describe('Raw field values keyed by field ID'),
};

export const updateIssueArgs = {
  issueKey: issueKeySchema.describe('Issue key (e.g., PROJ-123)'),
  summary: nonEmptyText('Summary').optional().describe('New summary'),
  description: z.string().optional().describe('New plain text description'),
  priority: nonEmptyText('Priority').optional().describe('New priority name'),
  assigneeAccountId: nonEmptyText('Assignee')
    .nullable()
    .optional()
    .describe('New assignee account ID; null unassigns'),
  labels: labelsSchema.optional().describe('Replacement label list'),
  customFields: fieldMapSchema.optional().describe('Raw field values keyed by field ID'),
  comment: nonEmptyText('Comment').optional().describe('Comment to add after the update'),
};

export const cloneIssueArgs = {
  sourceKey: issueKeySchema.describe('Issue to clone (e.g., PROJ-123)'),
  targetProject: projectKeySchema.optional().describe('Target project key; defaults to the source project'),
  summary: nonEmptyText('Summary').optional().describe('Summary; defaults to the prefixed source summary'),
  summaryPrefix: z.string().default('Clone of ').describe('Prefix for the carried-over summary'),
  description: z.string().optional().describe('Plain text description override'),
  issueType: nonEmptyText('Issue type').optional().describe('Issue type override'),
  priority: nonEmptyText('Priority').optional().describe('Priority override'),
  assigneeAccountId: nonEmptyText('Assignee').optional().describe('Assignee account ID override'),
  labels: labelsSchema.optional().describe('Label override'),
  fields: fieldMapSchema.optional().describe('Raw field overrides keyed by field ID; applied last'),
  copyFields: fieldListSchema.optional().describe('Only carry over these source fields'),
  copyAttachments: z.boolean().default(false).describe('Copy attachments to the new issue'),
  linkToSource: z.boolean().default(true).describe('Link the new issue to its source'),
};

export const addCommentArgs = {
  issueKey: issueKeySchema.describe('Issue key (e.g., PROJ-123)'),
  body: nonEmptyText('Comment').describe('Comment text'),
  visibility: z
    .object({ type: z.enum(['role', 'group']), value: nonEmptyText('Visibility value') })
    .optional()
    .describe('Restrict the comment to a role or group'),
};

export const getCommentsArgs = {
  issueKey: issueKeySchema.describe('Issue key (e.g., PROJ-123)'),
  startAt: startAtSchema.describe('Index of the first comment'),
  maxResults: maxResultsSchema.describe('Page size (1-100)'),
};

export const logWorkArgs = {
  issueKey: issueKeySchema.describe('Issue key (e.g., PROJ-123)'),
  timeSpent: timeSpentSchema.describe('Time spent, e.g. "2h 30m"'),
  comment: z.string().trim().min(1).optional().describe('Work description'),
  started: z
    .string()
    .datetime({ offset: true, message: 'started must be an ISO 8601 timestamp' })
    .optional()
    .describe('When the work started (ISO 8601); defaults to now'),
};

export const getProjectsArgs = {
  includeArchived: z.boolean().default(false).describe('Include archived projects'),
  startAt: startAtSchema.describe('Index of the first project'),
  maxResults: maxResultsSchema.describe('Page size (1-100)'),
};

// Object schemas

export const GetIssueArgsSchema = z.object(getIssueArgs);
export const SearchIssuesArgsSchema = z.object(searchIssuesArgs);
export const CreateIssueArgsSchema = z.object(createIssueArgs);
export const UpdateIssueArgsSchema = z.object(updateIssueArgs);
export const CloneIssueArgsSchema = z.object(cloneIssueArgs);
export const AddCommentArgsSchema = z.object(addCommentArgs);
export const GetCommentsArgsSchema = z.object(getCommentsArgs);
export const LogWorkArgsSchema = z.object(logWorkArgs);
export const GetProjectsArgsSchema = z.object(getProjectsArgs);

export type GetIssueArgs = z.input<typeof GetIssueArgsSchema>;
export type SearchIssuesArgs = z.input<typeof SearchIssuesArgsSchema>;
export type CreateIssueArgs = z.input<typeof CreateIssueArgsSchema>;
export type UpdateIssueArgs = z.input<typeof UpdateIssueArgsSchema>;
export type CloneIssueArgs = z.input<typeof CloneIssueArgsSchema>;
export type CloneOptions = z.output<typeof CloneIssueArgsSchema>;
export type AddCommentArgs = z.input<typeof AddCommentArgsSchema>;
export type GetCommentsArgs = z.input<typeof GetCommentsArgsSchema>;
export type LogWorkArgs = z.input<typeof LogWorkArgsSchema>;
export type GetProjectsArgs = z.input<typeof GetProjectsArgsSchema>;

/**
 * Validates operation input against a schema
 * @returns The parsed value, or a ValidationError listing every invalid field
 */
export function parseArgs<Output, Def extends z.ZodTypeDef, Input>(
  schema: z.ZodType<Output, Def, Input>,
  input: unknown
): OperationResult<Output> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return { success: true, data: parsed.data };
  }
  return { success: false, error: ValidationError.fromZodIssues(parsed.error.issues) };
}
