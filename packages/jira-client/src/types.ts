/**
 * @fileoverview Jira REST types and operation payloads
 * @module @tracklane/jira-client/types
 */

import type { JiraClientError } from './errors.js';

/**
 * Outcome of every client call and operation.
 * Failures carry a typed error instead of being thrown.
 */
export type OperationResult<T> =
  | { success: true; data: T }
  | { success: false; error: JiraClientError };

/**
 * Jira user
 */
export interface JiraUser {
  /** Account ID (Cloud) */
  accountId?: string;
  /** Username (Server/Data Center) */
  name?: string;
  displayName: string;
  /** Email address (may be hidden by privacy settings) */
  emailAddress?: string;
  active?: boolean;
  self?: string;
}

/**
 * Jira project
 */
export interface JiraProject {
  id: string;
  key: string;
  name: string;
  self?: string;
  projectTypeKey?: string;
  archived?: boolean;
  simplified?: boolean;
  style?: string;
}

/**
 * Named REST entity (status, priority, issue type, resolution…)
 */
export interface JiraNamedEntity {
  id: string;
  name: string;
  self?: string;
  [attribute: string]: unknown;
}

/**
 * Atlassian Document Format (ADF) document
 */
export interface JiraDocument {
  version: 1;
  type: 'doc';
  content: JiraDocumentNode[];
}

/**
 * ADF document node
 */
export interface JiraDocumentNode {
  type: string;
  /** Node text (for text nodes) */
  text?: string;
  attrs?: Record<string, unknown>;
  marks?: Array<{ type: string; attrs?: Record<string, unknown> }>;
  content?: JiraDocumentNode[];
}

/**
 * Rich text as returned by the API: ADF on v3, plain text on v2
 */
export type JiraRichText = JiraDocument | string;

/**
 * Jira attachment
 */
export interface JiraAttachment {
  id: string;
  filename: string;
  size: number;
  mimeType: string;
  /** Content URL */
  content: string;
  created?: string;
  author?: JiraUser;
}

/**
 * Issue fields. Only the fields that were requested are present, and custom
 * fields are keyed by their id (customfield_10010).
 */
export interface JiraIssueFields {
  summary?: string;
  description?: JiraRichText | null;
  status?: JiraNamedEntity;
  issuetype?: JiraNamedEntity;
  project?: JiraProject;
  priority?: JiraNamedEntity | null;
  assignee?: JiraUser | null;
  reporter?: JiraUser | null;
  labels?: string[];
  created?: string;
  updated?: string;
  attachment?: JiraAttachment[];
  [fieldId: string]: unknown;
}

/**
 * Jira issue
 */
export interface JiraIssue {
  id: string;
  /** Issue key (e.g., PROJ-123) */
  key: string;
  self: string;
  fields: JiraIssueFields;
}

/**
 * Response of POST /issue
 */
export interface JiraCreatedIssue {
  id: string;
  key: string;
  self: string;
}

/**
 * Jira comment
 */
export interface JiraComment {
  id: string;
  body: JiraRichText;
  author?: JiraUser;
  created: string;
  updated?: string;
  self?: string;
  visibility?: CommentVisibility;
}

export interface CommentVisibility {
  type: 'role' | 'group';
  value: string;
}

/**
 * Jira worklog entry
 */
export interface JiraWorklog {
  id: string;
  author?: JiraUser;
  comment?: JiraRichText;
  started: string;
  timeSpent: string;
  timeSpentSeconds: number;
  self?: string;
}

/**
 * Response of GET /serverInfo
 */
export interface JiraServerInfo {
  baseUrl: string;
  version: string;
  deploymentType?: string;
  serverTitle?: string;
}

export interface JiraSearchResults {
  startAt: number;
  maxResults: number;
  total: number;
  issues: JiraIssue[];
}

export interface JiraCommentPage {
  startAt: number;
  maxResults: number;
  total: number;
  comments: JiraComment[];
}

export interface JiraProjectPage {
  startAt: number;
  maxResults: number;
  total: number;
  isLast?: boolean;
  values: JiraProject[];
}

/**
 * Body of POST /issueLink
 */
export interface JiraIssueLinkInput {
  type: { name: string };
  inwardIssue: { key: string };
  outwardIssue: { key: string };
}

/**
 * A page of results handed back to callers, who page manually
 */
export interface Page {
  total: number;
  startAt: number;
  maxResults: number;
  hasMore: boolean;
}
