/**
 * @fileoverview Issue cloning
 * @module @tracklane/jira-client/operations/clone
 *
 * A clone is one read and up to three kinds of write: the create call, one
 * download/upload pair per attachment, and the "Cloners" link. Only the create
 * is fatal; the follow-up steps are collected as sub-step failures.
 */

import { toRichText } from '../adf.js';
import type { JiraClient } from '../client.js';
import { PartialFailureError, type SubStepFailure } from '../errors.js';
import { isRecord } from '../http.js';
import type { JiraAttachment, JiraIssue, OperationResult } from '../types.js';
import {
  CloneIssueArgsSchema,
  parseArgs,
  type CloneIssueArgs,
  type CloneOptions,
} from '../validation.js';
import { runOperation } from './run.js';

export const CLONE_LINK_TYPE = 'Cloners';

/**
 * Fields maintained by the tracker that a create call must not carry
 */
export const SERVER_MANAGED_FIELDS: ReadonlySet<string> = new Set([
  'created',
  'updated',
  'creator',
  'status',
  'statuscategorychangedate',
  'resolution',
  'resolutiondate',
  'lastViewed',
  'votes',
  'watches',
  'worklog',
  'comment',
  'attachment',
  'issuelinks',
  'subtasks',
  'progress',
  'aggregateprogress',
  'timespent',
  'timeestimate',
  'timeoriginalestimate',
  'aggregatetimespent',
  'aggregatetimeestimate',
  'aggregatetimeoriginalestimate',
  'timetracking',
  'workratio',
  'thumbnail',
]);

// Copied even when an allow-list is given; a create call fails without them.
const REQUIRED_FIELDS: ReadonlySet<string> = new Set(['project', 'issuetype', 'summary']);

export interface CloneIssueResult {
  id: string;
  key: string;
  self: string;
  sourceKey: string;
  attachmentsCopied: number;
  linked: boolean;
}

/**
 * Clones an issue into the same or another project.
 *
 * Returns a PartialFailureError (carrying the new issue) when the issue was
 * created but an attachment copy or the link failed.
 */
export async function cloneIssue(
  client: JiraClient,
  args: CloneIssueArgs
): Promise<OperationResult<CloneIssueResult>> {
  const parsed = parseArgs(CloneIssueArgsSchema, args);
  if (!parsed.success) return parsed;
  const options = parsed.data;

  return runOperation<CloneIssueResult>(
    client,
    'cloneIssue',
    async () => {
      const source = await client.getIssue(options.sourceKey);
      if (!source.success) return source;

      const fields = buildCloneFields(source.data, options, client.config.apiVersion);
      const created = await client.createIssue(fields);
      if (!created.success) return created;

      const issue = created.data;
      client.logger.info('Created clone', { sourceKey: source.data.key, key: issue.key });

      const failures: SubStepFailure[] = [];
      let attachmentsCopied = 0;

      if (options.copyAttachments) {
        for (const attachment of source.data.fields.attachment ?? []) {
          const failure = await copyAttachment(client, attachment, issue.key);
          if (failure) {
            failures.push(failure);
          } else {
            attachmentsCopied += 1;
          }
        }
      }

      let linked = false;
      if (options.linkToSource) {
        const link = await client.createIssueLink({
          type: { name: CLONE_LINK_TYPE },
          inwardIssue: { key: issue.key },
          outwardIssue: { key: source.data.key },
        });
        if (link.success) {
          linked = true;
        } else {
          failures.push({ step: 'link', target: source.data.key, error: link.error });
        }
      }

      if (failures.length > 0) {
        return {
          success: false,
          error: new PartialFailureError({ id: issue.id, key: issue.key, self: issue.self }, failures, {
            attachmentsCopied,
            linked,
          }),
        };
      }

      return {
        success: true,
        data: {
          id: issue.id,
          key: issue.key,
          self: issue.self,
          sourceKey: source.data.key,
          attachmentsCopied,
          linked,
        },
      };
    },
    { sourceKey: options.sourceKey }
  );
}

/**
 * Composes the create payload for a clone.
 *
 * Precedence, lowest first: carried-over source fields, the target project,
 * the prefixed summary, named overrides, raw field overrides.
 */
export function buildCloneFields(
  source: JiraIssue,
  options: CloneOptions,
  apiVersion: '2' | '3'
): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  const allowList = options.copyFields ? new Set(options.copyFields) : undefined;

  for (const [fieldId, value] of Object.entries(source.fields)) {
    if (value === null || value === undefined) continue;
    if (SERVER_MANAGED_FIELDS.has(fieldId)) continue;
    if (allowList && !allowList.has(fieldId) && !REQUIRED_FIELDS.has(fieldId)) continue;
    fields[fieldId] = toFieldValue(value);
  }

  const sourceProject = source.fields.project;
  if (options.targetProject) {
    fields.project = { key: options.targetProject };
  } else if (sourceProject) {
    fields.project = { key: sourceProject.key };
  }

  if (options.summary !== undefined) {
    fields.summary = options.summary;
  } else if (source.fields.summary !== undefined) {
    fields.summary = `${options.summaryPrefix}${source.fields.summary}`;
  }

  if (options.description !== undefined) {
    fields.description = toRichText(options.description, apiVersion);
  }

  if (options.issueType !== undefined) {
    fields.issuetype = { name: options.issueType };
  }

  if (options.priority !== undefined) {
    fields.priority = { name: options.priority };
  }

  if (options.assigneeAccountId !== undefined) {
    fields.assignee = { accountId: options.assigneeAccountId };
  }

  if (options.labels !== undefined) {
    fields.labels = options.labels;
  }

  if (options.fields) {
    Object.assign(fields, options.fields);
  }

  return fields;
}

/**
 * Reduces a field value to what a create call accepts: users become
 * `{ accountId }`, other REST entities `{ id }`.
 */
function toFieldValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(toFieldValue);
  }
  if (!isRecord(value)) {
    return value;
  }
  if (typeof value.accountId === 'string') {
    return { accountId: value.accountId };
  }
  if (typeof value.id === 'string' && typeof value.self === 'string') {
    return { id: value.id };
  }
  return value;
}

async function copyAttachment(
  client: JiraClient,
  attachment: JiraAttachment,
  targetKey: string
): Promise<SubStepFailure | undefined> {
  const content = await client.getAttachmentContent(attachment.id);
  if (!content.success) {
    return { step: 'attachment', target: attachment.filename, error: content.error };
  }

  const upload = await client.uploadAttachment(
    targetKey,
    attachment.filename,
    content.data,
    attachment.mimeType
  );
  if (!upload.success) {
    return { step: 'attachment', target: attachment.filename, error: upload.error };
  }

  return undefined;
}
