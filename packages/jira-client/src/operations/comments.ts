/**
 * @fileoverview Comment operations
 * @module @tracklane/jira-client/operations/comments
 */

import { adfToText, toRichText } from '../adf.js';
import type { JiraClient } from '../client.js';
import type { JiraComment, OperationResult, Page } from '../types.js';
import {
  AddCommentArgsSchema,
  GetCommentsArgsSchema,
  parseArgs,
  type AddCommentArgs,
  type GetCommentsArgs,
} from '../validation.js';
import { runOperation } from './run.js';

export interface CommentView {
  id: string;
  author?: string;
  body: string;
  created: string;
  updated?: string;
}

export interface CommentsResult extends Page {
  comments: CommentView[];
}

/**
 * Adds a comment to an issue
 */
export async function addComment(
  client: JiraClient,
  args: AddCommentArgs
): Promise<OperationResult<CommentView>> {
  const parsed = parseArgs(AddCommentArgsSchema, args);
  if (!parsed.success) return parsed;
  const { issueKey, body, visibility } = parsed.data;

  return runOperation<CommentView>(
    client,
    'addComment',
    async () => {
      const result = await client.addComment(
        issueKey,
        toRichText(body, client.config.apiVersion),
        visibility
      );
      if (!result.success) return result;
      return { success: true, data: toCommentView(result.data) };
    },
    { issueKey }
  );
}

/**
 * Lists one page of comments on an issue
 */
export async function getComments(
  client: JiraClient,
  args: GetCommentsArgs
): Promise<OperationResult<CommentsResult>> {
  const parsed = parseArgs(GetCommentsArgsSchema, args);
  if (!parsed.success) return parsed;
  const { issueKey, startAt, maxResults } = parsed.data;

  return runOperation<CommentsResult>(
    client,
    'getComments',
    async () => {
      const result = await client.getComments(issueKey, { startAt, maxResults });
      if (!result.success) return result;

      const page = result.data;
      return {
        success: true,
        data: {
          comments: page.comments.map(toCommentView),
          total: page.total,
          startAt: page.startAt,
          maxResults: page.maxResults,
          hasMore: page.startAt + page.comments.length < page.total,
        },
      };
    },
    { issueKey }
  );
}

function toCommentView(comment: JiraComment): CommentView {
  return {
    id: comment.id,
    author: comment.author?.displayName,
    body: adfToText(comment.body) ?? '',
    created: comment.created,
    updated: comment.updated,
  };
}
