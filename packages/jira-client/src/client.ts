/**
 * @fileoverview Rate-limited Jira REST client
 * @module @tracklane/jira-client/client
 */

import type { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import { createLoggerFromEnv, type Logger } from '@tracklane/logger';
import { resolveConfig, type JiraClientConfig, type JiraClientConfigInput } from './config.js';
import { TrackerApiError, toJiraClientError } from './errors.js';
import {
  createHttpClient,
  decodeErrorBody,
  extractTrackerMessages,
  isRecord,
  parseRetryAfter,
  toTransportError,
} from './http.js';
import { TokenBucket, type Clock } from './rate-limiter.js';
import type {
  CommentVisibility,
  JiraAttachment,
  JiraComment,
  JiraCommentPage,
  JiraCreatedIssue,
  JiraIssue,
  JiraIssueLinkInput,
  JiraProjectPage,
  JiraRichText,
  JiraSearchResults,
  JiraServerInfo,
  JiraWorklog,
  OperationResult,
} from './types.js';

type HttpMethod = 'GET' | 'POST' | 'PUT';

interface RequestOptions {
  params?: Record<string, unknown>;
  data?: unknown;
  headers?: Record<string, string>;
  responseType?: 'json' | 'arraybuffer';
}

/**
 * Collaborators injected into the client
 */
export interface JiraClientOptions {
  /** Logger; defaults to one built from LOG_* variables, writing to stderr */
  logger?: Logger;
  /** Time source for the rate limiter */
  clock?: Clock;
  /** Custom axios adapter */
  adapter?: AxiosAdapter;
}

export interface SearchRequest {
  jql: string;
  startAt: number;
  maxResults: number;
  fields: string[];
}

export interface PageRequest {
  startAt: number;
  maxResults: number;
}

export interface WorklogRequest {
  timeSpent: string;
  started?: string;
  comment?: JiraRichText;
}

/**
 * Jira API client.
 *
 * Every endpoint method goes through one private dispatch path that spends a
 * rate-limit token before issuing exactly one HTTP request. Failures come back
 * as `{ success: false, error }`; nothing is thrown.
 *
 * @example
 * ```typescript
 * const client = new JiraClient({
 *   baseUrl: 'https://example.atlassian.net',
 *   username: 'me@example.com',
 *   apiToken: 'test-secret',
 * });
 *
 * const result = await client.getIssue('PROJ-1');
 * if (result.success) {
 *   console.log(result.data.fields.summary);
 * }
 * ```
 */
export class JiraClient {
  readonly config: JiraClientConfig;
  readonly logger: Logger;
  private readonly http: AxiosInstance;
  private readonly limiter: TokenBucket;

  /**
   * @throws ConfigurationError on invalid configuration or rate limit values
   */
  constructor(config: JiraClientConfigInput, options: JiraClientOptions = {}) {
    this.config = resolveConfig(config);
    this.limiter = new TokenBucket(this.config.rateLimit, options.clock);
    this.http = createHttpClient(this.config, { adapter: options.adapter });
    this.logger = (
      options.logger ?? createLoggerFromEnv('jira-client', { destination: 'stderr' })
    ).child({ component: 'jira-client' });
  }

  getRateLimiter(): TokenBucket {
    return this.limiter;
  }

  /**
   * Gets server information; used as a connection check
   */
  async getServerInfo(): Promise<OperationResult<JiraServerInfo>> {
    return this.send<JiraServerInfo>('GET', '/serverInfo');
  }

  /**
   * Gets an issue by key
   * @param issueKey - Issue key (e.g., PROJ-123)
   * @param fields - Field projection; all fields when omitted
   */
  async getIssue(issueKey: string, fields?: string[]): Promise<OperationResult<JiraIssue>> {
    const params = fields && fields.length > 0 ? { fields: fields.join(',') } : undefined;
    return this.send<JiraIssue>('GET', `/issue/${encodeURIComponent(issueKey)}`, { params });
  }

  /**
   * Searches issues using JQL (one page)
   */
  async searchIssues(request: SearchRequest): Promise<OperationResult<JiraSearchResults>> {
    return this.send<JiraSearchResults>('POST', '/search', { data: request });
  }

  /**
   * Creates an issue from a raw field map
   */
  async createIssue(fields: Record<string, unknown>): Promise<OperationResult<JiraCreatedIssue>> {
    return this.send<JiraCreatedIssue>('POST', '/issue', { data: { fields } });
  }

  /**
   * Sets fields on an existing issue
   */
  async updateIssueFields(
    issueKey: string,
    fields: Record<string, unknown>
  ): Promise<OperationResult<void>> {
    const result = await this.send<unknown>('PUT', `/issue/${encodeURIComponent(issueKey)}`, {
      data: { fields },
    });
    return result.success ? { success: true, data: undefined } : result;
  }

  /**
   * Adds a comment to an issue
   */
  async addComment(
    issueKey: string,
    body: JiraRichText,
    visibility?: CommentVisibility
  ): Promise<OperationResult<JiraComment>> {
    return this.send<JiraComment>('POST', `/issue/${encodeURIComponent(issueKey)}/comment`, {
      data: visibility ? { body, visibility } : { body },
    });
  }

  /**
   * Gets one page of comments on an issue
   */
  async getComments(
    issueKey: string,
    page: PageRequest
  ): Promise<OperationResult<JiraCommentPage>> {
    return this.send<JiraCommentPage>('GET', `/issue/${encodeURIComponent(issueKey)}/comment`, {
      params: { startAt: page.startAt, maxResults: page.maxResults },
    });
  }

  /**
   * Appends a work-log entry
   */
  async addWorklog(
    issueKey: string,
    worklog: WorklogRequest
  ): Promise<OperationResult<JiraWorklog>> {
    return this.send<JiraWorklog>('POST', `/issue/${encodeURIComponent(issueKey)}/worklog`, {
      data: worklog,
    });
  }

  /**
   * Downloads the content of an attachment
   */
  async getAttachmentContent(attachmentId: string): Promise<OperationResult<Buffer>> {
    return this.send<Buffer>('GET', `/attachment/content/${encodeURIComponent(attachmentId)}`, {
      responseType: 'arraybuffer',
      headers: { Accept: '*/*' },
    });
  }

  /**
   * Uploads a file as an attachment of an issue
   */
  async uploadAttachment(
    issueKey: string,
    filename: string,
    content: Buffer,
    mimeType = 'application/octet-stream'
  ): Promise<OperationResult<JiraAttachment[]>> {
    const form = new FormData();
    form.append('file', new Blob([content], { type: mimeType }), filename);

    return this.send<JiraAttachment[]>(
      'POST',
      `/issue/${encodeURIComponent(issueKey)}/attachments`,
      {
        data: form,
        headers: { 'Content-Type': 'multipart/form-data', 'X-Atlassian-Token': 'no-check' },
      }
    );
  }

  /**
   * Links two issues
   */
  async createIssueLink(link: JiraIssueLinkInput): Promise<OperationResult<void>> {
    const result = await this.send<unknown>('POST', '/issueLink', { data: link });
    return result.success ? { success: true, data: undefined } : result;
  }

  /**
   * Lists one page of projects
   * @param status - Project statuses to include (live, archived)
   */
  async listProjects(
    page: PageRequest & { status: string[] }
  ): Promise<OperationResult<JiraProjectPage>> {
    return this.send<JiraProjectPage>('GET', '/project/search', {
      params: { startAt: page.startAt, maxResults: page.maxResults, status: page.status },
    });
  }

  /**
   * The only path to the network: one limiter token, then one request.
   */
  private async send<T>(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Promise<OperationResult<T>> {
    try {
      const waited = await this.limiter.waitForToken();
      if (waited > 0) {
        this.logger.info('Waited for rate limit token', { method, path, waitedMs: Math.round(waited) });
      }
    } catch (error) {
      const failure = toJiraClientError(error);
      this.logger.warn('Rate limit exceeded', { method, path, retryAfter: failure.retryAfter });
      return { success: false, error: failure };
    }

    const startedAt = Date.now();
    let response: AxiosResponse<T>;
    try {
      response = await this.http.request<T>({
        method,
        url: path,
        params: options.params,
        data: options.data,
        headers: options.headers,
        responseType: options.responseType ?? 'json',
      });
    } catch (error) {
      const failure = toTransportError(error);
      this.logger.warn(`${method} ${path} failed`, {
        code: failure.code,
        transportCode: failure.transportCode,
        durationMs: Date.now() - startedAt,
      });
      return { success: false, error: failure };
    }

    this.logger.httpRequest(method, path, response.status, Date.now() - startedAt);

    if (response.status >= 200 && response.status < 300) {
      return { success: true, data: response.data };
    }

    const body = decodeErrorBody(response.data);
    return {
      success: false,
      error: new TrackerApiError(response.status, extractTrackerMessages(body), {
        details: isRecord(body) ? body : undefined,
        retryAfter: parseRetryAfter(response.headers['retry-after']),
        method,
        path,
      }),
    };
  }
}
