/**
 * @fileoverview Rate-limited Jira client
 * @module @tracklane/jira-client
 *
 * @example
 * ```typescript
 * import { JiraClient, loadConfigFromEnv, searchIssues } from '@tracklane/jira-client';
 *
 * const client = new JiraClient(loadConfigFromEnv());
 * const page = await searchIssues(client, { jql: 'project = PROJ ORDER BY created DESC' });
 * ```
 */

export * from './types.js';
export * from './errors.js';
export * from './rate-limiter.js';
export * from './config.js';
export * from './adf.js';
export { basicAuthHeaders, parseRetryAfter, type HttpClientOptions } from './http.js';
export * from './client.js';
export * from './validation.js';
export * from './operations/index.js';
