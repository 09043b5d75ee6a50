/**
 * @fileoverview Operation handlers
 * @module @tracklane/jira-client/operations
 */

export * from './issues.js';
export * from './clone.js';
export * from './comments.js';
export * from './worklog.js';
export * from './projects.js';
export { runOperation } from './run.js';
