/**
 * Tool names, titles and descriptions shown to MCP clients
 */
export const toolsMetadata = {
  get_issue: {
    name: 'get_issue',
    title: 'Get Issue',
    description: 'Fetch one Jira issue by key. Returns summary, status, people, dates and custom fields.',
  },
  search_issues: {
    name: 'search_issues',
    title: 'Search Issues',
    description: 'Run a JQL query and return one page of matching issues with the total count.',
  },
  create_issue: {
    name: 'create_issue',
    title: 'Create Issue',
    description: 'Create an issue in a project. Unknown or required custom fields go in customFields.',
  },
  update_issue: {
    name: 'update_issue',
    title: 'Update Issue',
    description:
      'Change fields on an issue and optionally add a comment. Reports the outcome of each step separately.',
  },
  clone_issue: {
    name: 'clone_issue',
    title: 'Clone Issue',
    description:
      'Copy an issue, optionally into another project, with overrides. Can copy attachments and links the clone to its source.',
  },
  add_comment: {
    name: 'add_comment',
    title: 'Add Comment',
    description: 'Add a comment to an issue, optionally restricted to a role or group.',
  },
  get_comments: {
    name: 'get_comments',
    title: 'Get Comments',
    description: 'List one page of comments on an issue.',
  },
  log_work: {
    name: 'log_work',
    title: 'Log Work',
    description: 'Record time spent on an issue, e.g. "2h 30m" (units w, d, h, m).',
  },
  get_projects: {
    name: 'get_projects',
    title: 'Get Projects',
    description: 'List projects visible to the configured account.',
  },
} as const;

export type ToolName = keyof typeof toolsMetadata;
