/**
 * @fileoverview Project listing
 * @module @tracklane/jira-client/operations/projects
 */

import type { JiraClient } from '../client.js';
import type { OperationResult, Page } from '../types.js';
import { GetProjectsArgsSchema, parseArgs, type GetProjectsArgs } from '../validation.js';
import { runOperation } from './run.js';

export interface ProjectView {
  id: string;
  key: string;
  name: string;
  archived: boolean;
}

export interface ProjectsResult extends Page {
  projects: ProjectView[];
}

/**
 * Lists one page of projects, live ones only unless archived are asked for
 */
export async function getProjects(
  client: JiraClient,
  args: GetProjectsArgs = {}
): Promise<OperationResult<ProjectsResult>> {
  const parsed = parseArgs(GetProjectsArgsSchema, args);
  if (!parsed.success) return parsed;
  const { includeArchived, startAt, maxResults } = parsed.data;

  return runOperation<ProjectsResult>(client, 'getProjects', async () => {
    const result = await client.listProjects({
      startAt,
      maxResults,
      status: includeArchived ? ['live', 'archived'] : ['live'],
    });
    if (!result.success) return result;

    const page = result.data;
    return {
      success: true,
      data: {
        projects: page.values.map((project) => ({
          id: String(project.id),
          key: project.key,
          name: project.name,
          archived: project.archived ?? false,
        })),
        total: page.total,
        startAt: page.startAt,
        maxResults: page.maxResults,
        hasMore: page.isLast === undefined ? page.startAt + page.values.length < page.total : !page.isLast,
      },
    };
  });
}
