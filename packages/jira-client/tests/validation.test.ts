import { describe, it, expect } from 'vitest';
import { ValidationError } from '../src/errors.js';
import {
  CloneIssueArgsSchema,
  CreateIssueArgsSchema,
  GetProjectsArgsSchema,
  SearchIssuesArgsSchema,
  UpdateIssueArgsSchema,
  issueKeySchema,
  parseArgs,
  timeSpentSchema,
} from '../src/validation.js';

describe('issueKeySchema', () => {
  it.each([
    [' proj-12 ', 'PROJ-12'],
    ['AB_1-7', 'AB_1-7'],
  ])('should accept %j as %j', (input, expected) => {
    expect(issueKeySchema.parse(input)).toBe(expected);
  });

  it.each(['PROJ', '12-PROJ', 'PROJ-', 'PROJ-1a', '1PROJ-1'])('should reject %j', (input) => {
    expect(issueKeySchema.safeParse(input).success).toBe(false);
  });
});

describe('timeSpentSchema', () => {
  it.each([
    ['3h', '3h'],
    ['1W 2D', '1w 2d'],
    ['  1d   4h 15m ', '1d 4h 15m'],
  ])('should normalize %j to %j', (input, expected) => {
    expect(timeSpentSchema.parse(input)).toBe(expected);
  });

  it.each(['1.5h', '2 h', '30s', 'h'])('should reject %j', (input) => {
    expect(timeSpentSchema.safeParse(input).success).toBe(false);
  });
});

describe('operation schemas', () => {
  it('should apply search defaults', () => {
    expect(SearchIssuesArgsSchema.parse({ jql: 'project = PROJ' })).toEqual({
      jql: 'project = PROJ',
      maxResults: 50,
      startAt: 0,
    });
  });

  it('should default the issue type to Task', () => {
    expect(CreateIssueArgsSchema.parse({ projectKey: 'proj', summary: 'S' })).toEqual({
      projectKey: 'PROJ',
      summary: 'S',
      issueType: 'Task',
    });
  });

  it('should reject labels containing spaces', () => {
    expect(CreateIssueArgsSchema.safeParse({ projectKey: 'PROJ', summary: 'S', labels: ['two words'] }).success).toBe(
      false
    );
  });

  it('should accept a null assignee on update', () => {
    expect(UpdateIssueArgsSchema.parse({ issueKey: 'PROJ-1', assigneeAccountId: null })).toEqual({
      issueKey: 'PROJ-1',
      assigneeAccountId: null,
    });
  });

  it('should apply clone defaults', () => {
    expect(CloneIssueArgsSchema.parse({ sourceKey: 'PROJ-1' })).toEqual({
      sourceKey: 'PROJ-1',
      summaryPrefix: 'Clone of ',
      copyAttachments: false,
      linkToSource: true,
    });
  });

  it('should list live projects only by default', () => {
    expect(GetProjectsArgsSchema.parse({})).toEqual({ includeArchived: false, startAt: 0, maxResults: 50 });
  });
});

describe('parseArgs', () => {
  it('should return the parsed value', () => {
    expect(parseArgs(issueKeySchema, 'proj-1')).toEqual({ success: true, data: 'PROJ-1' });
  });

  it('should collect every invalid field', () => {
    const result = parseArgs(SearchIssuesArgsSchema, { jql: '', maxResults: 0, startAt: -1 });

    expect(result.success).toBe(false);
    if (result.success) return;
    if (!(result.error instanceof ValidationError)) throw new Error('expected a ValidationError');
    expect(Object.keys(result.error.fieldErrors).sort()).toEqual(['jql', 'maxResults', 'startAt']);
    expect(result.error.message).toBe('Invalid arguments');
  });

  it('should key object-level failures under _root', () => {
    const result = parseArgs(issueKeySchema, 'nope');

    expect(result.success).toBe(false);
    if (result.success) return;
    if (!(result.error instanceof ValidationError)) throw new Error('expected a ValidationError');
    expect(result.error.fieldErrors).toEqual({ _root: ['Issue key must be in format PROJECT-123'] });
  });
});
