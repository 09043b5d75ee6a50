/**
 * @fileoverview Tests for the client error taxonomy
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  JiraClientError,
  JiraErrorCode,
  PartialFailureError,
  RateLimitExceededError,
  TrackerApiError,
  TransportError,
  ValidationError,
  isJiraClientError,
  toJiraClientError,
} from '../src/errors.js';

describe('TrackerApiError', () => {
  it('should carry the status and tracker messages verbatim', () => {
    const error = new TrackerApiError(404, ['Issue does not exist'], {
      method: 'GET',
      path: '/issue/PROJ-9',
    });

    expect(error).toBeInstanceOf(JiraClientError);
    expect(error.message).toBe('Tracker responded with 404 for GET /issue/PROJ-9: Issue does not exist');
    expect(error.code).toBe(JiraErrorCode.TRACKER_API_ERROR);
    expect(error.statusCode).toBe(404);
    expect(error.reason).toBe('NOT_FOUND');
    expect(error.retryable).toBe(false);
  });

  it.each([
    [400, 'BAD_REQUEST', false],
    [401, 'UNAUTHORIZED', false],
    [403, 'FORBIDDEN', false],
    [409, 'CONFLICT', false],
    [429, 'RATE_LIMITED', true],
    [503, 'SERVER_ERROR', true],
    [418, 'UNKNOWN', false],
  ])('should classify %i as %s', (status, reason, retryable) => {
    const error = new TrackerApiError(status, []);
    expect(error.reason).toBe(reason);
    expect(error.retryable).toBe(retryable);
    expect(error.message).toBe(`Tracker responded with ${status}`);
  });

  it('should serialize reason and messages', () => {
    const json = new TrackerApiError(400, ['a', 'b'], { retryAfter: 1000 }).toJSON();
    expect(json).toMatchObject({
      name: 'TrackerApiError',
      code: 'TRACKER_API_ERROR',
      statusCode: 400,
      reason: 'BAD_REQUEST',
      trackerMessages: ['a', 'b'],
      retryAfter: 1000,
    });
  });
});

describe('ValidationError', () => {
  it('should group zod issues by field path', () => {
    const parsed = z
      .object({ issueKey: z.string(), page: z.object({ size: z.number().max(10) }) })
      .safeParse({ page: { size: 11 } });
    if (parsed.success) throw new Error('expected a parse failure');

    const error = ValidationError.fromZodIssues(parsed.error.issues);

    expect(error.code).toBe(JiraErrorCode.VALIDATION_ERROR);
    expect(error.message).toBe('Invalid arguments');
    expect(Object.keys(error.fieldErrors)).toEqual(['issueKey', 'page.size']);
    expect(error.fieldErrors.issueKey).toEqual(['Required']);
  });

  it('should report path-less issues under _root', () => {
    const parsed = z.string().safeParse(1);
    if (parsed.success) throw new Error('expected a parse failure');

    const error = ValidationError.fromZodIssues(parsed.error.issues, 'Bad input');
    expect(error.message).toBe('Bad input');
    expect(Object.keys(error.fieldErrors)).toEqual(['_root']);
  });
});

describe('TransportError', () => {
  it('should use the TIMEOUT code for timeouts', () => {
    const error = new TransportError('Request timed out', { timeout: true, transportCode: 'ECONNABORTED' });
    expect(error.code).toBe(JiraErrorCode.TIMEOUT);
    expect(error.retryable).toBe(true);
    expect(error.toJSON()).toMatchObject({ transportCode: 'ECONNABORTED' });
  });

  it('should default to NETWORK_ERROR', () => {
    expect(new TransportError('Network error').code).toBe(JiraErrorCode.NETWORK_ERROR);
  });
});

describe('RateLimitExceededError', () => {
  it('should carry the wait as retryAfter', () => {
    const error = new RateLimitExceededError(250);
    expect(error.code).toBe(JiraErrorCode.RATE_LIMITED);
    expect(error.retryAfter).toBe(250);
    expect(error.message).toBe('Rate limit exceeded');
  });
});

describe('PartialFailureError', () => {
  it('should carry the created issue and every failure', () => {
    const error = new PartialFailureError(
      { id: '10050', key: 'PROJ-2', self: 'https://example.atlassian.net/rest/api/3/issue/10050' },
      [
        { step: 'attachment', target: 'a.log', error: new TrackerApiError(413, []) },
        { step: 'link', target: 'PROJ-1', error: new TransportError('Network error: socket hang up') },
      ]
    );

    expect(error.message).toBe('Issue PROJ-2 was created but 2 follow-up step(s) failed');
    expect(error.code).toBe(JiraErrorCode.PARTIAL_FAILURE);

    const json = error.toJSON();
    expect(json.completed).toEqual({ attachmentsCopied: 0, linked: false });
    expect(json.issue).toEqual({
      id: '10050',
      key: 'PROJ-2',
      self: 'https://example.atlassian.net/rest/api/3/issue/10050',
    });
    expect(json.failures).toEqual([
      expect.objectContaining({ step: 'attachment', target: 'a.log', error: expect.objectContaining({ statusCode: 413 }) }),
      expect.objectContaining({ step: 'link', target: 'PROJ-1', error: expect.objectContaining({ code: 'NETWORK_ERROR' }) }),
    ]);
  });
});

describe('helpers', () => {
  it('should recognise client errors', () => {
    expect(isJiraClientError(new RateLimitExceededError(1))).toBe(true);
    expect(isJiraClientError(new Error('plain'))).toBe(false);
  });

  it('should wrap stray faults as UNKNOWN', () => {
    const cause = new Error('boom');
    const error = toJiraClientError(cause);
    expect(error.code).toBe(JiraErrorCode.UNKNOWN);
    expect(error.message).toBe('boom');
    expect(error.cause).toBe(cause);
  });

  it('should pass client errors through', () => {
    const original = new ValidationError('bad');
    expect(toJiraClientError(original)).toBe(original);
  });

  it('should handle non-Error values', () => {
    expect(toJiraClientError('oops').message).toBe('Unknown error');
  });
});
