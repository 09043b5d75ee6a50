import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ValidationError } from '../src/errors.js';
import { formatWorklogStarted, logWork } from '../src/operations/worklog.js';
import { FakeTracker, createTestClient } from './helpers/fake-tracker.js';

const WORKLOG = {
  id: '30001',
  started: '2024-01-15T08:30:00.000+0000',
  timeSpent: '2h 30m',
  timeSpentSeconds: 9000,
};

describe('logWork', () => {
  let tracker: FakeTracker;

  beforeEach(() => {
    tracker = new FakeTracker().on('POST', '/issue/PROJ-1/worklog', { status: 201, data: WORKLOG });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should normalize the duration and convert the start time', async () => {
    const client = createTestClient(tracker);

    const result = await logWork(client, {
      issueKey: 'proj-1',
      timeSpent: ' 2H  30m ',
      started: '2024-01-15T10:30:00+02:00',
      comment: 'Pairing',
    });

    expect(tracker.requests[0]?.body).toEqual({
      timeSpent: '2h 30m',
      started: '2024-01-15T08:30:00.000+0000',
      comment: {
        version: 1,
        type: 'doc',
        content: [{ type: 'paragraph', content: [{ type: 'text', text: 'Pairing' }] }],
      },
    });
    expect(result).toEqual({
      success: true,
      data: {
        id: '30001',
        issueKey: 'PROJ-1',
        timeSpent: '2h 30m',
        timeSpentSeconds: 9000,
        started: '2024-01-15T08:30:00.000+0000',
      },
    });
  });

  it('should default the start time to now', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-01T12:00:00.000Z'));
    const client = createTestClient(tracker);

    await logWork(client, { issueKey: 'PROJ-1', timeSpent: '1d' });

    expect(tracker.requests[0]?.body).toEqual({
      timeSpent: '1d',
      started: '2024-03-01T12:00:00.000+0000',
    });
  });

  it.each(['2 hours', '2x', 'h2', '', '2h30m'])(
    'should reject %j before any request',
    async (timeSpent) => {
      const client = createTestClient(tracker);

      const result = await logWork(client, { issueKey: 'PROJ-1', timeSpent });

      expect(result.success).toBe(false);
      if (result.success) return;
      if (!(result.error instanceof ValidationError)) throw new Error('expected a ValidationError');
      expect(Object.keys(result.error.fieldErrors)).toEqual(['timeSpent']);
      expect(tracker.requests).toHaveLength(0);
    }
  );

  it('should reject an unparseable start time', async () => {
    const client = createTestClient(tracker);

    const result = await logWork(client, { issueKey: 'PROJ-1', timeSpent: '1h', started: 'yesterday' });

    expect(result.success).toBe(false);
    expect(tracker.requests).toHaveLength(0);
  });

  it('should pass tracker errors through', async () => {
    tracker = new FakeTracker().on('POST', '/issue/PROJ-1/worklog', {
      status: 400,
      data: { errorMessages: ['Worklog must not be null.'] },
    });
    const client = createTestClient(tracker);

    const result = await logWork(client, { issueKey: 'PROJ-1', timeSpent: '1w 2d' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.statusCode).toBe(400);
  });
});

describe('formatWorklogStarted', () => {
  it('should use a numeric UTC offset', () => {
    expect(formatWorklogStarted(new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 6)))).toBe(
      '2024-01-02T03:04:05.006+0000'
    );
  });
});
