import { describe, expect, it } from 'vitest';
import { PartialFailureError, TrackerApiError, ValidationError } from '@tracklane/jira-client';
import { textResult, toToolResult } from '../src/format.js';

function textOf(result: ReturnType<typeof textResult>): string {
  const first = result.content[0];
  if (!first || first.type !== 'text') throw new Error('expected a text block');
  return first.text;
}

describe('toToolResult', () => {
  it('should pretty-print successful payloads', () => {
    const result = toToolResult({ success: true, data: { key: 'PROJ-1' } });

    expect(result.isError).toBeUndefined();
    expect(textOf(result)).toBe('{\n  "key": "PROJ-1"\n}');
  });

  it('should serialize validation errors with their fields', () => {
    const result = toToolResult({
      success: false,
      error: new ValidationError('Invalid arguments', { timeSpent: ['bad'] }),
    });

    expect(result.isError).toBe(true);
    expect(JSON.parse(textOf(result))).toMatchObject({
      error: {
        name: 'ValidationError',
        code: 'VALIDATION_ERROR',
        message: 'Invalid arguments',
      },
    });
  });

  it('should include the created issue on partial failures', () => {
    const error = new PartialFailureError({ id: '10050', key: 'PROJ-2', self: 'https://example.test/10050' }, [
      { step: 'link', target: 'PROJ-1', error: new TrackerApiError(404, ['Not found']) },
    ]);

    const payload: unknown = JSON.parse(textOf(toToolResult({ success: false, error })));

    expect(payload).toMatchObject({
      error: {
        code: 'PARTIAL_FAILURE',
        issue: { key: 'PROJ-2' },
        failures: [{ step: 'link', target: 'PROJ-1', error: { statusCode: 404 } }],
      },
    });
  });
});

describe('textResult', () => {
  it('should pass strings through', () => {
    expect(textOf(textResult('plain'))).toBe('plain');
  });
});
