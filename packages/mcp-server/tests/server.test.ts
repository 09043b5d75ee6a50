import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { buildServer } from '../src/server.js';
import { toolsMetadata } from '../src/tools.js';
import { FakeTracker, createTestClient } from '../../jira-client/tests/helpers/fake-tracker.js';

function parseToolResult(raw: unknown): { isError: boolean; payload: unknown } {
  const result = CallToolResultSchema.parse(raw);
  const first = result.content[0];
  if (!first || first.type !== 'text') throw new Error('expected a text block');
  return { isError: result.isError ?? false, payload: JSON.parse(first.text) };
}

describe('MCP server', () => {
  let tracker: FakeTracker;
  let mcp: Client;

  beforeEach(async () => {
    tracker = new FakeTracker();
    const server = buildServer(createTestClient(tracker));
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    mcp = new Client({ name: 'test-client', version: '0.0.0' });
    await mcp.connect(clientTransport);
  });

  afterEach(async () => {
    await mcp.close();
  });

  it('should list every tool', async () => {
    const { tools } = await mcp.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual(Object.keys(toolsMetadata).sort());
  });

  it('should return the operation payload as JSON text', async () => {
    tracker.on('POST', '/issue/PROJ-1/worklog', {
      status: 201,
      data: { id: '30001', started: '2024-01-15T08:30:00.000+0000', timeSpent: '45m', timeSpentSeconds: 2700 },
    });

    const raw = await mcp.callTool({
      name: 'log_work',
      arguments: { issueKey: 'PROJ-1', timeSpent: '45m', started: '2024-01-15T08:30:00Z' },
    });

    expect(parseToolResult(raw)).toEqual({
      isError: false,
      payload: {
        id: '30001',
        issueKey: 'PROJ-1',
        timeSpent: '45m',
        timeSpentSeconds: 2700,
        started: '2024-01-15T08:30:00.000+0000',
      },
    });
  });

  it('should report tracker failures as error results', async () => {
    const raw = await mcp.callTool({ name: 'get_issue', arguments: { issueKey: 'PROJ-404' } });

    const { isError, payload } = parseToolResult(raw);
    expect(isError).toBe(true);
    expect(payload).toMatchObject({
      error: {
        name: 'TrackerApiError',
        code: 'TRACKER_API_ERROR',
        statusCode: 404,
        reason: 'NOT_FOUND',
        trackerMessages: ['No route for GET /issue/PROJ-404'],
      },
    });
  });

  it('should apply schema defaults before calling the tracker', async () => {
    tracker.on('GET', '/project/search', {
      status: 200,
      data: { startAt: 0, maxResults: 50, total: 0, isLast: true, values: [] },
    });

    const raw = await mcp.callTool({ name: 'get_projects', arguments: {} });

    expect(parseToolResult(raw).isError).toBe(false);
    expect(tracker.requests[0]?.params).toEqual({ startAt: 0, maxResults: 50, status: ['live'] });
  });
});
