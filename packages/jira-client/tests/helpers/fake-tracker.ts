/**
 * In-process stand-in for the Jira REST API, plugged in as an axios adapter.
 */

import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { createLogger, type Logger } from '@tracklane/logger';
import { JiraClient } from '../../src/client.js';
import type { JiraClientConfigInput } from '../../src/config.js';
import type { Clock } from '../../src/rate-limiter.js';

export interface RecordedRequest {
  method: string;
  url: string;
  params: unknown;
  body: unknown;
  headers: Record<string, unknown>;
}

export interface FakeReply {
  status: number;
  data?: unknown;
  headers?: Record<string, string>;
}

type Responder = FakeReply | Error | ((request: RecordedRequest) => FakeReply | Error);

interface Route {
  method: string;
  path: string | RegExp;
  responder: Responder;
}

/**
 * Binary requests get their body back as bytes whatever the status, the way
 * the node adapter delivers them.
 */
function encodeBody(data: unknown, responseType: InternalAxiosRequestConfig['responseType']): unknown {
  if (responseType !== 'arraybuffer' || Buffer.isBuffer(data)) return data;
  return Buffer.from(typeof data === 'string' ? data : JSON.stringify(data));
}

export class FakeTracker {
  readonly requests: RecordedRequest[] = [];
  private readonly routes: Route[] = [];

  on(method: string, path: string | RegExp, responder: Responder): this {
    this.routes.push({ method: method.toUpperCase(), path, responder });
    return this;
  }

  readonly adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
    const request: RecordedRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      params: config.params,
      body: typeof config.data === 'string' && config.data ? JSON.parse(config.data) : config.data,
      headers: config.headers.toJSON(),
    };
    this.requests.push(request);

    const route = this.routes.find(
      (candidate) =>
        candidate.method === request.method &&
        (typeof candidate.path === 'string'
          ? candidate.path === request.url
          : candidate.path.test(request.url))
    );

    const reply = route
      ? typeof route.responder === 'function'
        ? route.responder(request)
        : route.responder
      : { status: 404, data: { errorMessages: [`No route for ${request.method} ${request.url}`] } };

    if (reply instanceof Error) {
      throw reply;
    }

    const response: AxiosResponse = {
      data: encodeBody(reply.data ?? '', config.responseType),
      status: reply.status,
      statusText: String(reply.status),
      headers: reply.headers ?? {},
      config,
    };
    return response;
  };
}

export const TEST_CONFIG = {
  baseUrl: 'https://example.atlassian.net',
  username: 'me@example.com',
  apiToken: 'test-secret',
} satisfies JiraClientConfigInput;

export function quietLogger(): Logger {
  return createLogger({ serviceName: 'jira-client-test', level: 'fatal' });
}

export function createTestClient(
  tracker: FakeTracker,
  overrides: Partial<JiraClientConfigInput> = {},
  clock?: Clock
): JiraClient {
  return new JiraClient(
    { ...TEST_CONFIG, ...overrides },
    { adapter: tracker.adapter, logger: quietLogger(), clock }
  );
}

/**
 * Clock whose sleep advances time instantly
 */
export class FakeClock implements Clock {
  readonly slept: number[] = [];
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.slept.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
