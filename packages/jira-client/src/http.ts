/**
 * @fileoverview HTTP plumbing for the Jira client
 * @module @tracklane/jira-client/http
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { JiraClientConfig } from './config.js';
import { TransportError } from './errors.js';

/**
 * Options for the underlying HTTP instance
 */
export interface HttpClientOptions {
  /** Custom axios adapter, e.g. an in-process stand-in for the tracker */
  adapter?: AxiosAdapter;
}

/**
 * Creates the axios instance used for every tracker call.
 * Every status resolves; the client classifies responses itself.
 */
export function createHttpClient(
  config: JiraClientConfig,
  options: HttpClientOptions = {}
): AxiosInstance {
  return axios.create({
    baseURL: `${config.baseUrl}/rest/api/${config.apiVersion}`,
    timeout: config.timeoutMs,
    headers: {
      'Content-Type': 'application/json',
      Accept: 'application/json',
      ...basicAuthHeaders(config.username, config.apiToken),
    },
    validateStatus: () => true,
    // status=live&status=archived rather than status[]=…
    paramsSerializer: { indexes: null },
    ...(options.adapter ? { adapter: options.adapter } : {}),
  });
}

/**
 * Creates headers for Basic authentication
 * @param username - Username
 * @param password - Password or API token
 */
export function basicAuthHeaders(username: string, password: string): Record<string, string> {
  const encoded = Buffer.from(`${username}:${password}`).toString('base64');
  return {
    Authorization: `Basic ${encoded}`,
  };
}

/**
 * Parses the Retry-After header value
 * @param value - The header value (seconds or HTTP date)
 * @returns Retry delay in milliseconds, or undefined
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value * 1000 : undefined;
  }
  if (typeof value !== 'string' || value.trim() === '') return undefined;

  // Try parsing as seconds
  if (/^\d+$/.test(value.trim())) {
    return parseInt(value, 10) * 1000;
  }

  // Try parsing as HTTP date
  const date = new Date(value);
  if (!isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - now);
  }

  return undefined;
}

/**
 * Error bodies of binary requests arrive as bytes; decode them so the
 * tracker's messages survive. JSON bodies are parsed, anything else stays text.
 */
export function decodeErrorBody(data: unknown): unknown {
  const bytes = data instanceof ArrayBuffer ? Buffer.from(data) : data;
  if (!Buffer.isBuffer(bytes)) return data;

  const text = bytes.toString('utf8');
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

/**
 * Collects the human-readable messages of a Jira error body:
 * `errorMessages` first, then `errors` as "field: message".
 */
export function extractTrackerMessages(body: unknown): string[] {
  if (typeof body === 'string') {
    const text = body.trim();
    return text ? [text.slice(0, 500)] : [];
  }
  if (!isRecord(body)) return [];

  const messages: string[] = [];
  if (Array.isArray(body.errorMessages)) {
    for (const message of body.errorMessages) {
      if (typeof message === 'string' && message) messages.push(message);
    }
  }
  if (isRecord(body.errors)) {
    for (const [field, message] of Object.entries(body.errors)) {
      if (typeof message === 'string') messages.push(`${field}: ${message}`);
    }
  }
  if (messages.length === 0 && typeof body.message === 'string') {
    messages.push(body.message);
  }
  return messages;
}

/**
 * Maps a request that produced no response to a TransportError
 */
export function toTransportError(error: unknown): TransportError {
  if (axios.isAxiosError(error)) {
    const timeout = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
    return new TransportError(
      timeout ? `Request timed out: ${error.message}` : `Network error: ${error.message}`,
      { timeout, transportCode: error.code, cause: error }
    );
  }

  const message = error instanceof Error ? error.message : String(error);
  const transportCode =
    error instanceof Error && 'code' in error && typeof error.code === 'string'
      ? error.code
      : undefined;
  return new TransportError(`Network error: ${message}`, { transportCode, cause: error });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
