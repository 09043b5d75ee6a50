/**
 * @fileoverview Client configuration and the environment loader
 * @module @tracklane/jira-client/config
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { RateLimitConfig } from './rate-limiter.js';

export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_RATE_LIMIT = Object.freeze<RateLimitConfig>({
  calls: 60,
  periodMs: 60000,
  policy: 'wait',
});

/**
 * Jira client configuration as supplied by callers
 */
export const JiraClientConfigSchema = z.object({
  /** Jira instance base URL (e.g., https://example.atlassian.net) */
  baseUrl: z
    .string()
    .url('baseUrl must be an absolute URL')
    .transform((url) => url.replace(/\/+$/, '')),
  /** Account used for basic authentication */
  username: z.string().min(1, 'username is required'),
  /** API token for basic authentication */
  apiToken: z.string().min(1, 'apiToken is required'),
  /** Request timeout in milliseconds; 0 disables the timeout */
  timeoutMs: z.number().int().nonnegative().default(DEFAULT_TIMEOUT_MS),
  /** REST API version */
  apiVersion: z.enum(['2', '3']).default('3'),
  rateLimit: z
    .object({
      calls: z.number().default(DEFAULT_RATE_LIMIT.calls),
      periodMs: z.number().default(DEFAULT_RATE_LIMIT.periodMs),
      policy: z.enum(['wait', 'reject']).default(DEFAULT_RATE_LIMIT.policy),
    })
    .default({}),
});

export type JiraClientConfigInput = z.input<typeof JiraClientConfigSchema>;

/**
 * Validated configuration. Immutable once resolved.
 */
export interface JiraClientConfig {
  readonly baseUrl: string;
  readonly username: string;
  readonly apiToken: string;
  readonly timeoutMs: number;
  readonly apiVersion: '2' | '3';
  readonly rateLimit: RateLimitConfig;
}

/**
 * Validates caller-supplied configuration.
 * Rate limit values are range-checked by the TokenBucket itself.
 * @throws ConfigurationError listing every invalid field
 */
export function resolveConfig(input: JiraClientConfigInput): JiraClientConfig {
  const parsed = JiraClientConfigSchema.safeParse(input);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.'));
    throw new ConfigurationError(
      `Invalid Jira configuration: ${[...new Set(fields)].join(', ')}`,
      parsed.error.flatten().fieldErrors
    );
  }

  const { rateLimit, ...rest } = parsed.data;
  return Object.freeze({ ...rest, rateLimit: Object.freeze({ ...rateLimit }) });
}

const EnvSchema = z.object({
  JIRA_URL: z.string().url(),
  JIRA_USERNAME: z.string().min(1),
  JIRA_API_TOKEN: z.string().min(1),
  JIRA_RATE_LIMIT_CALLS: z.coerce.number().positive().default(DEFAULT_RATE_LIMIT.calls),
  JIRA_RATE_LIMIT_PERIOD: z.coerce.number().positive().default(DEFAULT_RATE_LIMIT.periodMs / 1000),
  JIRA_RATE_LIMIT_POLICY: z.enum(['wait', 'reject']).default(DEFAULT_RATE_LIMIT.policy),
  JIRA_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(DEFAULT_TIMEOUT_MS),
  JIRA_API_VERSION: z.enum(['2', '3']).default('3'),
});

/**
 * Loads client configuration from environment variables.
 *
 * - JIRA_URL, JIRA_USERNAME, JIRA_API_TOKEN (required)
 * - JIRA_RATE_LIMIT_CALLS: calls per period (default 60)
 * - JIRA_RATE_LIMIT_PERIOD: period in seconds (default 60)
 * - JIRA_RATE_LIMIT_POLICY: wait | reject (default wait)
 * - JIRA_TIMEOUT_MS: request timeout (default 30000)
 * - JIRA_API_VERSION: 2 | 3 (default 3)
 *
 * @throws ConfigurationError naming every missing or invalid variable
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): JiraClientConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))];
    throw new ConfigurationError(
      `Missing or invalid environment variables: ${variables.join(', ')}`,
      { variables }
    );
  }

  const vars = parsed.data;
  return resolveConfig({
    baseUrl: vars.JIRA_URL,
    username: vars.JIRA_USERNAME,
    apiToken: vars.JIRA_API_TOKEN,
    timeoutMs: vars.JIRA_TIMEOUT_MS,
    apiVersion: vars.JIRA_API_VERSION,
    rateLimit: {
      calls: vars.JIRA_RATE_LIMIT_CALLS,
      periodMs: vars.JIRA_RATE_LIMIT_PERIOD * 1000,
      policy: vars.JIRA_RATE_LIMIT_POLICY,
    },
  });
}
