/**
 * @fileoverview Error taxonomy for the Jira client
 * @module @tracklane/jira-client/errors
 */

import type { ZodIssue } from 'zod';

/**
 * Error codes for client failures
 */
export enum JiraErrorCode {
  /** Invalid or missing configuration */
  CONFIG_ERROR = 'CONFIG_ERROR',
  /** Operation input rejected before any network call */
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  /** Local rate limiter refused the call */
  RATE_LIMITED = 'RATE_LIMITED',
  /** Network/connectivity error */
  NETWORK_ERROR = 'NETWORK_ERROR',
  /** Transport-level timeout */
  TIMEOUT = 'TIMEOUT',
  /** Non-2xx response from the tracker */
  TRACKER_API_ERROR = 'TRACKER_API_ERROR',
  /** Primary write succeeded, follow-up steps did not */
  PARTIAL_FAILURE = 'PARTIAL_FAILURE',
  /** Unknown/internal error */
  UNKNOWN = 'UNKNOWN',
}

/**
 * Coarse classification of a tracker HTTP status
 */
export type TrackerErrorReason =
  | 'BAD_REQUEST'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'RATE_LIMITED'
  | 'SERVER_ERROR'
  | 'UNKNOWN';

const HTTP_STATUS_TO_REASON: Record<number, TrackerErrorReason> = {
  400: 'BAD_REQUEST',
  401: 'UNAUTHORIZED',
  403: 'FORBIDDEN',
  404: 'NOT_FOUND',
  409: 'CONFLICT',
  429: 'RATE_LIMITED',
};

/**
 * Base error class for all client errors
 */
export class JiraClientError extends Error {
  /** Error code */
  readonly code: JiraErrorCode;
  /** HTTP status code if applicable */
  readonly statusCode?: number;
  /** Additional error details */
  readonly details?: unknown;
  /** Whether the caller may sensibly retry */
  readonly retryable: boolean;
  /** Suggested retry delay in milliseconds */
  readonly retryAfter?: number;

  constructor(
    message: string,
    code: JiraErrorCode,
    options?: {
      statusCode?: number;
      details?: unknown;
      retryable?: boolean;
      retryAfter?: number;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'JiraClientError';
    this.code = code;
    this.statusCode = options?.statusCode;
    this.details = options?.details;
    this.retryable = options?.retryable ?? false;
    this.retryAfter = options?.retryAfter;
  }

  /**
   * Converts the error to a JSON-serializable object
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      details: this.details,
      retryable: this.retryable,
      retryAfter: this.retryAfter,
    };
  }
}

/**
 * Invalid rate-limit parameters or missing credentials.
 * Raised at construction time only.
 */
export class ConfigurationError extends JiraClientError {
  constructor(message: string, details?: unknown) {
    super(message, JiraErrorCode.CONFIG_ERROR, { details });
    this.name = 'ConfigurationError';
  }
}

/**
 * Malformed operation input, caught before any network call
 */
export class ValidationError extends JiraClientError {
  /** Field path → messages */
  readonly fieldErrors: Record<string, string[]>;

  constructor(message: string, fieldErrors: Record<string, string[]> = {}) {
    super(message, JiraErrorCode.VALIDATION_ERROR, { details: fieldErrors });
    this.name = 'ValidationError';
    this.fieldErrors = fieldErrors;
  }

  /**
   * Builds a ValidationError from zod issues.
   * Issues without a path are reported under `_root`.
   */
  static fromZodIssues(issues: ZodIssue[], message = 'Invalid arguments'): ValidationError {
    const fieldErrors: Record<string, string[]> = {};
    for (const issue of issues) {
      const key = issue.path.length > 0 ? issue.path.join('.') : '_root';
      (fieldErrors[key] ??= []).push(issue.message);
    }
    return new ValidationError(message, fieldErrors);
  }
}

/**
 * The local limiter refused the call (reject policy only)
 */
export class RateLimitExceededError extends JiraClientError {
  constructor(retryAfter: number, message = 'Rate limit exceeded') {
    super(message, JiraErrorCode.RATE_LIMITED, { retryable: true, retryAfter });
    this.name = 'RateLimitExceededError';
  }
}

/**
 * The request never produced an HTTP response
 */
export class TransportError extends JiraClientError {
  /** Low-level error code reported by the HTTP stack, e.g. ECONNREFUSED */
  readonly transportCode?: string;

  constructor(
    message: string,
    options?: { timeout?: boolean; transportCode?: string; cause?: unknown }
  ) {
    super(message, options?.timeout ? JiraErrorCode.TIMEOUT : JiraErrorCode.NETWORK_ERROR, {
      retryable: true,
      cause: options?.cause,
    });
    this.name = 'TransportError';
    this.transportCode = options?.transportCode;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), transportCode: this.transportCode };
  }
}

/**
 * Non-2xx response from the tracker, reported verbatim
 */
export class TrackerApiError extends JiraClientError {
  declare readonly statusCode: number;
  readonly reason: TrackerErrorReason;
  /** Messages returned by the tracker (errorMessages plus field errors) */
  readonly trackerMessages: string[];

  constructor(
    statusCode: number,
    trackerMessages: string[],
    options?: { details?: unknown; retryAfter?: number; method?: string; path?: string }
  ) {
    const target = options?.method && options.path ? ` for ${options.method} ${options.path}` : '';
    const summary = trackerMessages.length > 0 ? `: ${trackerMessages.join('; ')}` : '';
    super(`Tracker responded with ${statusCode}${target}${summary}`, JiraErrorCode.TRACKER_API_ERROR, {
      statusCode,
      details: options?.details,
      retryable: statusCode === 429 || statusCode >= 500,
      retryAfter: options?.retryAfter,
    });
    this.name = 'TrackerApiError';
    this.reason = reasonForStatus(statusCode);
    this.trackerMessages = trackerMessages;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), reason: this.reason, trackerMessages: this.trackerMessages };
  }
}

/**
 * A follow-up step of a multi-call operation that did not complete
 */
export interface SubStepFailure {
  /** Which step failed */
  step: 'attachment' | 'link';
  /** What the step was acting on, e.g. an attachment filename */
  target: string;
  error: JiraClientError;
}

/**
 * Identity of an issue created by a multi-step operation
 */
export interface CreatedIssueRef {
  id: string;
  key: string;
  self: string;
}

/**
 * Follow-up work that did complete before or alongside the failures
 */
export interface CompletedSteps {
  attachmentsCopied: number;
  linked: boolean;
}

/**
 * The primary write succeeded but one or more follow-up steps failed
 */
export class PartialFailureError extends JiraClientError {
  readonly issue: CreatedIssueRef;
  readonly failures: SubStepFailure[];
  readonly completed: CompletedSteps;

  constructor(
    issue: CreatedIssueRef,
    failures: SubStepFailure[],
    completed: CompletedSteps = { attachmentsCopied: 0, linked: false }
  ) {
    super(
      `Issue ${issue.key} was created but ${failures.length} follow-up step(s) failed`,
      JiraErrorCode.PARTIAL_FAILURE,
      { retryable: false }
    );
    this.name = 'PartialFailureError';
    this.issue = issue;
    this.failures = failures;
    this.completed = completed;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      issue: this.issue,
      completed: this.completed,
      failures: this.failures.map((failure) => ({
        step: failure.step,
        target: failure.target,
        error: failure.error.toJSON(),
      })),
    };
  }
}

function reasonForStatus(statusCode: number): TrackerErrorReason {
  const mapped = HTTP_STATUS_TO_REASON[statusCode];
  if (mapped) return mapped;
  if (statusCode >= 500) return 'SERVER_ERROR';
  return 'UNKNOWN';
}

/**
 * Type guard to check if an error is a JiraClientError
 */
export function isJiraClientError(error: unknown): error is JiraClientError {
  return error instanceof JiraClientError;
}

/**
 * Converts any thrown value into a JiraClientError
 */
export function toJiraClientError(error: unknown): JiraClientError {
  if (isJiraClientError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : 'Unknown error';
  return new JiraClientError(message, JiraErrorCode.UNKNOWN, { cause: error });
}
