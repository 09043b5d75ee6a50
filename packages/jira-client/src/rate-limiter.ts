/**
 * @fileoverview Token bucket rate limiting for outbound tracker calls.
 * @packageDocumentation
 */

import { ConfigurationError, RateLimitExceededError } from './errors.js';

/**
 * What to do when no token is available
 * - `wait`: sleep until a token is available, then proceed
 * - `reject`: fail the call with RateLimitExceededError
 */
export type RateLimitPolicy = 'wait' | 'reject';

/**
 * Rate limit configuration
 */
export interface RateLimitConfig {
  /** Maximum calls per period (bucket capacity) */
  readonly calls: number;
  /** Period length in milliseconds */
  readonly periodMs: number;
  /** Behaviour when the bucket is empty */
  readonly policy: RateLimitPolicy;
}

/**
 * Time source used by the bucket. Injected so tests control the clock.
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Token bucket rate limiter.
 *
 * `acquire()` is synchronous: refill and spend happen in one step on the
 * event loop, so concurrent callers can never spend the same fractional
 * token. Sleeping happens in `waitForToken()` between acquisitions.
 *
 * @example
 * ```typescript
 * const bucket = new TokenBucket({ calls: 100, periodMs: 60_000, policy: 'wait' });
 *
 * // Report-only: returns 0 and spends a token, or returns the wait in ms
 * const wait = bucket.acquire();
 *
 * // Blocking: sleeps until a token has been spent
 * await bucket.waitForToken();
 * ```
 */
export class TokenBucket {
  private readonly config: RateLimitConfig;
  private readonly clock: Clock;
  private tokens: number;
  private lastRefillAt: number;

  /**
   * @throws ConfigurationError if capacity or period is not a positive number
   */
  constructor(config: RateLimitConfig, clock: Clock = systemClock) {
    assertPositive('calls', config.calls);
    assertPositive('periodMs', config.periodMs);

    this.config = config;
    this.clock = clock;
    this.tokens = config.calls;
    this.lastRefillAt = clock.now();
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsed = now - this.lastRefillAt;

    if (elapsed > 0) {
      const tokensToAdd = (elapsed / this.config.periodMs) * this.config.calls;
      this.tokens = Math.min(this.tokens + tokensToAdd, this.config.calls);
    }
    this.lastRefillAt = now;
  }

  /**
   * Try to spend one token.
   * @returns 0 if a token was spent, otherwise the milliseconds until one is available
   */
  acquire(): number {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return 0;
    }

    return ((1 - this.tokens) * this.config.periodMs) / this.config.calls;
  }

  /**
   * Spend one token, sleeping while the bucket is empty.
   * @returns Total milliseconds spent waiting
   * @throws RateLimitExceededError under the `reject` policy when the bucket is empty
   */
  async waitForToken(): Promise<number> {
    let waited = 0;

    for (;;) {
      const wait = this.acquire();
      if (wait === 0) {
        return waited;
      }
      if (this.config.policy === 'reject') {
        throw new RateLimitExceededError(Math.ceil(wait));
      }
      // Another caller may take the refilled token first; loop and re-check.
      await this.clock.sleep(wait);
      waited += wait;
    }
  }

  /**
   * Milliseconds until a token is available, without spending one.
   */
  getTimeUntilNextToken(): number {
    this.refill();
    if (this.tokens >= 1) {
      return 0;
    }
    return ((1 - this.tokens) * this.config.periodMs) / this.config.calls;
  }

  /**
   * Current (fractional) token count after refill
   */
  getAvailableTokens(): number {
    this.refill();
    return this.tokens;
  }

  getConfig(): RateLimitConfig {
    return this.config;
  }
}

function assertPositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`Rate limit ${name} must be a positive number, got ${value}`);
  }
}
