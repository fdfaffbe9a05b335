/**
 * Bounded retry combinator
 *
 * Replaces per-client `while (true) { ... continue }` loops with one unit:
 * the policy decides how many attempts are allowed and, per error, how long
 * to wait before the next attempt (or null to give up immediately).
 */

import { RateLimitedError, TransientNetworkError } from "./errors.js";

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Delay before the next attempt, or null when the error is not retryable */
  delayMs: (error: unknown, attempt: number) => number | null;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: Sleep;
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy
): Promise<T> {
  const wait = policy.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const delay = policy.delayMs(error, attempt);
      if (delay === null || attempt >= policy.maxAttempts) {
        throw error;
      }
      policy.onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }
}

export interface BackoffOptions {
  /** Wait used for 429 responses that carry no Retry-After hint */
  rateLimitWaitSec: number;
  /** Fixed wait between attempts after 5xx / network failures */
  transientBackoffMs: number;
  /** Upper bound for any provider-supplied Retry-After value */
  maxRateLimitWaitSec?: number;
}

/**
 * Standard delay function: honour Retry-After on 429, fixed backoff on
 * transient failures, no retry for anything else.
 */
export function httpBackoff(options: BackoffOptions): RetryPolicy["delayMs"] {
  const maxWait = options.maxRateLimitWaitSec ?? 900;
  return (error) => {
    if (error instanceof RateLimitedError) {
      const seconds = error.retryAfterSeconds ?? options.rateLimitWaitSec;
      return Math.min(seconds, maxWait) * 1000;
    }
    if (error instanceof TransientNetworkError) {
      return options.transientBackoffMs;
    }
    return null;
  };
}
