/**
 * Bounded retry with exponential backoff for transient fetch failures.
 */

import { FetchError } from "../errors.js";
import type { Clock } from "./throttle.js";

export interface RetryPolicy {
  /** Retries after the first attempt */
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 8_000,
};

export function backoffDelay(policy: RetryPolicy, retry: number): number {
  return Math.min(policy.baseDelayMs * 2 ** (retry - 1), policy.maxDelayMs);
}

/**
 * Run `attempt` until it succeeds, fails non-transiently, or retries run out.
 * Only transient FetchErrors are retried.
 */
export async function withRetry<T>(
  attempt: () => Promise<T>,
  policy: RetryPolicy,
  clock: Clock,
  onRetry?: (error: FetchError, retry: number, delayMs: number) => void
): Promise<T> {
  for (let retry = 0; ; retry++) {
    try {
      return await attempt();
    } catch (err) {
      if (!(err instanceof FetchError) || !err.transient || retry >= policy.maxRetries) {
        throw err;
      }
      const delayMs = backoffDelay(policy, retry + 1);
      onRetry?.(err, retry + 1, delayMs);
      await clock.sleep(delayMs);
    }
  }
}
