// packages/node-client/src/retry.ts
import { setTimeout as delay } from 'node:timers/promises';

import { NodeClientError } from './errors.js';

export type RetryPolicy = {
  /** total attempts, including the first */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 10_000,
});

export type RetryHooks = {
  signal?: AbortSignal;
  /** receives `signal` and should return early once it fires */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onRetry?: (attempt: number, error: NodeClientError, delayMs: number) => void;
};

/** Resolves after `ms`, or as soon as `signal` fires. */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (e) {
    if (!signal?.aborted) throw e;
  }
}

/** Delay after the given failed attempt (1-based): base * 2^(attempt-1), capped. */
export function backoffDelayMs(policy: RetryPolicy, attempt: number): number {
  const delay = Math.pow(2, attempt - 1) * policy.baseDelayMs;
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Run `fn` until it succeeds, the error is not retryable, attempts run out, or
 * the signal fires. The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {}
): Promise<T> {
  const wait = hooks.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (e) {
      if (!(e instanceof NodeClientError) || !e.retryable) throw e;
      if (attempt >= policy.maxAttempts || hooks.signal?.aborted) throw e;

      const delayMs = backoffDelayMs(policy, attempt);
      hooks.onRetry?.(attempt, e, delayMs);
      await wait(delayMs, hooks.signal);
      if (hooks.signal?.aborted) throw e;
    }
  }
}
