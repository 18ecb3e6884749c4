import { sleep } from "@toolgate/shared";
import { isCancellation } from "../errors/errors.js";
import { raceAbort } from "./abort.js";

export type RetryPolicy = {
  /** Total attempts including the first; 1 disables retry. */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  /** Decides whether a failed attempt is worth repeating. Defaults to every non-cancellation error. */
  retryOn?: (error: unknown, attempt: number) => boolean;
};

export type RetryNotice = {
  attempt: number;
  delayMs: number;
  error: unknown;
};

export type RetryHooks = {
  onRetry?: (notice: RetryNotice) => void;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 200,
  maxDelayMs: 5_000,
  multiplier: 2,
};

/** Delay after the given failed attempt (1-based): initial * multiplier^(attempt-1), capped. */
export function computeBackoffDelay(policy: RetryPolicy, attempt: number): number {
  const exponent = Math.max(attempt - 1, 0);
  const delay = policy.initialDelayMs * Math.pow(policy.multiplier, exponent);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Runs `operation` until it succeeds, the attempt budget is spent, or
 * `signal` aborts. Cancellation always surfaces as the signal's reason. When
 * attempts are exhausted the last attempt's error is rethrown unchanged.
 */
export async function withRetry<T>(
  signal: AbortSignal,
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<T>,
  hooks: RetryHooks = {},
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    signal.throwIfAborted();
    try {
      return await raceAbort(operation(attempt), signal);
    } catch (err) {
      if (signal.aborted) throw signal.reason;
      lastError = err;
      if (attempt >= maxAttempts || !shouldRetry(policy, err, attempt)) break;

      const delayMs = computeBackoffDelay(policy, attempt);
      hooks.onRetry?.({ attempt, delayMs, error: err });
      await sleep(delayMs, signal);
    }
  }

  throw lastError;
}

function shouldRetry(policy: RetryPolicy, err: unknown, attempt: number): boolean {
  if (isCancellation(err)) return false;
  return policy.retryOn ? policy.retryOn(err, attempt) : true;
}
