/**
 * Retry with exponential backoff
 *
 * The wrapped operation is retried only while `shouldRetry` accepts the error;
 * any other error surfaces on the first failure.
 */

import type { BackoffConfig } from "../types";
import { sleep as defaultSleep } from "./time";

export interface RetryInfo {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
  label?: string;
}

export interface RetryPolicy extends BackoffConfig {
  shouldRetry: (error: unknown) => boolean;
  label?: string;
  onRetry?: (info: RetryInfo) => void;
  sleep?: (ms: number) => Promise<void>;
}

/** Read-only filtering calls: fewer attempts, short ceiling */
export const FILTER_BACKOFF: BackoffConfig = {
  maxAttempts: 30,
  multiplierMs: 1_000,
  capMs: 30_000,
};

/** Destructive calls: more attempts, longer ceiling */
export const DELETE_BACKOFF: BackoffConfig = {
  maxAttempts: 100,
  multiplierMs: 3_000,
  capMs: 120_000,
};

/**
 * Wait after the given (1-based) failed attempt
 */
export function backoffDelay(attempt: number, config: BackoffConfig): number {
  return Math.min(config.multiplierMs * 2 ** (attempt - 1), config.capMs);
}

export async function withRetry<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy,
): Promise<T> {
  const sleep = policy.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= policy.maxAttempts || !policy.shouldRetry(error)) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, policy);
      policy.onRetry?.({
        attempt,
        maxAttempts: policy.maxAttempts,
        delayMs,
        error,
        label: policy.label,
      });
      await sleep(delayMs);
    }
  }
}
