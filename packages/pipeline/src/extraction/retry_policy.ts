import type { RetryPolicy } from "@chunkwise/shared";

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000,
};

/**
 * Delay before retry number `retry` (0 for the first retry): base × 2^retry, capped.
 */
export function backoffDelayMs(policy: RetryPolicy, retry: number): number {
  return Math.min(policy.baseDelayMs * 2 ** retry, policy.maxDelayMs);
}

export function maxAttempts(policy: RetryPolicy): number {
  return policy.maxRetries + 1;
}
