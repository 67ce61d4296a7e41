/**
 * Retry policies
 *
 * Delay for attempt k (0-based): min(initialDelayMs * backoffMultiplier^k, maxDelayMs),
 * scaled by a uniform factor in [0.5, 1.0] when jitter is on.
 */

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitter: boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 60_000,
  backoffMultiplier: 2,
  jitter: true,
};

/** Capability calls inside a stage */
export const STAGE_RETRY_POLICY: RetryPolicy = { ...DEFAULT_RETRY_POLICY };

/** Object storage reads/writes */
export const STORAGE_RETRY_POLICY: RetryPolicy = { ...DEFAULT_RETRY_POLICY };

/** Queue adds (ingestion requeue, workflow dispatch) */
export const QUEUE_RETRY_POLICY: RetryPolicy = {
  ...DEFAULT_RETRY_POLICY,
  maxAttempts: 5,
  initialDelayMs: 500,
  maxDelayMs: 30_000,
};

/** Relational store */
export const DB_RETRY_POLICY: RetryPolicy = {
  ...DEFAULT_RETRY_POLICY,
  initialDelayMs: 2000,
};

/** Outbound notifications */
export const NOTIFY_RETRY_POLICY: RetryPolicy = { ...DEFAULT_RETRY_POLICY };

export function retryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const merged = { ...DEFAULT_RETRY_POLICY, ...overrides };
  if (!Number.isInteger(merged.maxAttempts) || merged.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${merged.maxAttempts}`);
  }
  if (merged.initialDelayMs < 0 || merged.maxDelayMs < 0) {
    throw new RangeError("retry delays must be non-negative");
  }
  if (merged.backoffMultiplier < 1) {
    throw new RangeError(`backoffMultiplier must be >= 1, got ${merged.backoffMultiplier}`);
  }
  return merged;
}

export function computeBackoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  const raw = policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt);
  const capped = Math.min(raw, policy.maxDelayMs);
  if (!policy.jitter) return capped;
  return capped * (0.5 + random() * 0.5);
}
