import { eLog, wLog } from "../logger";
import { PipelineError, RetryableError, toPipelineError } from "../errors/pipelineErrors";
import { RetryPolicy, computeBackoffDelay } from "./retryPolicy";

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: PipelineError; attempts: number };

export interface RetryOptions {
  /** Used in log lines, e.g. "segmentation.invoke" */
  operation: string;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  /** Called before each sleep; handy for metrics and tests */
  onRetry?: (info: { attempt: number; delayMs: number; error: PipelineError }) => void;
}

export const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Run `op` under `policy`. Non-retryable classifications stop after the
 * attempt that produced them; retryable ones are retried until maxAttempts,
 * after which the last failure comes back as a RetryableError.
 */
export async function executeWithRetry<T>(
  op: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  opts: RetryOptions
): Promise<RetryOutcome<T>> {
  const sleep = opts.sleep ?? defaultSleep;
  let last: PipelineError | undefined;

  for (let attempt = 0; attempt < policy.maxAttempts; attempt++) {
    try {
      const value = await op(attempt);
      return { ok: true, value, attempts: attempt + 1 };
    } catch (err) {
      const classified = toPipelineError(err);
      if (!classified.retryable) {
        eLog(`[retry] ${opts.operation} failed with non-retryable ${classified.kind} error: ${classified.message}`);
        return { ok: false, error: classified, attempts: attempt + 1 };
      }
      last = classified;

      if (attempt < policy.maxAttempts - 1) {
        const delayMs = computeBackoffDelay(attempt, policy, opts.random);
        wLog(
          `[retry] ${opts.operation} attempt ${attempt + 1}/${policy.maxAttempts} failed (${classified.kind}): ${classified.message}. Retrying in ${Math.round(delayMs)}ms`
        );
        opts.onRetry?.({ attempt: attempt + 1, delayMs, error: classified });
        await sleep(delayMs);
      }
    }
  }

  const final = last ?? new RetryableError(`${opts.operation} failed`);
  eLog(`[retry] ${opts.operation} exhausted ${policy.maxAttempts} attempts: ${final.message}`);
  const exhausted =
    final instanceof RetryableError
      ? final
      : new RetryableError(final.message, final.kind === "throttling" ? "throttling" : "transient", final);
  return { ok: false, error: exhausted, attempts: policy.maxAttempts };
}

/** Throwing variant for call sites that propagate failures */
export async function runWithRetry<T>(
  op: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  opts: RetryOptions
): Promise<T> {
  const outcome = await executeWithRetry(op, policy, opts);
  if (outcome.ok) return outcome.value;
  throw outcome.error;
}
