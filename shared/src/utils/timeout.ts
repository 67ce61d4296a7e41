import { RetryableError } from "../errors/pipelineErrors";

/**
 * Race `promise` against a timer. Expiry rejects with a transient error so
 * retry policies treat it like any other request timeout. The underlying
 * work is not cancelled.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new RetryableError(`${label} timed out after ${ms}ms`, "transient")), ms);
  });
  try {
    return await Promise.race([promise, expired]);
  } finally {
    clearTimeout(timer);
  }
}
