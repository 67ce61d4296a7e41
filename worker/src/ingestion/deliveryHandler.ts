import { z } from "zod";
import {
  IngestDelivery,
  MAX_INGEST_BATCH,
  QUEUE_RETRY_POLICY,
  RetryPolicy,
  computeBackoffDelay,
  eLog,
  nLog,
} from "@scanflow/shared";
import type { BatchOutcome, IngestionConsumer } from "./ingestionConsumer";

export const deliverySchema = z.object({
  records: z.array(z.unknown()).max(MAX_INGEST_BATCH),
  redelivery: z.number().int().nonnegative().default(0),
});

export type Delivery = IngestDelivery;

export type Requeue = (delivery: Delivery, delayMs: number) => Promise<void>;

export interface DeliveryResult extends BatchOutcome {
  requeued: number;
  dropped: number;
}

/**
 * Process one delivery. Records that failed with a retryable error go back
 * on the queue as a fresh delivery after a backoff; permanent failures are
 * acknowledged and counted. Jobs whose records are dropped after the last
 * delivery are marked FAILED.
 */
export async function handleDelivery(
  consumer: IngestionConsumer,
  data: unknown,
  requeue: Requeue,
  policy: RetryPolicy = QUEUE_RETRY_POLICY
): Promise<DeliveryResult> {
  const delivery = deliverySchema.parse(data);
  const outcome = await consumer.processBatch(delivery.records);

  const retry = delivery.records.filter((_, i) => outcome.results[i].retryable === true);
  if (retry.length === 0) {
    return { ...outcome, requeued: 0, dropped: 0 };
  }

  const attempt = delivery.redelivery + 1;
  if (attempt >= policy.maxAttempts) {
    eLog(`[ingest] giving up on ${retry.length} record(s) after ${attempt} deliveries`);
    for (const result of outcome.results) {
      if (result.retryable === true && result.jobId) {
        await consumer.failJob(result.jobId, result.error ?? `Workflow dispatch failed after ${attempt} deliveries`);
      }
    }
    return { ...outcome, requeued: 0, dropped: retry.length };
  }

  const delayMs = Math.round(computeBackoffDelay(delivery.redelivery, policy));
  await requeue({ records: retry, redelivery: attempt }, delayMs);
  nLog(`[ingest] requeued ${retry.length} record(s) in ${delayMs}ms (delivery ${attempt + 1})`);
  return { ...outcome, requeued: retry.length, dropped: 0 };
}

