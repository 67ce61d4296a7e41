import {
  ErrorKind,
  ImageNotification,
  JobStore,
  WorkflowInput,
  eLog,
  nLog,
  toPipelineError,
  wLog,
} from "@scanflow/shared";
import { ExecutionStarter, executionIdFor } from "../workflow/dispatcher";
import { parseNotification } from "./parseNotification";
import { DEFAULT_OBJECT_LIMITS, ObjectLimits, dedupeKeyFor, validateObject } from "./validateObject";

export interface RecordOutcome {
  success: boolean;
  objectKey: string | null;
  jobId?: string;
  executionId?: string;
  /** Arrival matched an existing job */
  duplicate?: boolean;
  error?: string;
  errorKind?: ErrorKind;
  retryable?: boolean;
}

export interface BatchOutcome {
  successful: number;
  failed: number;
  results: RecordOutcome[];
}

export interface IngestionDeps {
  jobStore: JobStore;
  dispatcher: ExecutionStarter;
  defaultUserId: string;
  limits?: ObjectLimits;
}

/**
 * Turns delivered notifications into jobs and workflow executions. Each
 * record is handled on its own; one bad record never fails the batch.
 */
export class IngestionConsumer {
  private readonly limits: ObjectLimits;

  constructor(private readonly deps: IngestionDeps) {
    this.limits = deps.limits ?? DEFAULT_OBJECT_LIMITS;
  }

  async processRecord(raw: unknown): Promise<RecordOutcome> {
    let notification: ImageNotification | null = null;
    try {
      notification = parseNotification(raw);
      validateObject(notification, this.limits);
      return await this.createAndDispatch(notification);
    } catch (err) {
      const classified = toPipelineError(err);
      const objectKey = notification ? notification.objectKey : null;
      const log = classified.retryable ? wLog : eLog;
      log(`[ingest] ${objectKey ?? "(unparsed)"} rejected (${classified.kind}): ${classified.message}`);
      return {
        success: false,
        objectKey,
        error: classified.message,
        errorKind: classified.kind,
        retryable: classified.retryable,
      };
    }
  }

  private async createAndDispatch(n: ImageNotification): Promise<RecordOutcome> {
    const { jobStore, dispatcher } = this.deps;
    const { jobId, created } = await jobStore.createJob({
      userId: n.userId ?? this.deps.defaultUserId,
      imageKey: n.objectKey,
      dedupeKey: dedupeKeyFor(n),
    });
    const executionId = executionIdFor(jobId);

    if (!created) {
      // Re-dispatch only while the job has not started; the execution id makes it a no-op if queued
      const job = await jobStore.getJob(jobId);
      if (job && job.status !== "UPLOADED") {
        nLog(`[ingest] duplicate arrival for ${n.objectKey}; job ${jobId} already ${job.status}`);
        return { success: true, objectKey: n.objectKey, jobId, executionId, duplicate: true };
      }
    }

    const input: WorkflowInput = {
      job_id: jobId,
      bucket_name: n.bucketName,
      object_key: n.objectKey,
      execution_id: executionId,
      event_time: n.eventTime,
      object_size: n.objectSize,
      etag: n.etag,
    };
    try {
      await dispatcher.startExecution(input);
    } catch (err) {
      const classified = toPipelineError(err);
      const message = `Workflow dispatch failed: ${classified.message}`;
      // A retryable failure keeps the job UPLOADED so a redelivery can dispatch it again
      if (!classified.retryable) await this.failJob(jobId, message);
      const log = classified.retryable ? wLog : eLog;
      log(`[ingest] ${n.objectKey} -> job ${jobId}: ${message}`);
      return {
        success: false,
        objectKey: n.objectKey,
        jobId,
        executionId,
        error: message,
        errorKind: classified.kind,
        retryable: classified.retryable,
      };
    }
    nLog(`[ingest] ${n.objectKey} -> job ${jobId}${created ? "" : " (duplicate)"}, execution ${executionId}`);
    return { success: true, objectKey: n.objectKey, jobId, executionId, duplicate: !created };
  }

  /** Marks a job whose workflow never started as FAILED; a rejected write is logged */
  async failJob(jobId: string, message: string): Promise<void> {
    try {
      await this.deps.jobStore.updateStatus(jobId, "FAILED", { errorMessage: message });
    } catch (err) {
      eLog(`[ingest] could not mark job ${jobId} FAILED: ${toPipelineError(err).message}`);
    }
  }

  async processBatch(records: unknown[]): Promise<BatchOutcome> {
    const results: RecordOutcome[] = [];
    for (const record of records) {
      results.push(await this.processRecord(record));
    }
    const successful = results.filter((r) => r.success).length;
    nLog(`[ingest] batch of ${records.length}: ${successful} ok, ${records.length - successful} failed`);
    return { successful, failed: results.length - successful, results };
  }
}
