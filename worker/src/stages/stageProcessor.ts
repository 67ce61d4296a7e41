import type { z } from "zod";
import {
  JobStatus,
  JobStore,
  RetryPolicy,
  StageFailure,
  StageName,
  eLog,
  errorMessage,
  nLog,
  runWithRetry,
  toErrorEnvelope,
  wLog,
  withTimeout,
} from "@scanflow/shared";
import type { Capabilities } from "../capabilities/types";
import type { Notifier } from "../notifications/notifier";
import type { ObjectStorage } from "../storage/objectStorage";
import type { StageOutputs, StageRejection, StageResponse } from "./contracts";

export interface StageSettings {
  outputBucket: string;
  vlmPrompt: string;
  topK: number;
  /** Deadline for one artifact transfer or capability call */
  callTimeoutMs: number;
  retryPolicy: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  now: () => Date;
}

/** Collaborators handed to every stage once per process */
export interface StageDeps {
  jobStore: JobStore;
  storage: ObjectStorage;
  capabilities: Capabilities;
  notifier: Notifier;
  settings: StageSettings;
}

export interface StagePayloadBase {
  job_id: string;
  execution_id: string;
}

export interface StageContext<P> {
  payload: P;
  deps: StageDeps;
  /** Capability call: retried under the stage policy, each attempt bounded by the call timeout */
  invoke<T>(operation: string, fn: () => Promise<T>): Promise<T>;
  /** Artifact transfer: bounded by the call timeout; the storage client retries on its own */
  transfer<T>(operation: string, fn: () => Promise<T>): Promise<T>;
  /** Seconds since the stage started */
  elapsedSeconds(): number;
}

export interface StageDefinition<S extends StageName, P extends StagePayloadBase> {
  stage: S;
  inProgressStatus: JobStatus;
  schema: z.ZodType<P>;
  run(ctx: StageContext<P>): Promise<StageOutputs[S]>;
}

function rejection(issues: z.ZodIssue[]): StageRejection {
  const missing = [...new Set(issues.map((issue) => issue.path.join(".") || "(payload)"))];
  return {
    statusCode: 400,
    error: `Missing or invalid required parameter(s): ${missing.join(", ")}`,
    missing,
  };
}

/**
 * Shared skeleton of every stage processor:
 * validate, mark in progress, run the body, and on any failure mark the job
 * FAILED before rethrowing a StageFailure for the orchestrator's catch path.
 */
export async function runStage<S extends StageName, P extends StagePayloadBase>(
  def: StageDefinition<S, P>,
  deps: StageDeps,
  raw: unknown
): Promise<StageResponse<S>> {
  const tag = `[stage:${def.stage}]`;
  const parsed = def.schema.safeParse(raw);
  if (!parsed.success) {
    const rejected = rejection(parsed.error.issues);
    wLog(`${tag} rejected payload: ${rejected.error}`);
    return rejected;
  }

  const payload = parsed.data;
  const { settings } = deps;
  const startedAt = settings.now().getTime();

  const ctx: StageContext<P> = {
    payload,
    deps,
    invoke: (operation, fn) =>
      runWithRetry(() => withTimeout(fn(), settings.callTimeoutMs, operation), settings.retryPolicy, {
        operation,
        sleep: settings.sleep,
      }),
    transfer: (operation, fn) => withTimeout(fn(), settings.callTimeoutMs, operation),
    elapsedSeconds: () => (settings.now().getTime() - startedAt) / 1000,
  };

  try {
    await deps.jobStore.updateStatus(payload.job_id, def.inProgressStatus);
    nLog(`${tag} job ${payload.job_id} -> ${def.inProgressStatus}`);
    const output = await def.run(ctx);
    nLog(`${tag} job ${payload.job_id} done in ${ctx.elapsedSeconds().toFixed(2)}s`);
    return output;
  } catch (err) {
    const envelope = toErrorEnvelope(err, def.stage);
    eLog(`${tag} job ${payload.job_id} failed (${envelope.errorType}/${envelope.kind}): ${envelope.message}`);

    // A rejected status write means another writer owns the job; leave it alone
    if (envelope.errorType !== "StatusTransitionError") {
      try {
        await deps.jobStore.updateStatus(payload.job_id, "FAILED", { errorMessage: envelope.message });
      } catch (markErr) {
        eLog(`${tag} could not mark job ${payload.job_id} FAILED: ${errorMessage(markErr)}`);
      }
    }
    throw new StageFailure(envelope, err);
  }
}
