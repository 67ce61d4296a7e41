import { z } from "zod";
import {
  JobStore,
  STAGE_NAMES,
  StageName,
  eLog,
  errorMessage,
  isErrorKind,
  nLog,
  wLog,
} from "@scanflow/shared";
import type { ExecutionLogSink } from "../notifications/executionLog";

/**
 * Error payload as it reaches the handler: the structured envelope the
 * orchestrator builds (`message`, `kind`, `errorType`), or the older
 * `{ Error, Cause }` pair whose Cause may itself be JSON, sometimes twice.
 */
const errorPayload = z.object({
  message: z.string().optional(),
  kind: z.string().optional(),
  errorType: z.string().optional(),
  Error: z.string().optional(),
  Cause: z.string().optional(),
});

const handlerPayload = z.object({
  job_id: z.string().min(1),
  stage: z.enum(STAGE_NAMES),
  execution_id: z.string().min(1),
  error: errorPayload.default({}),
});

export type ErrorHandlerPayload = z.input<typeof handlerPayload>;
export type ErrorDetails = z.infer<typeof errorPayload>;

export type ErrorHandlerResponse =
  | {
      statusCode: 200;
      job_id: string;
      execution_id: string;
      stage: StageName;
      error_message: string;
      status_updated: boolean;
      logged: boolean;
    }
  | { statusCode: 400; error: string; missing: string[] };

export interface ErrorHandlerDeps {
  jobStore: JobStore;
  logSink: ExecutionLogSink;
  now: () => Date;
}

function messageFromObject(value: unknown): string | undefined {
  if (typeof value !== "object" || value === null) return undefined;
  for (const key of ["errorMessage", "message"]) {
    const candidate: unknown = Reflect.get(value, key);
    if (typeof candidate === "string" && candidate.trim() !== "") return candidate;
  }
  return undefined;
}

function tryParseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/** Message inside a Cause string, unwrapping one extra level of JSON encoding */
function messageFromCause(cause: string): string | undefined {
  let parsed = tryParseJson(cause);
  if (typeof parsed === "string") parsed = tryParseJson(parsed) ?? parsed;

  const direct = messageFromObject(parsed);
  if (direct === undefined) return undefined;

  // errorMessage may itself be an encoded payload
  const nested = messageFromObject(tryParseJson(direct));
  return nested ?? direct;
}

/**
 * Human-readable failure text. Tried in order: structured message, message
 * inside a JSON Cause, the raw Cause, the Error name, "Unknown error".
 */
export function extractErrorMessage(error: ErrorDetails): string {
  if (error.message && error.message.trim() !== "") return error.message;
  if (error.Cause && error.Cause.trim() !== "") {
    return messageFromCause(error.Cause) ?? error.Cause;
  }
  if (error.Error && error.Error.trim() !== "") return error.Error;
  return "Unknown error";
}

/**
 * Terminal catch for a failed stage: FAILED first, then a best-effort entry
 * in the execution log. Sink failures never undo the status write.
 */
export async function handleStageError(deps: ErrorHandlerDeps, raw: unknown): Promise<ErrorHandlerResponse> {
  const parsed = handlerPayload.safeParse(raw);
  if (!parsed.success) {
    const missing = [...new Set(parsed.error.issues.map((i) => i.path.join(".") || "(payload)"))];
    wLog(`[error-handler] rejected payload: ${missing.join(", ")}`);
    return { statusCode: 400, error: `Missing or invalid required parameter(s): ${missing.join(", ")}`, missing };
  }

  const { job_id, stage, execution_id, error } = parsed.data;
  const message = extractErrorMessage(error);
  const errorType = error.errorType ?? error.Error ?? "UnknownError";
  nLog(`[error-handler] job ${job_id} failed in ${stage}: ${message}`);

  // A status conflict means another writer owns the job
  const statusUpdated = errorType !== "StatusTransitionError";
  if (statusUpdated) {
    await deps.jobStore.updateStatus(job_id, "FAILED", { errorMessage: message });
  }

  let logged = false;
  try {
    await deps.logSink.append(execution_id, {
      timestamp: deps.now().toISOString(),
      job_id,
      execution_id,
      stage,
      error_type: errorType,
      error_kind: isErrorKind(error.kind) ? error.kind : null,
      message,
    });
    logged = true;
  } catch (err) {
    eLog(`[error-handler] execution log append failed for ${execution_id}: ${errorMessage(err)}`);
  }

  return {
    statusCode: 200,
    job_id,
    execution_id,
    stage,
    error_message: message,
    status_updated: statusUpdated,
    logged,
  };
}
