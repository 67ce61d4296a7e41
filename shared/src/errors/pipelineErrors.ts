import type { StageName } from "../types";
import { ErrorKind, classify, extractErrorSignals, isRetryable } from "./classify";

/**
 * Base class for every classified failure raised inside the pipeline.
 * `errorType` is the stable wire name used by workflow retry/catch matching.
 */
export class PipelineError extends Error {
  readonly kind: ErrorKind;
  readonly errorType: string;

  constructor(message: string, kind: ErrorKind, errorType: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = errorType;
    this.kind = kind;
    this.errorType = errorType;
  }

  get retryable(): boolean {
    return isRetryable(this.kind);
  }
}

/** Transient or throttling failure; safe to try again */
export class RetryableError extends PipelineError {
  constructor(message: string, kind: "transient" | "throttling" = "transient", cause?: unknown) {
    super(message, kind, "RetryableError", cause);
  }
}

/** Fail-fast failure (permanent, authentication or validation) */
export class PermanentError extends PipelineError {
  constructor(
    message: string,
    kind: "permanent" | "authentication" | "validation" = "permanent",
    cause?: unknown
  ) {
    super(message, kind, "PermanentError", cause);
  }
}

/** Rejected job status write (backwards move, terminal job, or precondition mismatch) */
export class StatusTransitionError extends PipelineError {
  constructor(message: string) {
    super(message, "validation", "StatusTransitionError");
  }
}

/** Ingestion payload that cannot be parsed */
export class NotificationParseError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, "permanent", "NotificationParseError", cause);
  }
}

/**
 * A capability answered at the transport level but the answer is unusable.
 * Always permanent: retries already happened around the call itself.
 */
export class StageDomainError extends PipelineError {
  constructor(message: string, errorType: string) {
    super(message, "permanent", errorType);
  }
}

export class SegmentationError extends StageDomainError {
  constructor(message: string) {
    super(message, "SegmentationError");
  }
}

export class VLMProcessingError extends StageDomainError {
  constructor(message: string) {
    super(message, "VLMProcessingError");
  }
}

export class LLMEnhancementError extends StageDomainError {
  constructor(message: string) {
    super(message, "LLMEnhancementError");
  }
}

export class DataValidationError extends PipelineError {
  readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    super(message, "validation", "DataValidationError");
    this.problems = problems;
  }
}

/**
 * The stage could not be invoked at all (no slot, no handler).
 * These are the only failures the orchestrator retries at state level.
 */
export class StageServiceError extends PipelineError {
  constructor(message: string, errorType: "ServiceException" | "TooManyRequestsException") {
    super(message, errorType === "TooManyRequestsException" ? "throttling" : "transient", errorType);
  }
}

/** A stage answered with a 400-style rejection */
export class InvalidStageInputError extends PipelineError {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message, "validation", "InvalidStageInputError");
    this.missing = missing;
  }
}

/** Whole-execution deadline passed */
export class ExecutionTimeoutError extends PipelineError {
  constructor(message: string) {
    super(message, "permanent", "States.Timeout");
  }
}

/**
 * Structured error envelope handed from the orchestrator to the error handler.
 * Built once from the original failure and never re-serialized.
 */
export interface ErrorEnvelope {
  kind: ErrorKind;
  errorType: string;
  message: string;
  stage: StageName | null;
  sourceError?: { name: string; message: string };
}

/** Uniform failure signal a stage processor raises after marking its job */
export class StageFailure extends PipelineError {
  readonly envelope: ErrorEnvelope;

  constructor(envelope: ErrorEnvelope, cause?: unknown) {
    super(envelope.message, envelope.kind, envelope.errorType, cause);
    this.envelope = envelope;
  }
}

/**
 * Normalize anything thrown into a PipelineError, classifying foreign errors
 * from their code / HTTP status.
 */
export function toPipelineError(err: unknown): PipelineError {
  if (err instanceof PipelineError) return err;

  const { code, status } = extractErrorSignals(err);
  const kind = classify(code, status);
  const message = err instanceof Error ? err.message : String(err);
  const detail = code ? `${code}: ${message}` : message;

  if (isRetryable(kind)) {
    return new RetryableError(detail, kind, err);
  }
  return new PermanentError(detail, kind, err);
}

export function toErrorEnvelope(err: unknown, stage: StageName | null): ErrorEnvelope {
  if (err instanceof StageFailure) {
    return { ...err.envelope, stage: err.envelope.stage ?? stage };
  }
  const classified = toPipelineError(err);
  const source = classified.cause instanceof Error ? classified.cause : undefined;
  return {
    kind: classified.kind,
    errorType: classified.errorType,
    message: classified.message,
    stage,
    ...(source ? { sourceError: { name: source.name, message: source.message } } : {}),
  };
}

/** Kind of anything thrown; classified errors keep the kind they carry */
export function classifyError(err: unknown): ErrorKind {
  return toPipelineError(err).kind;
}
