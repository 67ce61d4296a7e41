import type { ErrorEnvelope, StageName, WorkflowInput } from "@scanflow/shared";
import type { StageOutputs } from "../stages/contracts";

export type StateName =
  | "SegmentImage"
  | "ImageToText"
  | "EnhanceWithLLM"
  | "StoreResults"
  | "NotifySuccess"
  | "SegmentationError"
  | "VLMProcessingError"
  | "LLMEnhancementError"
  | "StorageError"
  | "FailExecution";

/** Stage outputs recorded so far, keyed by stage */
export type ExecutionResults = { [S in StageName]?: StageOutputs[S] };

/**
 * Everything one execution carries between steps. Serialized into each step
 * message, so it must stay plain JSON.
 */
export interface ExecutionContext {
  input: WorkflowInput;
  /** ISO-8601 */
  startedAt: string;
  results: ExecutionResults;
  error?: ErrorEnvelope;
}

/** One checkpoint: run `state` of `executionId` */
export interface StepMessage {
  executionId: string;
  state: StateName;
  attempt: number;
  context: ExecutionContext;
}

export type ExecutionStatus = "SUCCEEDED" | "FAILED";

export type StepOutcome =
  | { kind: "scheduled"; next: StateName; attempt: number; delayMs: number }
  | { kind: "completed"; status: ExecutionStatus }
  | { kind: "duplicate" };

export function stepId(step: Pick<StepMessage, "executionId" | "state" | "attempt">): string {
  // BullMQ rejects ':' in custom job ids
  return `${step.executionId}__${step.state}__${step.attempt}`;
}
