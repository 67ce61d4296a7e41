import { EXECUTION_TIMEOUT_SECONDS, StageName } from "@scanflow/shared";
import type { ExecutionContext, StateName } from "./types";

export interface RetryRule {
  errorEquals: string[];
  maxAttempts: number;
  intervalSeconds: number;
  backoffRate: number;
}

export interface CatchRule {
  errorEquals: string[];
  next: StateName;
}

export interface StageState<S extends StageName = StageName> {
  type: "Stage";
  stage: S;
  /** Builds the stage payload from the context; only declared fields go forward */
  selectInput(ctx: ExecutionContext): Record<string, unknown>;
  retry: RetryRule[];
  catch: CatchRule[];
  next: StateName;
}

export interface ErrorHandlerState {
  type: "ErrorHandler";
  stage: StageName;
  next: StateName;
}

export interface SucceedState {
  type: "Succeed";
}

export interface FailState {
  type: "Fail";
}

export type StateDefinition = StageState | ErrorHandlerState | SucceedState | FailState;

export interface WorkflowDefinition {
  comment: string;
  startAt: StateName;
  timeoutSeconds: number;
  states: Record<StateName, StateDefinition>;
}

export const ALL_ERRORS = "States.ALL";

const STAGE_RETRY: RetryRule[] = [
  {
    errorEquals: ["ServiceException", "TooManyRequestsException"],
    maxAttempts: 3,
    intervalSeconds: 2,
    backoffRate: 2,
  },
];

function catchTo(next: StateName): CatchRule[] {
  return [{ errorEquals: [ALL_ERRORS], next }];
}

function ids(ctx: ExecutionContext) {
  return { job_id: ctx.input.job_id, execution_id: ctx.input.execution_id };
}

export const PIPELINE_DEFINITION: WorkflowDefinition = {
  comment: "MRI image analysis: segmentation, description, knowledge-augmented report, storage",
  startAt: "SegmentImage",
  timeoutSeconds: EXECUTION_TIMEOUT_SECONDS,
  states: {
    SegmentImage: {
      type: "Stage",
      stage: "segmentation",
      selectInput: (ctx) => ({
        ...ids(ctx),
        bucket_name: ctx.input.bucket_name,
        object_key: ctx.input.object_key,
      }),
      retry: STAGE_RETRY,
      catch: catchTo("SegmentationError"),
      next: "ImageToText",
    },
    ImageToText: {
      type: "Stage",
      stage: "vlm_processing",
      selectInput: (ctx) => ({
        ...ids(ctx),
        segmentation_result_key: ctx.results.segmentation?.segmentation_result_key,
      }),
      retry: STAGE_RETRY,
      catch: catchTo("VLMProcessingError"),
      next: "EnhanceWithLLM",
    },
    EnhanceWithLLM: {
      type: "Stage",
      stage: "llm_enhancement",
      selectInput: (ctx) => ({
        ...ids(ctx),
        vlm_result: { image_description: ctx.results.vlm_processing?.image_description },
      }),
      retry: STAGE_RETRY,
      catch: catchTo("LLMEnhancementError"),
      next: "StoreResults",
    },
    StoreResults: {
      type: "Stage",
      stage: "results_storage",
      selectInput: (ctx) => {
        const llm = ctx.results.llm_enhancement;
        return {
          ...ids(ctx),
          segmentation_result: {
            segmentation_result_key: ctx.results.segmentation?.segmentation_result_key,
          },
          vlm_result: {
            image_description: ctx.results.vlm_processing?.image_description,
            confidence_score: ctx.results.vlm_processing?.confidence_score,
          },
          llm_result: {
            enhanced_report: llm?.enhanced_report,
            confidence_scores: llm?.confidence_scores,
            source_references: llm?.source_references,
          },
        };
      },
      retry: STAGE_RETRY,
      catch: catchTo("StorageError"),
      next: "NotifySuccess",
    },
    NotifySuccess: { type: "Succeed" },
    SegmentationError: { type: "ErrorHandler", stage: "segmentation", next: "FailExecution" },
    VLMProcessingError: { type: "ErrorHandler", stage: "vlm_processing", next: "FailExecution" },
    LLMEnhancementError: { type: "ErrorHandler", stage: "llm_enhancement", next: "FailExecution" },
    StorageError: { type: "ErrorHandler", stage: "results_storage", next: "FailExecution" },
    FailExecution: { type: "Fail" },
  },
};

export function matchesError(errorEquals: string[], errorType: string): boolean {
  return errorEquals.includes(ALL_ERRORS) || errorEquals.includes(errorType);
}

/** Delay before retry number `attempt + 1` of a state (attempt is 0-based) */
export function retryDelayMs(rule: RetryRule, attempt: number): number {
  return Math.round(rule.intervalSeconds * 1000 * Math.pow(rule.backoffRate, attempt));
}
