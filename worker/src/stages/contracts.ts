import type { JsonObject, SourceReference, StageName } from "@scanflow/shared";

/** Fields every stage echoes back */
interface Echo {
  statusCode: 200;
  job_id: string;
  execution_id: string;
}

export type SegmentationOutput = Echo & {
  segmentation_result_key: string;
  confidence_score: number;
  processing_time_seconds: number;
};

export type DescriptionOutput = Echo & {
  image_description: string;
  confidence_score: number;
  processing_time_seconds: number;
};

export type EnhancementOutput = Echo & {
  enhanced_report: string;
  confidence_scores: JsonObject;
  source_references: SourceReference[];
  processing_time_seconds: number;
};

export interface IntegrityReport {
  passed: boolean;
  warnings: string[];
  errors: string[];
}

export type StorageOutput = Echo & {
  result_id: string;
  integrity_check: IntegrityReport;
};

export interface StageOutputs {
  segmentation: SegmentationOutput;
  vlm_processing: DescriptionOutput;
  llm_enhancement: EnhancementOutput;
  results_storage: StorageOutput;
}

/** 400-style answer to a payload that is missing required fields */
export interface StageRejection {
  statusCode: 400;
  error: string;
  missing: string[];
}

export type StageResponse<S extends StageName> = StageOutputs[S] | StageRejection;

export type StageHandler<S extends StageName> = (payload: unknown) => Promise<StageResponse<S>>;

export type StageHandlers = { [S in StageName]: StageHandler<S> };

export function isRejection(response: { statusCode: number }): response is StageRejection {
  return response.statusCode === 400;
}
