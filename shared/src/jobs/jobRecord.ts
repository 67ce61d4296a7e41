import {
  AnalysisResult,
  Job,
  JobStatus,
  JsonObject,
  ResultNamespace,
  SourceReference,
  isJobStatus,
} from "../types";

const STATUS_RANK: Record<Exclude<JobStatus, "FAILED">, number> = {
  UPLOADED: 0,
  SEGMENTING: 1,
  CONVERTING: 2,
  ENHANCING: 3,
  STORING: 4,
  COMPLETED: 5,
};

export function isTerminalStatus(status: JobStatus): status is "COMPLETED" | "FAILED" {
  return status === "COMPLETED" || status === "FAILED";
}

/**
 * Whether `next` may replace `current`.
 * - FAILED always wins.
 * - Nothing leaves a terminal status (except FAILED overriding COMPLETED).
 * - Otherwise status never moves backwards; repeating it is allowed.
 */
export function canTransition(current: JobStatus, next: JobStatus): boolean {
  if (next === "FAILED") return true;
  if (isTerminalStatus(current)) return current === "COMPLETED" && next === "COMPLETED";
  return STATUS_RANK[next] >= STATUS_RANK[current];
}

/** Statuses from which `next` is reachable; used as the SQL guard */
export function allowedPriorStatuses(next: JobStatus): JobStatus[] {
  const all: JobStatus[] = ["UPLOADED", "SEGMENTING", "CONVERTING", "ENHANCING", "STORING", "COMPLETED", "FAILED"];
  return all.filter((s) => canTransition(s, next));
}

/** External read model: flat, lowercase status, ISO timestamps */
export interface JobRecord {
  job_id: string;
  user_id: string;
  original_image_key: string;
  status: string;
  error_message: string | null;
  created_at: string;
  updated_at: string;
}

export interface ResultRecord {
  result_id: string;
  job_id: string;
  segmentation_result_key: string | null;
  image_description: string | null;
  enhanced_report: string | null;
  confidence_scores: Partial<Record<ResultNamespace, JsonObject>>;
  processing_metrics: Partial<Record<ResultNamespace, JsonObject>>;
  source_references: SourceReference[];
  created_at: string;
  updated_at: string;
}

export function toJobRecord(job: Job): JobRecord {
  return {
    job_id: job.jobId,
    user_id: job.userId,
    original_image_key: job.originalImageKey,
    status: job.status.toLowerCase(),
    error_message: job.errorMessage,
    created_at: job.createdAt.toISOString(),
    updated_at: job.updatedAt.toISOString(),
  };
}

export function fromJobRecord(record: JobRecord): Job {
  const status = record.status.toUpperCase();
  if (!isJobStatus(status)) {
    throw new Error(`Unknown job status '${record.status}'`);
  }
  return {
    jobId: record.job_id,
    userId: record.user_id,
    originalImageKey: record.original_image_key,
    status,
    errorMessage: record.error_message,
    dedupeKey: null,
    createdAt: new Date(record.created_at),
    updatedAt: new Date(record.updated_at),
  };
}

export function toResultRecord(result: AnalysisResult): ResultRecord {
  return {
    result_id: result.resultId,
    job_id: result.jobId,
    segmentation_result_key: result.segmentationResultKey,
    image_description: result.imageDescription,
    enhanced_report: result.enhancedReport,
    confidence_scores: result.confidenceScores,
    processing_metrics: result.processingMetrics,
    source_references: result.sourceReferences,
    created_at: result.createdAt.toISOString(),
    updated_at: result.updatedAt.toISOString(),
  };
}
