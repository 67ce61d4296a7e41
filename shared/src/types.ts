export type UserId = string;
export type JobId = string;
export type ResultId = string;
export type ExecutionId = string;

/**
 * Ordered job lifecycle. FAILED sits outside the order: it is terminal and
 * may replace any other value.
 */
export const JOB_STATUSES = [
  "UPLOADED",
  "SEGMENTING",
  "CONVERTING",
  "ENHANCING",
  "STORING",
  "COMPLETED",
  "FAILED",
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export function isJobStatus(value: unknown): value is JobStatus {
  return typeof value === "string" && (JOB_STATUSES as readonly string[]).includes(value);
}

export interface Job {
  jobId: JobId;
  userId: UserId;
  originalImageKey: string;
  status: JobStatus;
  errorMessage: string | null;
  dedupeKey: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/** Namespaces a stage may write into inside the JSON maps of a result */
export type ResultNamespace = "segmentation" | "vlm" | "llm" | "storage";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export interface SourceReference {
  title: string;
  source: string;
  author: string;
  publicationDate: string;
  url: string;
  relevanceScore: number;
  inferred?: boolean;
}

export interface AnalysisResult {
  resultId: ResultId;
  jobId: JobId;
  segmentationResultKey: string | null;
  imageDescription: string | null;
  enhancedReport: string | null;
  confidenceScores: Partial<Record<ResultNamespace, JsonObject>>;
  processingMetrics: Partial<Record<ResultNamespace, JsonObject>>;
  sourceReferences: SourceReference[];
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Partial write from one stage. Undefined fields keep whatever is stored;
 * each namespaced map entry replaces only that namespace.
 */
export interface ResultPatch {
  segmentationResultKey?: string;
  imageDescription?: string;
  enhancedReport?: string;
  confidenceScores?: Partial<Record<ResultNamespace, JsonObject>>;
  processingMetrics?: Partial<Record<ResultNamespace, JsonObject>>;
  sourceReferences?: SourceReference[];
}

/** Pipeline stage names as they appear on the wire */
export const STAGE_NAMES = ["segmentation", "vlm_processing", "llm_enhancement", "results_storage"] as const;
export type StageName = (typeof STAGE_NAMES)[number];


/** Flattened new-image notification after envelope unwrapping */
export interface ImageNotification {
  bucketName: string;
  objectKey: string;
  eventName: string;
  eventTime: string;
  objectSize: number;
  etag: string;
  userId?: string;
}

/** Input handed to a workflow execution */
export interface WorkflowInput {
  job_id: JobId;
  bucket_name: string;
  object_key: string;
  execution_id: ExecutionId;
  event_time: string;
  object_size: number;
  etag: string;
}

export type NotificationEvent =
  | {
      type: "job.completed";
      job_id: JobId;
      result_id: ResultId;
      user_id: UserId;
      status: "completed";
      timestamp: string;
    }
  | {
      type: "execution.succeeded";
      job_id: JobId;
      execution_id: ExecutionId;
      status: "completed";
      timestamp: string;
    }
  | {
      type: "execution.failed";
      job_id: JobId;
      execution_id: ExecutionId;
      status: "failed";
      error: string;
      timestamp: string;
    };
