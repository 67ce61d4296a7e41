import type { AnalysisResult, Job, JobId, JobStatus, ResultId, ResultPatch, UserId } from "../types";

export interface CreateJobInput {
  userId: UserId;
  imageKey: string;
  /** Stable key for one logical upload; a repeat returns the existing job */
  dedupeKey?: string;
}

export interface CreateJobResult {
  jobId: JobId;
  created: boolean;
}

export interface UpdateStatusOptions {
  errorMessage?: string;
  /** Compare-and-swap: reject the write unless the job is currently in this status */
  expectedStatus?: JobStatus;
}

export interface ListJobsQuery {
  userId?: UserId;
  status?: JobStatus;
  limit: number;
}

/**
 * Durable jobs + results. Status writes follow `canTransition`; a rejected
 * write raises StatusTransitionError, an unknown job PermanentError.
 */
export interface JobStore {
  createJob(input: CreateJobInput): Promise<CreateJobResult>;
  getJob(jobId: JobId): Promise<Job | null>;
  findJobByDedupeKey(dedupeKey: string): Promise<Job | null>;
  updateStatus(jobId: JobId, status: JobStatus, opts?: UpdateStatusOptions): Promise<void>;
  upsertResult(jobId: JobId, patch: ResultPatch): Promise<ResultId>;
  getResult(jobId: JobId): Promise<AnalysisResult | null>;
  listJobs(query: ListJobsQuery): Promise<Job[]>;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}
