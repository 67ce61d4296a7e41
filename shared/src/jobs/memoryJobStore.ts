import { randomUUID } from "crypto";
import type { AnalysisResult, Job, JobId, JobStatus, ResultId, ResultPatch } from "../types";
import { PermanentError } from "../errors/pipelineErrors";
import type { CreateJobInput, CreateJobResult, JobStore, ListJobsQuery, UpdateStatusOptions } from "./jobStore";
import { assertTransition } from "./statusGuard";

function cloneJob(job: Job): Job {
  return { ...job, createdAt: new Date(job.createdAt), updatedAt: new Date(job.updatedAt) };
}

function cloneResult(result: AnalysisResult): AnalysisResult {
  return {
    ...result,
    confidenceScores: structuredClone(result.confidenceScores),
    processingMetrics: structuredClone(result.processingMetrics),
    sourceReferences: result.sourceReferences.map((ref) => ({ ...ref })),
    createdAt: new Date(result.createdAt),
    updatedAt: new Date(result.updatedAt),
  };
}

/**
 * Process-local JobStore used by tests and local mode. Same transition and
 * merge rules as the Postgres store.
 */
export class InMemoryJobStore implements JobStore {
  private jobs = new Map<JobId, Job>();
  private results = new Map<JobId, AnalysisResult>();
  private byDedupeKey = new Map<string, JobId>();
  /** Every status write that went through, in order; handy in tests */
  readonly statusLog: Array<{ jobId: JobId; status: JobStatus }> = [];
  writeCount = 0;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async createJob({ userId, imageKey, dedupeKey }: CreateJobInput): Promise<CreateJobResult> {
    if (dedupeKey) {
      const existing = this.byDedupeKey.get(dedupeKey);
      if (existing) return { jobId: existing, created: false };
    }
    const jobId = randomUUID();
    const ts = this.now();
    this.jobs.set(jobId, {
      jobId,
      userId,
      originalImageKey: imageKey,
      status: "UPLOADED",
      errorMessage: null,
      dedupeKey: dedupeKey ?? null,
      createdAt: ts,
      updatedAt: ts,
    });
    if (dedupeKey) this.byDedupeKey.set(dedupeKey, jobId);
    this.statusLog.push({ jobId, status: "UPLOADED" });
    this.writeCount++;
    return { jobId, created: true };
  }

  async getJob(jobId: JobId): Promise<Job | null> {
    const job = this.jobs.get(jobId);
    return job ? cloneJob(job) : null;
  }

  async findJobByDedupeKey(dedupeKey: string): Promise<Job | null> {
    const jobId = this.byDedupeKey.get(dedupeKey);
    return jobId ? this.getJob(jobId) : null;
  }

  async updateStatus(jobId: JobId, status: JobStatus, opts: UpdateStatusOptions = {}): Promise<void> {
    const job = this.jobs.get(jobId);
    assertTransition(jobId, job ? job.status : null, status, opts.expectedStatus);
    if (!job) return;

    job.status = status;
    if (status === "FAILED") {
      job.errorMessage = opts.errorMessage ?? job.errorMessage ?? "Unknown error";
    }
    job.updatedAt = this.now();
    this.statusLog.push({ jobId, status });
    this.writeCount++;
  }

  async upsertResult(jobId: JobId, patch: ResultPatch): Promise<ResultId> {
    if (!this.jobs.has(jobId)) {
      throw new PermanentError(`Job ${jobId} not found`);
    }
    const ts = this.now();
    const current: AnalysisResult = this.results.get(jobId) ?? {
      resultId: randomUUID(),
      jobId,
      segmentationResultKey: null,
      imageDescription: null,
      enhancedReport: null,
      confidenceScores: {},
      processingMetrics: {},
      sourceReferences: [],
      createdAt: ts,
      updatedAt: ts,
    };

    const next: AnalysisResult = {
      ...current,
      segmentationResultKey: patch.segmentationResultKey ?? current.segmentationResultKey,
      imageDescription: patch.imageDescription ?? current.imageDescription,
      enhancedReport: patch.enhancedReport ?? current.enhancedReport,
      confidenceScores: { ...current.confidenceScores, ...structuredClone(patch.confidenceScores ?? {}) },
      processingMetrics: { ...current.processingMetrics, ...structuredClone(patch.processingMetrics ?? {}) },
      sourceReferences: patch.sourceReferences
        ? patch.sourceReferences.map((ref) => ({ ...ref }))
        : current.sourceReferences,
      updatedAt: ts,
    };
    this.results.set(jobId, next);
    this.writeCount++;
    return next.resultId;
  }

  async getResult(jobId: JobId): Promise<AnalysisResult | null> {
    const result = this.results.get(jobId);
    return result ? cloneResult(result) : null;
  }

  async listJobs({ userId, status, limit }: ListJobsQuery): Promise<Job[]> {
    return [...this.jobs.values()]
      .filter((job) => (userId === undefined || job.userId === userId) && (status === undefined || job.status === status))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit)
      .map(cloneJob);
  }

  get resultCount(): number {
    return this.results.size;
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    // nothing held
  }
}
