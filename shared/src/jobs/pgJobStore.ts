import { randomUUID } from "crypto";
import type { Pool } from "pg";
import { PermanentError, StatusTransitionError } from "../errors/pipelineErrors";
import { dLog, errorMessage, wLog } from "../logger";
import { DB_RETRY_POLICY, RetryPolicy } from "../retry/retryPolicy";
import { runWithRetry } from "../retry/withRetry";
import type {
  AnalysisResult,
  Job,
  JobId,
  JobStatus,
  JsonObject,
  ResultId,
  ResultNamespace,
  ResultPatch,
  SourceReference,
} from "../types";
import { isJobStatus } from "../types";
import { allowedPriorStatuses } from "./jobRecord";
import type { CreateJobInput, CreateJobResult, JobStore, ListJobsQuery, UpdateStatusOptions } from "./jobStore";
import { assertTransition } from "./statusGuard";

interface JobRow {
  job_id: string;
  user_id: string;
  original_image_key: string;
  status: string;
  error_message: string | null;
  dedupe_key: string | null;
  created_at: Date;
  updated_at: Date;
}

interface ResultRow {
  result_id: string;
  job_id: string;
  segmentation_result_key: string | null;
  image_description: string | null;
  enhanced_report: string | null;
  confidence_scores: Partial<Record<ResultNamespace, JsonObject>> | null;
  processing_metrics: Partial<Record<ResultNamespace, JsonObject>> | null;
  source_references: SourceReference[] | null;
  created_at: Date;
  updated_at: Date;
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

// job_id is a UUID column; anything else can never match a row
function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

const JOB_COLUMNS =
  "job_id, user_id, original_image_key, status, error_message, dedupe_key, created_at, updated_at";

function rowToJob(row: JobRow): Job {
  if (!isJobStatus(row.status)) {
    throw new PermanentError(`Job ${row.job_id} has unknown status '${row.status}'`);
  }
  return {
    jobId: row.job_id,
    userId: row.user_id,
    originalImageKey: row.original_image_key,
    status: row.status,
    errorMessage: row.error_message,
    dedupeKey: row.dedupe_key,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function rowToResult(row: ResultRow): AnalysisResult {
  return {
    resultId: row.result_id,
    jobId: row.job_id,
    segmentationResultKey: row.segmentation_result_key,
    imageDescription: row.image_description,
    enhancedReport: row.enhanced_report,
    confidenceScores: row.confidence_scores ?? {},
    processingMetrics: row.processing_metrics ?? {},
    sourceReferences: row.source_references ?? [],
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Postgres-backed JobStore. The pool is owned by the caller's process
 * lifecycle; `close()` ends it.
 *
 * Status writes are guarded in SQL: the UPDATE only matches rows whose
 * current status may legally move to the new one, so two racing writers
 * cannot move a job backwards.
 */
export class PgJobStore implements JobStore {
  constructor(
    private readonly pool: Pool,
    private readonly policy: RetryPolicy = DB_RETRY_POLICY
  ) {}

  private query<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return runWithRetry(() => fn(), this.policy, { operation: `db.${operation}` });
  }

  async createJob({ userId, imageKey, dedupeKey }: CreateJobInput): Promise<CreateJobResult> {
    const jobId = randomUUID();
    const inserted = await this.query("createJob", () =>
      this.pool.query<{ job_id: string }>(
        `INSERT INTO analysis_jobs (job_id, user_id, original_image_key, status, dedupe_key)
         VALUES ($1, $2, $3, 'UPLOADED', $4)
         ON CONFLICT (dedupe_key) DO NOTHING
         RETURNING job_id`,
        [jobId, userId, imageKey, dedupeKey ?? null]
      )
    );
    if (inserted.rows.length > 0) {
      return { jobId: inserted.rows[0].job_id, created: true };
    }

    // Conflict: only possible with a dedupe key
    const existing = dedupeKey ? await this.findJobByDedupeKey(dedupeKey) : null;
    if (!existing) {
      throw new PermanentError(`Job insert for ${imageKey} conflicted but no existing job was found`);
    }
    dLog(`[jobs] duplicate arrival for ${imageKey}, reusing job ${existing.jobId}`);
    return { jobId: existing.jobId, created: false };
  }

  async getJob(jobId: JobId): Promise<Job | null> {
    if (!isUuid(jobId)) return null;
    const res = await this.query("getJob", () =>
      this.pool.query<JobRow>(`SELECT ${JOB_COLUMNS} FROM analysis_jobs WHERE job_id = $1`, [jobId])
    );
    return res.rows.length > 0 ? rowToJob(res.rows[0]) : null;
  }

  async findJobByDedupeKey(dedupeKey: string): Promise<Job | null> {
    const res = await this.query("findJobByDedupeKey", () =>
      this.pool.query<JobRow>(`SELECT ${JOB_COLUMNS} FROM analysis_jobs WHERE dedupe_key = $1`, [dedupeKey])
    );
    return res.rows.length > 0 ? rowToJob(res.rows[0]) : null;
  }

  async updateStatus(jobId: JobId, status: JobStatus, opts: UpdateStatusOptions = {}): Promise<void> {
    if (!isUuid(jobId)) throw new PermanentError(`Job ${jobId} not found`);
    const priors = allowedPriorStatuses(status);
    const params: unknown[] = [jobId, status, opts.errorMessage ?? null, priors];
    let guard = "status = ANY($4::text[])";
    if (opts.expectedStatus !== undefined) {
      params.push(opts.expectedStatus);
      guard += " AND status = $5";
    }

    const res = await this.query("updateStatus", () =>
      this.pool.query(
        `UPDATE analysis_jobs
            SET status = $2::text,
                error_message = CASE WHEN $2::text = 'FAILED'
                                     THEN COALESCE($3::text, error_message, 'Unknown error')
                                     ELSE error_message END,
                updated_at = NOW()
          WHERE job_id = $1 AND ${guard}`,
        params
      )
    );
    if (res.rowCount && res.rowCount > 0) return;

    // Nothing matched: explain why
    const current = await this.getJob(jobId);
    assertTransition(jobId, current ? current.status : null, status, opts.expectedStatus);
    throw new StatusTransitionError(`Job ${jobId} changed concurrently; ${status} not applied`);
  }

  async upsertResult(jobId: JobId, patch: ResultPatch): Promise<ResultId> {
    if (!isUuid(jobId)) throw new PermanentError(`Job ${jobId} not found`);
    const res = await this.query("upsertResult", () =>
      this.pool.query<{ result_id: string }>(
        `INSERT INTO analysis_results
           (result_id, job_id, segmentation_result_key, image_description, enhanced_report,
            confidence_scores, processing_metrics, source_references)
         VALUES ($1, $2, $3, $4, $5, $6::jsonb, $7::jsonb, COALESCE($8::jsonb, '[]'::jsonb))
         ON CONFLICT (job_id) DO UPDATE SET
           segmentation_result_key = COALESCE(EXCLUDED.segmentation_result_key, analysis_results.segmentation_result_key),
           image_description = COALESCE(EXCLUDED.image_description, analysis_results.image_description),
           enhanced_report = COALESCE(EXCLUDED.enhanced_report, analysis_results.enhanced_report),
           confidence_scores = analysis_results.confidence_scores || EXCLUDED.confidence_scores,
           processing_metrics = analysis_results.processing_metrics || EXCLUDED.processing_metrics,
           source_references = CASE WHEN $8::jsonb IS NULL
                                    THEN analysis_results.source_references
                                    ELSE EXCLUDED.source_references END,
           updated_at = NOW()
         RETURNING result_id`,
        [
          randomUUID(),
          jobId,
          patch.segmentationResultKey ?? null,
          patch.imageDescription ?? null,
          patch.enhancedReport ?? null,
          JSON.stringify(patch.confidenceScores ?? {}),
          JSON.stringify(patch.processingMetrics ?? {}),
          patch.sourceReferences ? JSON.stringify(patch.sourceReferences) : null,
        ]
      )
    );
    return res.rows[0].result_id;
  }

  async getResult(jobId: JobId): Promise<AnalysisResult | null> {
    if (!isUuid(jobId)) return null;
    const res = await this.query("getResult", () =>
      this.pool.query<ResultRow>(
        `SELECT result_id, job_id, segmentation_result_key, image_description, enhanced_report,
                confidence_scores, processing_metrics, source_references, created_at, updated_at
           FROM analysis_results WHERE job_id = $1`,
        [jobId]
      )
    );
    return res.rows.length > 0 ? rowToResult(res.rows[0]) : null;
  }

  async listJobs({ userId, status, limit }: ListJobsQuery): Promise<Job[]> {
    const where: string[] = [];
    const params: unknown[] = [];
    if (userId !== undefined) {
      params.push(userId);
      where.push(`user_id = $${params.length}`);
    }
    if (status !== undefined) {
      params.push(status);
      where.push(`status = $${params.length}`);
    }
    params.push(limit);
    const sql = `SELECT ${JOB_COLUMNS} FROM analysis_jobs
      ${where.length ? `WHERE ${where.join(" AND ")}` : ""}
      ORDER BY created_at DESC
      LIMIT $${params.length}`;

    const res = await this.query("listJobs", () => this.pool.query<JobRow>(sql, params));
    return res.rows.map(rowToJob);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.pool.query("SELECT 1");
      return true;
    } catch (err) {
      wLog(`[db] health check failed: ${errorMessage(err)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
