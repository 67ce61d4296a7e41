import { Router, Request, Response } from "express";
import { z } from "zod";
import {
  JOB_STATUSES,
  JobStore,
  ListJobsQuery,
  eLog,
  errorMessage,
  toJobRecord,
  toResultRecord,
} from "@scanflow/shared";

const listQuerySchema = z.object({
  userId: z.string().min(1).optional(),
  status: z
    .string()
    .transform((s) => s.toUpperCase())
    .pipe(z.enum(JOB_STATUSES))
    .optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

/** Query string of the list endpoint; status is accepted in either case */
export function parseListQuery(query: unknown): ListJobsQuery | null {
  const parsed = listQuerySchema.safeParse(query);
  return parsed.success ? parsed.data : null;
}

export function jobsRouter(jobStore: JobStore) {
  const r = Router();

  r.get("/jobs", async (req: Request, res: Response) => {
    const query = parseListQuery(req.query);
    if (!query) {
      return res.status(400).json({ success: false, error: "invalid_query" });
    }
    try {
      const jobs = await jobStore.listJobs(query);
      return res.json({ success: true, items: jobs.map(toJobRecord) });
    } catch (err) {
      eLog("[jobs] list failed:", errorMessage(err));
      return res.status(500).json({ success: false, error: "internal_error" });
    }
  });

  r.get("/jobs/:jobId", async (req: Request, res: Response) => {
    try {
      const job = await jobStore.getJob(req.params.jobId);
      if (!job) return res.status(404).json({ success: false, error: "not_found" });
      return res.json(toJobRecord(job));
    } catch (err) {
      eLog(`[jobs] get ${req.params.jobId} failed:`, errorMessage(err));
      return res.status(500).json({ success: false, error: "internal_error" });
    }
  });

  r.get("/jobs/:jobId/result", async (req: Request, res: Response) => {
    try {
      const result = await jobStore.getResult(req.params.jobId);
      if (!result) return res.status(404).json({ success: false, error: "not_found" });
      return res.json(toResultRecord(result));
    } catch (err) {
      eLog(`[jobs] result ${req.params.jobId} failed:`, errorMessage(err));
      return res.status(500).json({ success: false, error: "internal_error" });
    }
  });

  return r;
}
