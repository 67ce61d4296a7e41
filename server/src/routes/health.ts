import { Router, Request, Response } from "express";
import type { JobStore } from "@scanflow/shared";
import { NODE_ENV } from "../config";

export function healthRouter(jobStore: JobStore) {
  const r = Router();
  r.get("/health", async (_req: Request, res: Response) => {
    const db = await jobStore.healthCheck();
    res.status(db ? 200 : 503).json({
      ok: db,
      db,
      env: NODE_ENV,
      time: new Date().toISOString(),
    });
  });
  return r;
}
