import { Router, Request, Response } from "express";
import { IngestDelivery, eLog, errorMessage, nLog, toDeliveries } from "@scanflow/shared";

export type EnqueueDelivery = (delivery: IngestDelivery) => Promise<void>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * One entry per object: a single notification, an array of them, or a
 * storage event whose Records are split so each becomes its own record.
 */
export function collectRecords(body: unknown): unknown[] {
  if (Array.isArray(body)) return body.flatMap(collectRecords);
  if (isRecord(body) && Array.isArray(body.Records)) {
    return body.Records.map((record: unknown) => ({ Records: [record] }));
  }
  return body === undefined || body === null ? [] : [body];
}

export async function enqueueNotifications(
  body: unknown,
  enqueue: EnqueueDelivery
): Promise<{ queued: number; deliveries: number }> {
  const records = collectRecords(body);
  const deliveries = toDeliveries(records);
  for (const delivery of deliveries) {
    await enqueue(delivery);
  }
  return { queued: records.length, deliveries: deliveries.length };
}

export function notificationsRouter(enqueue: EnqueueDelivery) {
  const r = Router();

  /**
   * POST /api/notifications
   * Accepts new-image notifications and hands them to the ingestion queue.
   */
  r.post("/notifications", async (req: Request, res: Response) => {
    try {
      const out = await enqueueNotifications(req.body, enqueue);
      if (out.queued === 0) {
        return res.status(400).json({ success: false, error: "no_records" });
      }
      nLog(`[notifications] queued ${out.queued} record(s) in ${out.deliveries} delivery(ies)`);
      return res.status(202).json(out);
    } catch (err) {
      eLog("[notifications] enqueue failed:", errorMessage(err));
      return res.status(503).json({ success: false, error: "queue_unavailable" });
    }
  });

  return r;
}
