import { GoogleGenAI } from "@google/genai";
import { Job, Queue, Worker } from "bullmq";
import {
  INGEST_QUEUE_NAME,
  PermanentError,
  PgJobStore,
  QUEUE_RETRY_POLICY,
  STAGE_RETRY_POLICY,
  WORKFLOW_QUEUE_NAME,
  createPool,
  createRedis,
  eLog,
  errorMessage,
  nLog,
  runWithRetry,
} from "@scanflow/shared";
import { GeminiReportGenerator, GeminiVisionClient } from "./capabilities/gemini";
import { HttpKnowledgeIndex } from "./capabilities/knowledgeIndex";
import { HttpSegmentationClient } from "./capabilities/segmentationClient";
import {
  AWS_REGION,
  DATABASE_URL,
  DB_POOL_MAX,
  DEFAULT_USER_ID,
  DEFAULT_VLM_PROMPT,
  ENABLE_NOTIFICATIONS,
  EXECUTION_LOG_MAX_ENTRIES,
  GEMINI_API_KEY,
  INGEST_CONCURRENCY,
  KNOWLEDGE_INDEX_NAME,
  KNOWLEDGE_INDEX_URL,
  MAX_UPLOAD_BYTES,
  NOTIFY_CHANNEL,
  OUTPUT_BUCKET,
  REDIS_URL,
  REPORT_MAX_TOKENS,
  REPORT_MODEL,
  REPORT_TEMPERATURE,
  SEGMENTATION_ENDPOINT_URL,
  STAGE_CALL_TIMEOUT_MS,
  STAGE_CONCURRENCY,
  STAGE_MAX_PENDING,
  TOP_K,
  VLM_MODEL,
  WORKFLOW_CONCURRENCY,
} from "./config";
import { Delivery, DeliveryResult, handleDelivery } from "./ingestion/deliveryHandler";
import { DEFAULT_OBJECT_LIMITS } from "./ingestion/validateObject";
import { RedisExecutionLogSink } from "./notifications/executionLog";
import { RedisNotifier } from "./notifications/notifier";
import { createRuntime } from "./runtime";
import { S3ObjectStorage, createS3Client } from "./storage/objectStorage";
import { BullStepScheduler } from "./workflow/scheduler";
import type { StepMessage, StepOutcome } from "./workflow/types";

async function main() {
  nLog("[worker] starting");

  const pool = createPool({ connectionString: DATABASE_URL, max: DB_POOL_MAX });
  const jobStore = new PgJobStore(pool);
  const redis = await createRedis(REDIS_URL);
  const connection = { url: REDIS_URL };

  if (!GEMINI_API_KEY) {
    throw new PermanentError("GEMINI_API_KEY missing: set it in the worker env to enable Gemini", "authentication");
  }
  const ai = new GoogleGenAI({ apiKey: GEMINI_API_KEY });
  const scheduler = BullStepScheduler.create(REDIS_URL);
  const ingestQueue = new Queue<Delivery>(INGEST_QUEUE_NAME, { connection });

  const runtime = createRuntime({
    jobStore,
    storage: new S3ObjectStorage(createS3Client(AWS_REGION)),
    capabilities: {
      segmentation: new HttpSegmentationClient(SEGMENTATION_ENDPOINT_URL, STAGE_CALL_TIMEOUT_MS),
      vision: new GeminiVisionClient(ai, VLM_MODEL),
      knowledge: new HttpKnowledgeIndex(KNOWLEDGE_INDEX_URL, KNOWLEDGE_INDEX_NAME, STAGE_CALL_TIMEOUT_MS),
      reports: new GeminiReportGenerator(ai, REPORT_MODEL, REPORT_TEMPERATURE, REPORT_MAX_TOKENS),
    },
    notifier: new RedisNotifier(redis, NOTIFY_CHANNEL, ENABLE_NOTIFICATIONS),
    logSink: new RedisExecutionLogSink(redis, EXECUTION_LOG_MAX_ENTRIES),
    scheduler,
    settings: {
      outputBucket: OUTPUT_BUCKET,
      vlmPrompt: DEFAULT_VLM_PROMPT,
      topK: TOP_K,
      callTimeoutMs: STAGE_CALL_TIMEOUT_MS,
      retryPolicy: STAGE_RETRY_POLICY,
      now: () => new Date(),
    },
    runner: { concurrency: STAGE_CONCURRENCY, maxPending: STAGE_MAX_PENDING },
    defaultUserId: DEFAULT_USER_ID,
    limits: { ...DEFAULT_OBJECT_LIMITS, maxBytes: MAX_UPLOAD_BYTES },
  });

  const ingestWorker = new Worker<Delivery, DeliveryResult>(
    INGEST_QUEUE_NAME,
    async (job: Job<Delivery>) =>
      handleDelivery(runtime.ingestion, job.data, async (delivery, delayMs) => {
        await runWithRetry(() => ingestQueue.add("requeue", delivery, { delay: delayMs }), QUEUE_RETRY_POLICY, {
          operation: "queue.requeue",
        });
      }),
    { connection, concurrency: INGEST_CONCURRENCY }
  );

  const stepWorker = new Worker<StepMessage, StepOutcome>(
    WORKFLOW_QUEUE_NAME,
    async (job: Job<StepMessage>) => runtime.engine.advance(job.data),
    { connection, concurrency: WORKFLOW_CONCURRENCY }
  );

  ingestWorker.on("completed", (job, result) => {
    nLog(
      `[worker] delivery ${job.id}: ${result.successful} ok, ${result.failed} failed, ${result.requeued} requeued`
    );
  });
  ingestWorker.on("failed", (job, err) => {
    eLog(`[worker] delivery ${job?.id} failed`, err);
  });
  stepWorker.on("failed", (job, err) => {
    eLog(`[worker] step ${job?.id} failed`, err);
  });

  await Promise.all([ingestWorker.waitUntilReady(), stepWorker.waitUntilReady()]);
  nLog(
    `[worker] ready: ${INGEST_QUEUE_NAME} (concurrency ${INGEST_CONCURRENCY}), ` +
      `${WORKFLOW_QUEUE_NAME} (concurrency ${WORKFLOW_CONCURRENCY})`
  );

  let closing = false;
  const shutdown = async (signal: string) => {
    if (closing) return;
    closing = true;
    nLog(`[worker] ${signal} received, draining`);
    try {
      await Promise.all([ingestWorker.close(), stepWorker.close()]);
      await Promise.all([ingestQueue.close(), scheduler.close()]);
      await redis.quit();
      await jobStore.close();
      nLog("[worker] shut down cleanly");
      process.exit(0);
    } catch (err) {
      eLog(`[worker] shutdown error: ${errorMessage(err)}`);
      process.exit(1);
    }
  };
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

process.on("unhandledRejection", (reason) => {
  eLog("[worker] unhandledRejection", reason);
});
process.on("uncaughtException", (err) => {
  eLog("[worker] uncaughtException", err);
  process.exit(1);
});

main().catch((err) => {
  eLog("[worker] fatal", err);
  process.exit(1);
});
