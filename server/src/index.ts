// server/src/index.ts
import express, { type Express } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import { Queue } from "bullmq";
import {
  INGEST_QUEUE_NAME,
  IngestDelivery,
  PgJobStore,
  QUEUE_RETRY_POLICY,
  createPool,
  eLog,
  errorMessage,
  nLog,
  runWithRetry,
} from "@scanflow/shared";
import { BODY_LIMIT, DATABASE_URL, DB_POOL_MAX, HOST, NODE_ENV, PORT, PUBLIC_ORIGIN, REDIS_URL } from "./config";
import { healthRouter } from "./routes/health";
import { jobsRouter } from "./routes/jobs";
import { notificationsRouter } from "./routes/notifications";

async function main() {
  const pool = createPool({ connectionString: DATABASE_URL, max: DB_POOL_MAX });
  const jobStore = new PgJobStore(pool);
  const ingestQueue = new Queue<IngestDelivery>(INGEST_QUEUE_NAME, { connection: { url: REDIS_URL } });

  const enqueue = async (delivery: IngestDelivery) => {
    await runWithRetry(() => ingestQueue.add("arrival", delivery), QUEUE_RETRY_POLICY, {
      operation: "queue.enqueueArrival",
    });
  };

  const app: Express = express();
  app.set("trust proxy", 1);
  app.use(
    cors({
      origin: PUBLIC_ORIGIN,
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization"],
    })
  );
  app.use(helmet());
  app.use(morgan(NODE_ENV === "production" ? "combined" : "dev"));
  app.use(express.json({ limit: BODY_LIMIT }));

  app.use(healthRouter(jobStore));
  app.use("/api", notificationsRouter(enqueue));
  app.use("/api", jobsRouter(jobStore));

  const server = app.listen(PORT, HOST, () => {
    nLog(`[server] listening on ${HOST}:${PORT} (NODE_ENV=${NODE_ENV})`);
  });

  const shutdown = async (signal: string) => {
    nLog(`[server] ${signal} received, closing`);
    server.close();
    try {
      await ingestQueue.close();
      await jobStore.close();
      process.exit(0);
    } catch (err) {
      eLog(`[server] shutdown error: ${errorMessage(err)}`);
      process.exit(1);
    }
  };
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

process.on("unhandledRejection", (reason) => {
  eLog("[server] unhandledRejection", reason);
});

main().catch((e) => {
  eLog("[server] fatal startup error:", e);
  process.exit(1);
});
