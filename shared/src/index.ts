export * from "./constants";
export * from "./types";
export * from "./logger";
export * from "./redisClient";
export * from "./utils/env";
export * from "./utils/timeout";
export * from "./utils/chunk";
export * from "./deliveries";
// Errors and retry
export * from "./errors/classify";
export * from "./errors/pipelineErrors";
export * from "./retry/retryPolicy";
export * from "./retry/withRetry";
// Jobs and persistence
export * from "./jobs/jobRecord";
export * from "./jobs/jobStore";
export * from "./jobs/statusGuard";
export * from "./jobs/memoryJobStore";
export * from "./jobs/pgJobStore";
export * from "./db/pool";
export { runMigrations } from "./db/migrate";
