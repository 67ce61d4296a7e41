// shared/src/constants.ts

/** BullMQ queue receiving new-image notifications (at-least-once) */
export const INGEST_QUEUE_NAME = "image-arrivals";

/** BullMQ queue carrying workflow step checkpoints */
export const WORKFLOW_QUEUE_NAME = "workflow-steps";

/** Max notifications handled per ingestion delivery */
export const MAX_INGEST_BATCH = 10;

/** Largest accepted image (500 MiB) */
export const MAX_IMAGE_BYTES = 500 * 1024 * 1024;

/** Accepted image extensions, matched case-insensitively against the object key */
export const SUPPORTED_IMAGE_EXT = [".nii", ".nii.gz", ".dcm"] as const;

/** Prefix used to derive workflow execution ids from job ids */
export const EXECUTION_ID_PREFIX = "mri-analysis-";

/** Whole-execution timeout */
export const EXECUTION_TIMEOUT_SECONDS = 60 * 60;

/** Per-capability call timeout */
export const STAGE_TIMEOUT_MS = 300_000;

/** Default per-stage concurrency */
export const DEFAULT_STAGE_CONCURRENCY = 10;

/** Redis pub/sub channel for pipeline notifications */
export const DEFAULT_NOTIFY_CHANNEL = "scanflow:notifications";

/** Redis list prefix for per-execution error logs */
export const EXECUTION_LOG_PREFIX = "execlog:";
