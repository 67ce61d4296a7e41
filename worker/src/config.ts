/**
 * Worker Configuration
 *
 * Every setting the worker reads from the environment, resolved once at load.
 */
import dotenv from "dotenv";
import {
  DEFAULT_NOTIFY_CHANNEL,
  DEFAULT_STAGE_CONCURRENCY,
  MAX_IMAGE_BYTES,
  STAGE_TIMEOUT_MS,
  getEnvBoolean,
  getEnvNumber,
  getEnvString,
} from "@scanflow/shared";

dotenv.config();

export const NODE_ENV = getEnvString("NODE_ENV", "development");

export const REDIS_URL = getEnvString("REDIS_URL", "redis://localhost:6379");
export const DATABASE_URL = getEnvString("DATABASE_URL");
export const DB_POOL_MAX = getEnvNumber("DB_POOL_MAX", 10);

export const AWS_REGION = getEnvString("AWS_REGION", "us-east-1");
export const OUTPUT_BUCKET = getEnvString("OUTPUT_BUCKET", "scanflow-processed-results");

/** Owner recorded for jobs whose notification carries no user id */
export const DEFAULT_USER_ID = getEnvString("DEFAULT_USER_ID", "system");
export const MAX_UPLOAD_BYTES = getEnvNumber("MAX_IMAGE_BYTES", MAX_IMAGE_BYTES);

// Concurrency
export const INGEST_CONCURRENCY = getEnvNumber("INGEST_CONCURRENCY", 1);
export const WORKFLOW_CONCURRENCY = getEnvNumber("WORKFLOW_CONCURRENCY", 40);
export const STAGE_CONCURRENCY = getEnvNumber("STAGE_CONCURRENCY", DEFAULT_STAGE_CONCURRENCY);
export const STAGE_MAX_PENDING = getEnvNumber("STAGE_MAX_PENDING", 50);
export const STAGE_CALL_TIMEOUT_MS = getEnvNumber("STAGE_TIMEOUT_MS", STAGE_TIMEOUT_MS);

// Capabilities
export const SEGMENTATION_ENDPOINT_URL = getEnvString("SEGMENTATION_ENDPOINT_URL");
export const GEMINI_API_KEY = getEnvString("GEMINI_API_KEY", getEnvString("GOOGLE_API_KEY"));
export const VLM_MODEL = getEnvString("VLM_MODEL", "gemini-2.0-flash-001");
export const REPORT_MODEL = getEnvString("REPORT_MODEL", "gemini-2.0-flash-001");
export const DEFAULT_VLM_PROMPT = getEnvString(
  "DEFAULT_VLM_PROMPT",
  "Describe the medical findings in this MRI image in detail."
);
export const REPORT_TEMPERATURE = getEnvNumber("TEMPERATURE", 0.7);
export const REPORT_MAX_TOKENS = getEnvNumber("MAX_TOKENS", 4096);
export const KNOWLEDGE_INDEX_URL = getEnvString("KNOWLEDGE_INDEX_URL");
export const KNOWLEDGE_INDEX_NAME = getEnvString("KNOWLEDGE_INDEX_NAME", "medical-knowledge");
export const TOP_K = getEnvNumber("TOP_K", 5);

// Notifications
export const ENABLE_NOTIFICATIONS = getEnvBoolean("ENABLE_NOTIFICATIONS", true);
export const NOTIFY_CHANNEL = getEnvString("NOTIFY_CHANNEL", DEFAULT_NOTIFY_CHANNEL);
export const EXECUTION_LOG_MAX_ENTRIES = getEnvNumber("EXECUTION_LOG_MAX_ENTRIES", 100);
