import dotenv from "dotenv";
import { getEnvList, getEnvNumber, getEnvString } from "@scanflow/shared";
dotenv.config();

export const NODE_ENV = getEnvString("NODE_ENV", "development");
export const PORT = getEnvNumber("PORT", 5000);
export const HOST = getEnvString("HOST", NODE_ENV === "production" ? "0.0.0.0" : "127.0.0.1");

export const REDIS_URL = getEnvString("REDIS_URL", "redis://localhost:6379");
export const DATABASE_URL = getEnvString("DATABASE_URL");
export const DB_POOL_MAX = getEnvNumber("DB_POOL_MAX", 5);

export const PUBLIC_ORIGIN = getEnvList("PUBLIC_ORIGIN", ["http://localhost:5173", "http://localhost:5000"]);

/** Largest accepted webhook body */
export const BODY_LIMIT = getEnvString("BODY_LIMIT", "1mb");
