import { Pool, PoolClient } from "pg";
import { eLog, nLog } from "../logger";

export interface PoolOptions {
  connectionString: string;
  max?: number;
}

/**
 * One pool per process, built by the entry point and handed to whatever
 * needs it. Close it on shutdown.
 */
export function createPool({ connectionString, max = 10 }: PoolOptions): Pool {
  if (!connectionString) {
    throw new Error("DATABASE_URL is required for database access");
  }
  const pool = new Pool({ connectionString, max });

  pool.on("error", (err) => {
    eLog("[db] Unexpected PG pool error", err);
  });

  nLog(`[db] pool created (max=${max})`);
  return pool;
}

export async function withTransaction<T>(pool: Pool, fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (err) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackErr) {
      eLog("[db] rollback failed", rollbackErr);
    }
    throw err;
  } finally {
    client.release();
  }
}
