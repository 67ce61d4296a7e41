import { createClient } from "redis";
import { eLog, nLog } from "./logger";

export type RedisClient = ReturnType<typeof createClient>;

/**
 * Connected Redis client for notifications and the execution log.
 * Built once by the entry point; callers `quit()` it on shutdown.
 */
export async function createRedis(url: string): Promise<RedisClient> {
  if (!url) {
    throw new Error("REDIS_URL is required");
  }
  const client = createClient({ url });

  client.on("error", (err: unknown) => {
    eLog("[redis] error", err);
  });

  nLog("[redis] connecting to", url.replace(/\/\/[^@]*@/, "//***@"));
  await client.connect();
  return client;
}
