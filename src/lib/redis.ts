import Redis from "ioredis";
import { loadConfig } from "../config";
import { getLogger } from "./logger";

let cachedRedis: Redis | null = null;

/** Returns null when no REDIS_URL is configured. */
export function getRedis(): Redis | null {
  if (cachedRedis) {
    return cachedRedis;
  }

  const config = loadConfig();
  if (!config.REDIS_URL) {
    return null;
  }

  const client = new Redis(config.REDIS_URL, {
    lazyConnect: true,
    maxRetriesPerRequest: 2,
  });

  client.on("error", (error) => {
    getLogger().error({ err: error }, "Redis connection error");
  });

  cachedRedis = client;
  return cachedRedis;
}

export async function shutdownRedis() {
  if (!cachedRedis) {
    return;
  }
  const client = cachedRedis;
  cachedRedis = null;
  await client.quit();
}
