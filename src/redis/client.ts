import { Redis } from "ioredis";
import env from "../config/env";
import logger from "../middleware/requestLogger";

let redisSingleton: Redis | null = null;

export function getRedis(): Redis {
  if (redisSingleton) return redisSingleton;
  redisSingleton = new Redis(env.REDIS_URL, {
    maxRetriesPerRequest: 2,
    enableReadyCheck: true,
  });
  redisSingleton.on("error", (e) => logger.error({ err: e }, "[redis] error"));
  redisSingleton.on("connect", () => logger.info("[redis] connected"));
  return redisSingleton;
}

export async function closeRedis() {
  if (!redisSingleton) return;
  const client = redisSingleton;
  redisSingleton = null;
  await client.quit();
}
