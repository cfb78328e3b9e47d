import { Redis } from "ioredis";
import { logger } from "../utils/logger";

// Commands fail immediately while disconnected; the rate limiter and the
// asset cache both fall through on errors.
export function createRedis(redisUrl: string): Redis {
  const redis = new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
    enableOfflineQueue: false,
  });

  redis.on("connect", () => {
    logger.info("Connected to Redis");
  });

  redis.on("reconnecting", (delay: number) => {
    logger.warn({ delay }, "Reconnecting to Redis");
  });

  redis.on("error", (err) => {
    logger.error(err, "Redis error");
  });

  return redis;
}
