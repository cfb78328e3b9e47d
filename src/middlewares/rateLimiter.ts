import type { MiddlewareHandler } from "hono";
import { logger } from "../utils/logger";

/** The subset of a Redis client the limiter needs. ioredis satisfies it. */
export interface RateLimitStore {
  incr(key: string): Promise<number>;
  pexpire(key: string, milliseconds: number): Promise<number>;
}

interface RateLimitConfig {
  windowMs: number;
  max: number;
  keyPrefix?: string;
  /** Without a store every request passes. */
  redis: RateLimitStore | null;
}

// Fixed window per client IP.
export const rateLimiter = (config: RateLimitConfig): MiddlewareHandler => {
  const { windowMs, max, keyPrefix = "rl", redis } = config;

  return async (c, next) => {
    if (!redis) {
      return await next();
    }

    const ip = c.req.header("x-forwarded-for") || "unknown";
    const key = `${keyPrefix}:${ip}`;

    let count: number;
    try {
      count = await redis.incr(key);
      if (count === 1) {
        await redis.pexpire(key, windowMs);
      }
    } catch (err) {
      // Fail open to avoid blocking users if Redis is down
      logger.error({ err }, "Rate limiter error");
      return await next();
    }

    if (count > max) {
      logger.warn({ ip, key }, "Rate limit exceeded");
      return c.json(
        { error: "Too many requests", code: "RATE_LIMITED", retryable: true },
        429,
      );
    }

    await next();
  };
};
