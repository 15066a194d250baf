import { Request, Response, NextFunction } from "express";
import { logError } from "../../infrastructure/logging/logger";

/** The slice of an ioredis client the limiter needs. */
export interface RateLimitCounter {
  incr(key: string): Promise<number>;
  expire(key: string, seconds: number): Promise<number>;
}

/**
 * Fixed-window request counter per caller, kept in Redis with INCR + EXPIRE.
 * Callers are keyed by `extractId`, or by IP when it is absent.
 */
export function rateLimiter(options: {
  redis: RateLimitCounter;
  windowMs: number;
  maxRequests: number;
  keyPrefix: string;
  extractId?: (req: Request) => string | null;
}) {
  const { redis, windowMs, maxRequests, keyPrefix, extractId } = options;
  const windowSec = Math.ceil(windowMs / 1000);

  return async (req: Request, res: Response, next: NextFunction) => {
    const id = extractId ? extractId(req) : req.ip ?? "unknown";
    if (!id) {
      return next();
    }

    const key = `${keyPrefix}:${id}`;

    try {
      const current = await redis.incr(key);
      if (current === 1) {
        await redis.expire(key, windowSec);
      }

      res.setHeader("X-RateLimit-Limit", maxRequests);
      res.setHeader("X-RateLimit-Remaining", Math.max(0, maxRequests - current));

      if (current > maxRequests) {
        return res.status(429).json({
          error: "RATE_LIMITED",
          message: `Too many requests. Limit: ${maxRequests} per ${windowSec}s window.`
        });
      }
    } catch (error) {
      // fail open
      logError("rate_limiter.unavailable", error, { key });
    }
    return next();
  };
}
