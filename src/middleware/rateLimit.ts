import { Request, Response, NextFunction } from "express";
import env from "../config/env";
import { getRedis } from "../redis/client";
import { RKeys } from "../redis/keys";

type RLOpts = {
  windowSec?: number;
  max?: number;
  bucket?: (req: Request) => string;
  headers?: boolean; // add rate limit headers
};

/** Fixed-window counter in Redis. Fails open when Redis is unreachable. */
export function rateLimit(opts: RLOpts = {}) {
  const windowSec = opts.windowSec ?? env.RATE_LIMIT_WINDOW_SEC;
  const max = opts.max ?? env.RATE_LIMIT_MAX;
  const addHeaders = opts.headers ?? true;

  return async (req: Request, res: Response, next: NextFunction) => {
    let count: number;
    let ttl: number;
    try {
      const redis = getRedis();
      const id = opts.bucket ? opts.bucket(req) : (req.ip || "ip:unknown");
      const key = RKeys.rlBucket(id);

      const results = await redis.multi().incr(key).ttl(key).exec();
      if (!results) throw new Error("rate limit transaction aborted");
      count = Number(results[0]?.[1]);
      ttl = Number(results[1]?.[1]);

      if (ttl < 0) {
        await redis.expire(key, windowSec);
        ttl = windowSec;
      }
    } catch (err) {
      req.log.warn({ err }, "[rateLimit] skipped");
      return next();
    }

    if (addHeaders) {
      res.setHeader("X-RateLimit-Limit", String(max));
      res.setHeader("X-RateLimit-Remaining", String(Math.max(0, max - count)));
      res.setHeader("X-RateLimit-Reset", String(ttl));
    }

    if (count > max) {
      return res.status(429).json({ error: { message: "Too many requests. Please slow down." } });
    }

    next();
  };
}
