// src/middleware/rateLimit.ts

import type { NextFunction, Request, RequestHandler, Response } from "express";
import { sendError } from "../http/sendError";

type Bucket = { count: number; resetAt: number };

export type RateLimitOptions = {
  max: number;
  windowMs?: number;
  now?: () => number;
};

const PRUNE_THRESHOLD = 5000;

function keyForReq(req: Request): string {
  return String(req.ip || req.socket?.remoteAddress || "unknown");
}

/** Fixed window per client IP. */
export function createRateLimitMiddleware(opts: RateLimitOptions): RequestHandler {
  const buckets = new Map<string, Bucket>();
  const windowMs = opts.windowMs ?? 60_000;
  const max = opts.max;
  const now = opts.now ?? Date.now;

  function maybePrune(t: number) {
    if (buckets.size < PRUNE_THRESHOLD) return;
    for (const [k, b] of buckets) {
      if (b.resetAt <= t) buckets.delete(k);
    }
  }

  return (req: Request, res: Response, next: NextFunction) => {
    const key = keyForReq(req);
    const t = now();
    maybePrune(t);

    const b = buckets.get(key);
    if (!b || b.resetAt <= t) {
      buckets.set(key, { count: 1, resetAt: t + windowMs });
      res.setHeader("x-rate-limit-limit", String(max));
      res.setHeader("x-rate-limit-remaining", String(max - 1));
      return next();
    }

    b.count += 1;

    res.setHeader("x-rate-limit-limit", String(max));
    res.setHeader("x-rate-limit-remaining", String(Math.max(0, max - b.count)));
    res.setHeader("x-rate-limit-reset", String(Math.ceil((b.resetAt - t) / 1000)));

    if (b.count > max) {
      return sendError(res, 429, "Too many requests. Please slow down and try again.", "RATE_LIMITED");
    }

    return next();
  };
}
