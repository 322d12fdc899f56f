import type { Request, Response, NextFunction, RequestHandler } from 'express';

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

export interface RateLimitOptions {
  windowMs?: number;
  maxRequests?: number;
  now?: () => number;
}

/** Fixed-window limiter keyed by client IP. State lives in the returned handler. */
export function createRateLimiter(options: RateLimitOptions = {}): RequestHandler {
  const windowMs = options.windowMs ?? 60 * 1000;
  const maxRequests = options.maxRequests ?? 90;
  const now = options.now ?? Date.now;
  const store = new Map<string, RateLimitEntry>();
  let nextSweepAt = 0;

  function sweep(at: number): void {
    if (at < nextSweepAt) return;
    for (const [ip, entry] of store.entries()) {
      if (at > entry.resetAt) store.delete(ip);
    }
    nextSweepAt = at + windowMs;
  }

  return (req: Request, res: Response, next: NextFunction) => {
    const ip = req.ip || req.socket.remoteAddress || 'unknown';
    const at = now();
    sweep(at);

    let entry = store.get(ip);
    if (!entry || at > entry.resetAt) {
      entry = { count: 0, resetAt: at + windowMs };
      store.set(ip, entry);
    }

    entry.count++;

    const remaining = Math.max(0, maxRequests - entry.count);
    const resetSeconds = Math.ceil((entry.resetAt - at) / 1000);

    res.setHeader('X-RateLimit-Limit', maxRequests.toString());
    res.setHeader('X-RateLimit-Remaining', remaining.toString());
    res.setHeader('X-RateLimit-Reset', resetSeconds.toString());

    if (entry.count > maxRequests) {
      res.status(429).json({
        success: false,
        error: { code: 'RATE_LIMITED', message: `Rate limit exceeded, retry after ${resetSeconds}s` },
      });
      return;
    }

    next();
  };
}
