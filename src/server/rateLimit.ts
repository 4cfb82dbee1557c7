import type { NextFunction, Request, Response } from 'express';
import type { RateLimitConfig } from '../config/app';

export interface WindowEntry {
  count: number;
  resetAt: number;
}

/**
 * Fixed-window counter keyed by client. Expired entries are swept at most
 * once per window so the table only holds clients seen in the current one.
 */
export function createRateLimitWindow(
  config: RateLimitConfig,
  now: () => number = Date.now,
  store: Map<string, WindowEntry> = new Map(),
) {
  let nextSweepAt = now() + config.windowMs;

  function sweep(current: number): void {
    for (const [key, entry] of store) {
      if (entry.resetAt <= current) {
        store.delete(key);
      }
    }
    nextSweepAt = current + config.windowMs;
  }

  /** Counts one request for `key`; false once the key is over its limit. */
  return function hit(key: string): boolean {
    const current = now();
    if (current >= nextSweepAt) {
      sweep(current);
    }

    const entry = store.get(key);
    if (!entry || entry.resetAt <= current) {
      store.set(key, { count: 1, resetAt: current + config.windowMs });
      return true;
    }

    if (entry.count >= config.maxRequests) {
      return false;
    }

    entry.count += 1;
    return true;
  };
}

/** Fixed-window per-IP limiter. Each call owns its own window table. */
export function createRateLimiter(config: RateLimitConfig, now: () => number = Date.now) {
  const hit = createRateLimitWindow(config, now);

  return function rateLimitMiddleware(req: Request, res: Response, next: NextFunction): void {
    const ip = req.ip || req.socket.remoteAddress || 'unknown';
    if (!hit(ip)) {
      res.status(429).json({ error: 'Too many requests. Please slow down.' });
      return;
    }
    next();
  };
}
