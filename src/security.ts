import type { NextFunction, Request, Response } from 'express';

const MIN_WINDOW_MS = 1000;
const SWEEP_INTERVAL_MS = 60_000;

export interface RateLimitOptions {
  windowMs: number;
  max: number;
}

export interface RateLimitVerdict {
  allowed: boolean;
  remaining: number;
  retryAfterMs: number;
}

interface WindowCounter {
  count: number;
  windowEndsAt: number;
}

function clampWindow(value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    return SWEEP_INTERVAL_MS;
  }
  return Math.max(MIN_WINDOW_MS, Math.floor(value));
}

function clampMax(value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    return 1;
  }
  return Math.max(1, Math.floor(value));
}

/**
 * Fixed-window attempt counter per key, kept in memory. Counters reset when their
 * window ends; expired counters are swept at most once a minute.
 */
export class MemoryRateLimiter {
  private readonly windowMs: number;
  private readonly max: number;
  private readonly counters = new Map<string, WindowCounter>();
  private lastSweep = 0;

  constructor(options: RateLimitOptions) {
    this.windowMs = clampWindow(options.windowMs);
    this.max = clampMax(options.max);
  }

  hit(key: string): RateLimitVerdict {
    const now = Date.now();
    this.sweep(now);

    const counterKey = key || 'unknown';
    let counter = this.counters.get(counterKey);
    if (!counter || counter.windowEndsAt <= now) {
      counter = { count: 0, windowEndsAt: now + this.windowMs };
      this.counters.set(counterKey, counter);
    }

    counter.count += 1;
    const retryAfterMs = Math.max(0, counter.windowEndsAt - now);
    if (counter.count > this.max) {
      return { allowed: false, remaining: 0, retryAfterMs };
    }
    return { allowed: true, remaining: this.max - counter.count, retryAfterMs };
  }

  private sweep(now: number): void {
    if (now - this.lastSweep < SWEEP_INTERVAL_MS) {
      return;
    }
    this.lastSweep = now;
    for (const [key, counter] of this.counters) {
      if (counter.windowEndsAt <= now) {
        this.counters.delete(key);
      }
    }
  }
}

/** Honours X-Forwarded-For only from proxies the app's `trust proxy` setting accepts. */
export function getClientIp(req: Request): string {
  return req.ip || req.socket.remoteAddress || 'unknown';
}

export function createRateLimitMiddleware(limiter: MemoryRateLimiter, options: { message: string }) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const verdict = limiter.hit(getClientIp(req));
    if (verdict.allowed) {
      next();
      return;
    }

    const retryAfterSec = Math.max(1, Math.ceil(verdict.retryAfterMs / 1000));
    res.setHeader('Retry-After', String(retryAfterSec));
    res.status(429).json({
      error: options.message,
      kind: 'rate_limited',
      retryAfterSec
    });
  };
}
