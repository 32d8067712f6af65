import { Request, RequestHandler } from 'express';
import { AppError } from '../errors.js';

export interface LimiterOptions {
  windowMs: number;
  /** Actions allowed per principal within one window. */
  max: number;
  /** Label used in the error message. */
  action: string;
  keyFn?: (req: Request) => string;
  now?: () => number;
}

export interface WindowDecision {
  allowed: boolean;
  remaining: number;
  /** Epoch ms at which the oldest counted hit leaves the window. */
  resetAt: number;
}

/** In-memory sliding window, one timestamp list per key. Not shared between replicas. */
export class SlidingWindow {
  private readonly hits = new Map<string, number[]>();

  constructor(
    private readonly windowMs: number,
    private readonly max: number,
  ) {}

  hit(key: string, ts: number): WindowDecision {
    const live = (this.hits.get(key) ?? []).filter((h) => ts - h < this.windowMs);
    const allowed = live.length < this.max;
    if (allowed) live.push(ts);
    this.hits.set(key, live);
    return { allowed, remaining: Math.max(this.max - live.length, 0), resetAt: live[0] + this.windowMs };
  }

  /** Drops keys whose hits have all expired. */
  sweep(ts: number): void {
    for (const [key, list] of this.hits) {
      if (list.every((h) => ts - h >= this.windowMs)) this.hits.delete(key);
    }
  }

  get size(): number {
    return this.hits.size;
  }
}

export function createRateLimiter(opts: LimiterOptions): RequestHandler {
  const window = new SlidingWindow(opts.windowMs, opts.max);
  const now = opts.now ?? Date.now;
  const keyFn = opts.keyFn ?? ((req: Request) => req.principal?.subject ?? 'anonymous');
  let lastSweep = now();

  return (req, res, next) => {
    const ts = now();
    if (ts - lastSweep >= opts.windowMs) {
      window.sweep(ts);
      lastSweep = ts;
    }
    const decision = window.hit(keyFn(req), ts);
    res.setHeader('X-RateLimit-Limit', String(opts.max));
    res.setHeader('X-RateLimit-Remaining', String(decision.remaining));
    res.setHeader('X-RateLimit-Reset', String(decision.resetAt));
    if (!decision.allowed) {
      const retryAfterSeconds = Math.ceil((decision.resetAt - ts) / 1000);
      return next(new AppError('RateLimited', `${opts.action} rate limit exceeded`, { retryAfterSeconds }));
    }
    next();
  };
}
