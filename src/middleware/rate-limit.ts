import type { MiddlewareHandler } from "hono";
import { clientIp } from "./client-ip.js";

export interface RateLimitOptions {
  /** Requests allowed per client per window (default: 60) */
  rpm?: number;
  /** Window length in ms (default: one minute) */
  windowMs?: number;
  /** Clock, for tests */
  now?: () => number;
}

export type LimitDecision =
  | { allowed: true; remaining: number }
  | { allowed: false; retryAfterSec: number; resetAt: number };

/**
 * Per-key sliding window. Keeps the timestamps of accepted requests
 * inside the current window.
 */
export class SlidingWindowLimiter {
  private windows = new Map<string, number[]>();

  constructor(
    readonly limit: number,
    private readonly windowMs: number,
  ) {}

  check(key: string, now: number): LimitDecision {
    const cutoff = now - this.windowMs;
    const recent = (this.windows.get(key) ?? []).filter((t) => t > cutoff);

    if (recent.length >= this.limit) {
      this.windows.set(key, recent);
      const oldest = recent[0] ?? now;
      return {
        allowed: false,
        retryAfterSec: Math.ceil((oldest + this.windowMs - now) / 1000),
        resetAt: Math.ceil((oldest + this.windowMs) / 1000),
      };
    }

    recent.push(now);
    this.windows.set(key, recent);
    return { allowed: true, remaining: this.limit - recent.length };
  }

  /** Drop keys with no requests inside the window. */
  sweep(now: number): void {
    const cutoff = now - this.windowMs;
    for (const [key, timestamps] of this.windows) {
      const kept = timestamps.filter((t) => t > cutoff);
      if (kept.length === 0) this.windows.delete(key);
      else this.windows.set(key, kept);
    }
  }

  get size(): number {
    return this.windows.size;
  }
}

/**
 * Per-IP rate limiter. Requests over the limit get a 429 with
 * Retry-After and X-RateLimit-* headers.
 */
export function rateLimit(options: RateLimitOptions = {}): MiddlewareHandler {
  const windowMs = options.windowMs ?? 60_000;
  const now = options.now ?? Date.now;
  const limiter = new SlidingWindowLimiter(options.rpm ?? 60, windowMs);

  const cleanupInterval = setInterval(() => limiter.sweep(now()), windowMs);
  cleanupInterval.unref();

  return async (c, next) => {
    const decision = limiter.check(clientIp(c), now());
    c.header("X-RateLimit-Limit", String(limiter.limit));

    if (!decision.allowed) {
      c.header("Retry-After", String(decision.retryAfterSec));
      c.header("X-RateLimit-Remaining", "0");
      c.header("X-RateLimit-Reset", String(decision.resetAt));
      return c.json(
        {
          error: "rate_limit_exceeded",
          error_description: `Too many requests. Limit: ${limiter.limit} requests per window.`,
          retry_after: decision.retryAfterSec,
        },
        429
      );
    }

    c.header("X-RateLimit-Remaining", String(decision.remaining));
    await next();
  };
}
