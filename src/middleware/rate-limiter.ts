import type { MiddlewareHandler, Context } from 'hono';
import type { OAuthVariables } from '../types/hono.js';
import { OAuthError } from '../errors/oauth-error.js';

export interface RateLimiterOptions {
  windowMs: number;
  maxRequests: number; // per client address and window
}

interface Window {
  startedAt: number;
  hits: number;
}

/**
 * Fixed-window hit counter, one window per key.
 * Windows that have ended are dropped at most once per window length.
 */
export class FixedWindowCounter {
  private readonly windows = new Map<string, Window>();
  private lastPrunedAt = 0;

  constructor(
    private readonly windowMs: number,
    private readonly maxRequests: number
  ) {}

  /**
   * Record a hit at `nowMs`.
   * Returns the seconds until the key's window ends when its budget is spent, null when the hit is allowed.
   */
  hit(key: string, nowMs: number): number | null {
    if (nowMs - this.lastPrunedAt >= this.windowMs) {
      this.prune(nowMs);
    }

    const window = this.windows.get(key);
    if (!window || nowMs - window.startedAt >= this.windowMs) {
      this.windows.set(key, { startedAt: nowMs, hits: 1 });
      return null;
    }

    if (window.hits >= this.maxRequests) {
      return Math.max(1, Math.ceil((window.startedAt + this.windowMs - nowMs) / 1000));
    }

    window.hits++;
    return null;
  }

  prune(nowMs: number): number {
    let removed = 0;
    for (const [key, window] of this.windows) {
      if (nowMs - window.startedAt >= this.windowMs) {
        this.windows.delete(key);
        removed++;
      }
    }
    this.lastPrunedAt = nowMs;
    return removed;
  }

  get size(): number {
    return this.windows.size;
  }
}

/**
 * First hop of X-Forwarded-For, then X-Real-IP
 */
export function clientAddress(c: Context): string {
  return (
    c.req.header('x-forwarded-for')?.split(',')[0]?.trim() ||
    c.req.header('x-real-ip') ||
    'unknown'
  );
}

/**
 * Per-address request budget; runs after requestTime so windows follow the request clock
 */
export function rateLimiter(options: RateLimiterOptions): MiddlewareHandler<{
  Variables: OAuthVariables;
}> {
  const counter = new FixedWindowCounter(options.windowMs, options.maxRequests);

  return async (c, next) => {
    const retryAfter = counter.hit(clientAddress(c), c.get('requestTime').getTime());
    if (retryAfter !== null) {
      c.header('Retry-After', String(retryAfter));
      throw OAuthError.temporarilyUnavailable(`Too many requests; retry in ${retryAfter} seconds`);
    }

    await next();
  };
}
