/**
 * Sliding-Window Rate Limiter
 *
 * Per-key log of request timestamps over a trailing window.
 *
 * Algorithm:
 * 1. Drop timestamps with `now - t >= windowMs` (a timestamp exactly one
 *    window old is already outside)
 * 2. If the remaining count has reached `maxRequests` → reject, telling the
 *    caller how long until the oldest timestamp leaves the window
 * 3. Otherwise → record `now` and allow
 *
 * Every check also drops keys whose newest timestamp has left the window, so
 * a key lives only as long as its window is non-empty; there is no
 * background eviction. Every method is synchronous, so concurrent callers on
 * the event loop can never observe a half-updated window.
 */

import { logger } from "../../utils/logger.js";
import { systemClock, type Clock } from "../../types/common.js";

// ============================================================================
// Types
// ============================================================================

export interface RateLimiterConfig {
  /** Max requests per window */
  maxRequests: number;
  /** Window length in milliseconds */
  windowMs: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  /** Whole seconds until the next slot frees up; 0 when allowed */
  retryAfterSeconds: number;
}

export interface RateLimitUsage {
  count: number;
  limit: number;
  remaining: number;
}

const DEFAULT_CONFIG: RateLimiterConfig = {
  maxRequests: 100,
  windowMs: 60_000,
};

// ============================================================================
// Rate Limiter
// ============================================================================

export class RateLimiter {
  private readonly windows = new Map<string, number[]>();
  private readonly config: RateLimiterConfig;

  constructor(
    config: Partial<RateLimiterConfig> = {},
    private readonly clock: Clock = systemClock
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  isAllowed(key: string): RateLimitDecision {
    const now = this.clock.now();
    this.sweepExpired(now);
    const timestamps = this.prune(key, now);

    if (timestamps.length >= this.config.maxRequests) {
      const oldest = timestamps[0] ?? now;
      const retryAfterSeconds = Math.max(
        0,
        Math.ceil((oldest + this.config.windowMs - now) / 1000)
      );

      logger.debug("Rate limit exceeded", {
        key,
        count: timestamps.length,
        limit: this.config.maxRequests,
        retryAfterSeconds,
      });

      return { allowed: false, retryAfterSeconds };
    }

    timestamps.push(now);
    this.windows.set(key, timestamps);
    return { allowed: true, retryAfterSeconds: 0 };
  }

  /**
   * Current window usage without recording a request
   */
  getUsage(key: string): RateLimitUsage {
    const count = this.prune(key, this.clock.now()).length;
    return {
      count,
      limit: this.config.maxRequests,
      remaining: Math.max(0, this.config.maxRequests - count),
    };
  }

  reset(key?: string): void {
    if (key === undefined) {
      this.windows.clear();
      return;
    }
    this.windows.delete(key);
  }

  trackedKeys(): string[] {
    return Array.from(this.windows.keys());
  }

  getConfig(): Readonly<RateLimiterConfig> {
    return this.config;
  }

  private sweepExpired(now: number): void {
    for (const [key, timestamps] of this.windows) {
      const newest = timestamps[timestamps.length - 1];
      if (newest === undefined || now - newest >= this.config.windowMs) {
        this.windows.delete(key);
      }
    }
  }

  private prune(key: string, now: number): number[] {
    const existing = this.windows.get(key);
    if (!existing) {
      return [];
    }

    const inWindow = existing.filter((t) => now - t < this.config.windowMs);

    if (inWindow.length === 0) {
      this.windows.delete(key);
    } else {
      this.windows.set(key, inWindow);
    }

    return inWindow;
  }
}
