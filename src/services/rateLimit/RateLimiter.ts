/**
 * Sliding Window Rate Limiter
 *
 * Per-identifier admission control: at most `max` attempts inside any
 * trailing `windowMs`. Each instance owns its state; create one per scope
 * (credentials, checkout) and inject it where needed.
 *
 * `check` is synchronous, so prune + count + append run as one critical
 * section on the event loop and concurrent bursts cannot undercount.
 *
 * Identifiers are kept until `reap` runs; `startReaper` schedules it.
 */

import { rateLimitLogger } from "../../utils/logger";

export interface RateLimiterOptions {
  max?: number;
  windowMs?: number;
  clock?: () => number;
}

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** 0 when allowed; otherwise ms until the oldest attempt leaves the window */
  retryAfterMs: number;
}

export const DEFAULT_RATE_LIMIT_MAX = 5;
export const DEFAULT_RATE_LIMIT_WINDOW_MS = 60_000;

export class SlidingWindowRateLimiter {
  readonly max: number;
  readonly windowMs: number;
  private readonly clock: () => number;
  private readonly attempts = new Map<string, number[]>();
  private reaper: NodeJS.Timeout | null = null;

  constructor(options: RateLimiterOptions = {}) {
    this.max = options.max ?? DEFAULT_RATE_LIMIT_MAX;
    this.windowMs = options.windowMs ?? DEFAULT_RATE_LIMIT_WINDOW_MS;
    this.clock = options.clock ?? Date.now;

    if (!Number.isInteger(this.max) || this.max < 1) {
      throw new RangeError(`Rate limit max must be a positive integer, got ${this.max}`);
    }
    if (!Number.isFinite(this.windowMs) || this.windowMs <= 0) {
      throw new RangeError(`Rate limit window must be positive, got ${this.windowMs}`);
    }
  }

  /**
   * Record an attempt for `identifier` if it is admitted
   */
  allow(identifier: string): boolean {
    return this.check(identifier).allowed;
  }

  check(identifier: string): RateLimitDecision {
    const now = this.clock();
    const recent = this.prune(this.attempts.get(identifier) ?? [], now);

    if (recent.length >= this.max) {
      this.attempts.set(identifier, recent);
      const oldest = recent[0] ?? now;
      return {
        allowed: false,
        limit: this.max,
        remaining: 0,
        retryAfterMs: Math.max(0, oldest + this.windowMs - now),
      };
    }

    recent.push(now);
    this.attempts.set(identifier, recent);

    return {
      allowed: true,
      limit: this.max,
      remaining: this.max - recent.length,
      retryAfterMs: 0,
    };
  }

  /**
   * Drop identifiers with no attempt left inside the window.
   * Returns how many were removed.
   */
  reap(): number {
    const now = this.clock();
    let removed = 0;

    for (const [identifier, timestamps] of this.attempts) {
      const recent = this.prune(timestamps, now);
      if (recent.length === 0) {
        this.attempts.delete(identifier);
        removed++;
      } else {
        this.attempts.set(identifier, recent);
      }
    }

    if (removed > 0) {
      rateLimitLogger.debug("Reaped idle rate limit entries", {
        removed,
        tracked: this.attempts.size,
      });
    }
    return removed;
  }

  /**
   * Number of identifiers currently tracked
   */
  get size(): number {
    return this.attempts.size;
  }

  startReaper(intervalMs: number): void {
    if (this.reaper) return;
    this.reaper = setInterval(() => this.reap(), intervalMs);
    this.reaper.unref();
  }

  stop(): void {
    if (this.reaper) {
      clearInterval(this.reaper);
      this.reaper = null;
    }
  }

  /**
   * Attempts strictly younger than the window survive
   */
  private prune(timestamps: number[], now: number): number[] {
    return timestamps.filter((t) => now - t < this.windowMs);
  }
}
