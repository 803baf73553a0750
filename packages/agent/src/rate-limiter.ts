export interface RateCheck {
  allowed: boolean;
  remaining: number;
  /** When the oldest call in the window expires, epoch ms. */
  resetAt: number;
}

/**
 * Sliding-window call limiter keyed by caller. A refused call does not
 * count against the window. Idle keys are dropped at most once per window.
 */
export class RateLimiter {
  private calls = new Map<string, number[]>();
  private maxCalls: number;
  private windowMs: number;
  private now: () => number;
  private lastPruneAt = 0;

  constructor(maxCalls = 20, windowMs = 60_000, now: () => number = Date.now) {
    this.maxCalls = maxCalls;
    this.windowMs = windowMs;
    this.now = now;
  }

  check(key: string): RateCheck {
    const now = this.now();
    if (now - this.lastPruneAt >= this.windowMs) this.prune();
    const history = (this.calls.get(key) ?? []).filter((t) => now - t < this.windowMs);
    const allowed = history.length < this.maxCalls;
    if (allowed) history.push(now);
    this.calls.set(key, history);
    const oldest = history[0] ?? now;
    return {
      allowed,
      remaining: Math.max(0, this.maxCalls - history.length),
      resetAt: oldest + this.windowMs,
    };
  }

  /** Drops keys whose whole window has expired. */
  prune(): void {
    const now = this.now();
    this.lastPruneAt = now;
    for (const [key, history] of this.calls) {
      if (history.every((t) => now - t >= this.windowMs)) this.calls.delete(key);
    }
  }

  get size(): number {
    return this.calls.size;
  }
}
