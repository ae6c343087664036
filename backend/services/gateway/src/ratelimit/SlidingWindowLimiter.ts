// backend/services/gateway/src/ratelimit/SlidingWindowLimiter.ts
/**
 * Per-identity sliding-window log limiter.
 *
 * Purpose:
 * - Admit at most `points` requests per identity in any trailing window of
 *   `windowMs`. Accepted timestamps are kept per key; rejected attempts only
 *   bump a counter.
 *
 * Invariants:
 * - `check()` is synchronous: check-and-record cannot interleave with another
 *   request for the same key on the event loop.
 * - State is per key; one client never touches another's window.
 * - Keys idle for `idleWindows × windowMs` are evicted by `sweep()`.
 *
 * Nothing is persisted; a restart starts every window empty.
 */

import type { RateLimitConfig } from "../config";

export type RateDecision =
  | { allowed: true; remaining: number }
  | { allowed: false; retryAfterMs: number };

type WindowState = {
  /** Accepted timestamps, oldest first. */
  hits: number[];
  rejected: number;
  lastSeenAt: number;
};

export type WindowSnapshot = Readonly<{
  inWindow: number;
  rejected: number;
  lastSeenAt: number;
}>;

export class SlidingWindowLimiter {
  private readonly windows = new Map<string, WindowState>();
  private lastSweepAt = Number.NEGATIVE_INFINITY;
  private timer: NodeJS.Timeout | undefined;
  private rejectedTotal = 0;

  constructor(private readonly cfg: RateLimitConfig) {
    if (cfg.points < 1) throw new Error("rate limit points must be >= 1");
    if (cfg.windowMs < 1) throw new Error("rate limit window must be >= 1ms");
  }

  get limit(): number {
    return this.cfg.points;
  }

  get windowMs(): number {
    return this.cfg.windowMs;
  }

  check(key: string, now: number): RateDecision {
    if (now - this.lastSweepAt >= this.cfg.windowMs) this.sweep(now);

    let st = this.windows.get(key);
    if (!st) {
      st = { hits: [], rejected: 0, lastSeenAt: now };
      this.windows.set(key, st);
    }
    st.lastSeenAt = now;
    prune(st.hits, now - this.cfg.windowMs);

    if (st.hits.length < this.cfg.points) {
      st.hits.push(now);
      return { allowed: true, remaining: this.cfg.points - st.hits.length };
    }

    st.rejected += 1;
    this.rejectedTotal += 1;
    // hits[0] is the oldest counted request; it leaves the window at +W.
    return { allowed: false, retryAfterMs: Math.max(1, st.hits[0] + this.cfg.windowMs - now) };
  }

  /** Drops keys idle for longer than `idleWindows × windowMs`. Returns evictions. */
  sweep(now: number): number {
    this.lastSweepAt = now;
    const idleMs = this.cfg.idleWindows * this.cfg.windowMs;
    let evicted = 0;
    for (const [key, st] of this.windows) {
      if (now - st.lastSeenAt >= idleMs) {
        this.windows.delete(key);
        evicted += 1;
      }
    }
    return evicted;
  }

  size(): number {
    return this.windows.size;
  }

  get totalRejected(): number {
    return this.rejectedTotal;
  }

  snapshot(key: string, now: number): WindowSnapshot | undefined {
    const st = this.windows.get(key);
    if (!st) return undefined;
    const cutoff = now - this.cfg.windowMs;
    return Object.freeze({
      inWindow: st.hits.filter((t) => t > cutoff).length,
      rejected: st.rejected,
      lastSeenAt: st.lastSeenAt,
    });
  }

  /** Periodic eviction for quiet periods; the timer never holds the process open. */
  start(clock: { now(): number }): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.sweep(clock.now());
    }, this.cfg.windowMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }
}

/** Remove timestamps at or before `cutoff` (window is `(now − W, now]`). */
function prune(hits: number[], cutoff: number): void {
  let i = 0;
  while (i < hits.length && hits[i] <= cutoff) i++;
  if (i > 0) hits.splice(0, i);
}
