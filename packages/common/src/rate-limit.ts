// SPDX-License-Identifier: Apache-2.0
/**
 * Per-key fixed-window rate limiter.
 *
 * Each key gets `max` actions per `windowMs`. In-memory only; resets on
 * process restart. Stale entries are lazily pruned every minute.
 */

export interface RateLimitConfig {
  /** Maximum actions per window. Default: 60 */
  max?: number;
  /** Window duration in milliseconds. Default: 60_000 (1 minute) */
  windowMs?: number;
  /** Clock, injectable for tests. Default: Date.now */
  now?: () => number;
}

export interface RateLimitDecision {
  allowed: boolean;
  remaining: number;
  resetMs: number;
}

interface WindowEntry {
  count: number;
  /** Window start timestamp (ms) */
  start: number;
}

export class RateLimiter {
  readonly max: number;
  readonly windowMs: number;
  private readonly now: () => number;
  private readonly windows = new Map<string, WindowEntry>();
  private lastPrune: number;
  private readonly pruneIntervalMs = 60_000;

  constructor(config: RateLimitConfig = {}) {
    this.max = config.max ?? 60;
    this.windowMs = config.windowMs ?? 60_000;
    this.now = config.now ?? Date.now;
    this.lastPrune = this.now();
  }

  /** Check and consume one action for `key`. */
  check(key: string): RateLimitDecision {
    const now = this.now();
    this.maybePrune(now);

    let entry = this.windows.get(key);

    if (!entry || now - entry.start >= this.windowMs) {
      entry = { count: 0, start: now };
      this.windows.set(key, entry);
    }

    const resetMs = entry.start + this.windowMs - now;

    if (entry.count >= this.max) {
      return { allowed: false, remaining: 0, resetMs };
    }

    entry.count++;
    return { allowed: true, remaining: this.max - entry.count, resetMs };
  }

  private maybePrune(now: number): void {
    if (now - this.lastPrune < this.pruneIntervalMs) return;
    this.lastPrune = now;
    for (const [key, entry] of this.windows) {
      if (now - entry.start >= this.windowMs) {
        this.windows.delete(key);
      }
    }
  }

  /** Visible for testing: number of tracked keys. */
  _size(): number {
    return this.windows.size;
  }
}
