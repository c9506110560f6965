/**
 * In-memory rate limit store.
 * Counters are per process; a serverless instance starts with none.
 */

import type { IRateLimitStore, RateLimitCounter } from './IRateLimitStore.js';

export class InMemoryRateLimitStore implements IRateLimitStore {
  private readonly windows = new Map<string, RateLimitCounter>();

  async increment(key: string, windowSeconds: number): Promise<RateLimitCounter> {
    const now = Math.floor(Date.now() / 1000);
    this.evictExpired(now);

    const current = this.windows.get(key);
    const counter: RateLimitCounter =
      current && current.resetAt > now
        ? { count: current.count + 1, resetAt: current.resetAt }
        : { count: 1, resetAt: now + windowSeconds };

    this.windows.set(key, counter);
    return { ...counter };
  }

  /** Number of live windows. */
  get size(): number {
    return this.windows.size;
  }

  private evictExpired(now: number): void {
    for (const [key, counter] of this.windows) {
      if (counter.resetAt <= now) this.windows.delete(key);
    }
  }
}
