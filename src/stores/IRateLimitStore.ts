/**
 * Fixed-window request counters.
 */

export interface RateLimitCounter {
  /** Requests counted in the current window, this one included. */
  count: number;
  /** Window end, in epoch seconds. */
  resetAt: number;
}

export interface IRateLimitStore {
  /** Count one request against `key`, starting a new window if the last one ended. */
  increment(key: string, windowSeconds: number): Promise<RateLimitCounter>;
}
