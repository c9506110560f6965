/**
 * Rate limiting middleware.
 * Composable with the pipeline; each endpoint can have its own config.
 * Counters live in an IRateLimitStore.
 */

import type { IRateLimitStore } from '../stores/IRateLimitStore.js';
import type { HandlerContext, Middleware, Handler } from './pipeline.js';
import { RateLimitError } from '../errors.js';

export interface RateLimitConfig {
  /** Extract the rate limit key from the request/context. */
  key: (req: Request, ctx: HandlerContext) => string;
  /** Maximum requests allowed within the window. */
  limit: number;
  /** Window duration in seconds. */
  windowSeconds: number;
}

export function createRateLimitMiddleware(
  store: IRateLimitStore,
  config: RateLimitConfig
): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const key = config.key(req, ctx);
      const { count, resetAt } = await store.increment(key, config.windowSeconds);

      if (count > config.limit) {
        const now = Math.floor(Date.now() / 1000);
        const retryAfter = Math.max(1, resetAt - now);
        throw new RateLimitError(retryAfter);
      }

      const response = await next(req, ctx);

      // Attach rate limit headers to successful responses
      const headers = new Headers(response.headers);
      headers.set('X-RateLimit-Limit', String(config.limit));
      headers.set('X-RateLimit-Remaining', String(Math.max(0, config.limit - count)));
      headers.set('X-RateLimit-Reset', String(resetAt));

      return new Response(response.body, {
        status: response.status,
        statusText: response.statusText,
        headers,
      });
    };
  };
}

// ── Key extraction helpers ──

/** Per-client key, from the first X-Forwarded-For hop. */
export function ipKey(action: string) {
  return (req: Request): string => {
    const forwarded = req.headers.get('X-Forwarded-For');
    const ip = forwarded?.split(',')[0]?.trim() || 'unknown';
    return `ip:${ip}:${action}`;
  };
}

// ── Pre-built rate limit configs ──

const ONE_MINUTE = 60;
const ONE_HOUR = 3600;

/** Limits for the public endpoints; `perMinute` comes from RATE_LIMIT_PER_MINUTE. */
export function rateLimits(perMinute: number) {
  return {
    /** POST /search */
    search: { key: ipKey('search'), limit: perMinute, windowSeconds: ONE_MINUTE },
    /** POST /conversation/* */
    conversation: { key: ipKey('conversation'), limit: perMinute, windowSeconds: ONE_MINUTE },
    /** POST /feedback */
    feedback: { key: ipKey('feedback'), limit: 30, windowSeconds: ONE_MINUTE },
    /** POST /admin/dataset/reload: each reload re-reads the whole dataset */
    reload: { key: ipKey('reload'), limit: 5, windowSeconds: ONE_HOUR },
  } satisfies Record<string, RateLimitConfig>;
}
