/**
 * Rate Limiting Middleware
 *
 * Sponsorship calls are limited per relayer key, so one misbehaving bundler
 * cannot drain the reservation table for everyone else. Subscribers are
 * limited per user, anything else per client IP.
 */

import type { Ratelimit } from '@upstash/ratelimit';
import type { Context, Next } from 'hono';

import type { ActorContext } from '@/types/index.js';

import { errorResponse } from '../utils/response.js';

export interface RateLimitResult {
  success: boolean;
  limit: number;
  remaining: number;
  /** Epoch milliseconds at which the window resets */
  reset: number;
}

/**
 * Rate limiter interface (injectable for testing)
 */
export interface RateLimiter {
  limit: (identifier: string) => Promise<RateLimitResult>;
}

/**
 * Bucket an actor is counted in
 */
export function rateLimitKey(actor: ActorContext | undefined): string {
  if (actor?.keyId !== undefined) {
    return `relayer:${actor.keyId}`;
  }
  if (actor?.userId !== undefined) {
    return `subscriber:${actor.userId}`;
  }
  return `ip:${actor?.ip ?? 'unknown'}`;
}

/**
 * Must run after the auth middleware, which sets the actor
 */
export function createRateLimitMiddleware(rateLimiter: RateLimiter) {
  return async function rateLimitMiddleware(c: Context, next: Next) {
    const actor: ActorContext | undefined = c.get('actor');
    const result = await rateLimiter.limit(rateLimitKey(actor));

    c.header('X-RateLimit-Limit', result.limit.toString());
    c.header('X-RateLimit-Remaining', result.remaining.toString());
    c.header('X-RateLimit-Reset', result.reset.toString());

    if (!result.success) {
      const retryAfter = Math.max(0, Math.ceil((result.reset - Date.now()) / 1000));
      c.header('Retry-After', retryAfter.toString());
      return errorResponse(
        c,
        {
          code: 'RATE_LIMITED',
          message: 'Too many requests',
          details: { retryAfter, limit: result.limit },
        },
        actor?.requestId ?? 'unknown'
      );
    }

    return next();
  };
}

/**
 * Production limiter backed by @upstash/ratelimit
 */
export function createUpstashRateLimiter(
  upstashRatelimit: Pick<Ratelimit, 'limit'>
): RateLimiter {
  return {
    async limit(identifier: string): Promise<RateLimitResult> {
      const result = await upstashRatelimit.limit(identifier);
      return {
        success: result.success,
        limit: result.limit,
        remaining: result.remaining,
        reset: result.reset,
      };
    },
  };
}

/**
 * Fixed-window limiter for tests and single-node development
 */
export function createInMemoryRateLimiter(config: {
  limit: number;
  windowSeconds: number;
}): RateLimiter {
  const windows = new Map<string, { count: number; resetAt: number }>();

  return {
    async limit(identifier: string): Promise<RateLimitResult> {
      const now = Date.now();
      let entry = windows.get(identifier);
      if (entry === undefined || entry.resetAt <= now) {
        entry = { count: 0, resetAt: now + config.windowSeconds * 1000 };
        windows.set(identifier, entry);
      }
      entry.count += 1;

      return {
        success: entry.count <= config.limit,
        limit: config.limit,
        remaining: Math.max(0, config.limit - entry.count),
        reset: entry.resetAt,
      };
    },
  };
}
