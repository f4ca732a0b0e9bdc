/**
 * Rate Limiting Middleware
 * Budgets for routes that call the language model
 *
 * Two scopes with separate budgets per caller:
 * - ask: one compare judgment per request
 * - learn: gap, draft and review judgments per request (learn, re-extract)
 */

import type { Ratelimit } from '@upstash/ratelimit';
import type { Context, MiddlewareHandler } from 'hono';

import { getRequestId } from '../utils/response.js';

export type RateLimitScope = 'ask' | 'learn';

export interface RateLimitConfig {
  /** Requests allowed per window */
  limit: number;
  /** Window length in seconds */
  window: number;
}

/**
 * Outcome of one limiter check
 * `reset` is seconds until the window reopens
 */
export interface RateLimitResult {
  success: boolean;
  limit: number;
  remaining: number;
  reset: number;
}

/**
 * Rate limiter interface (injectable for testing)
 */
export interface RateLimiter {
  limit: (key: string) => Promise<RateLimitResult>;
}

export const RATE_LIMITS: Record<RateLimitScope, RateLimitConfig> = {
  ask: { limit: 30, window: 60 },
  learn: { limit: 10, window: 60 },
};

export interface RateLimitOptions {
  scope: RateLimitScope;
  /** Who is being limited; defaults to the user, then the client address */
  getIdentifier?: (c: Context) => string;
}

/**
 * Caller identity: user id when authenticated, else the forwarded address
 */
export function callerIdentifier(c: Context): string {
  const actor = c.get('actor');
  if (actor.userId) {
    return `user:${actor.userId}`;
  }
  const ip =
    c.req.header('x-forwarded-for')?.split(',')[0]?.trim() ||
    c.req.header('x-real-ip') ||
    'unknown';
  return `ip:${ip}`;
}

/**
 * Limit one scope; keys are `${scope}:${identifier}`
 */
export function createRateLimitMiddleware(
  rateLimiter: RateLimiter,
  options: RateLimitOptions
): MiddlewareHandler {
  const { scope } = options;
  const identify = options.getIdentifier ?? callerIdentifier;

  return async (c, next) => {
    const result = await rateLimiter.limit(`${scope}:${identify(c)}`);

    c.header('X-RateLimit-Limit', result.limit.toString());
    c.header('X-RateLimit-Remaining', result.remaining.toString());
    c.header('X-RateLimit-Reset', result.reset.toString());

    if (!result.success) {
      c.header('Retry-After', result.reset.toString());
      return c.json(
        {
          error: {
            code: 'RATE_LIMITED',
            message: `Too many ${scope} requests`,
            details: { scope, retryAfter: result.reset, limit: result.limit },
            requestId: getRequestId(c),
          },
        },
        429
      );
    }

    await next();
  };
}

/**
 * Limiter backed by @upstash/ratelimit
 * Upstash reports `reset` as an epoch timestamp in milliseconds
 *
 * ```typescript
 * const ask = createUpstashRateLimiter(
 *   new Ratelimit({ redis, limiter: Ratelimit.slidingWindow(30, '60 s') })
 * );
 * ```
 */
export function createUpstashRateLimiter(
  upstashRatelimit: Pick<Ratelimit, 'limit'>,
  now: () => number = Date.now
): RateLimiter {
  return {
    async limit(key: string): Promise<RateLimitResult> {
      const result = await upstashRatelimit.limit(key);
      return {
        success: result.success,
        limit: result.limit,
        remaining: result.remaining,
        reset: Math.max(0, Math.ceil((result.reset - now()) / 1000)),
      };
    },
  };
}

/**
 * Fixed-window limiter held in process memory
 * For tests and single-instance development
 */
export function createInMemoryRateLimiter(config: RateLimitConfig): RateLimiter {
  const windows = new Map<string, { count: number; resetAt: number }>();
  const windowMs = config.window * 1000;

  return {
    async limit(key: string): Promise<RateLimitResult> {
      const now = Date.now();
      let current = windows.get(key);
      if (current === undefined || current.resetAt <= now) {
        current = { count: 0, resetAt: now + windowMs };
        windows.set(key, current);
      }
      current.count++;

      return {
        success: current.count <= config.limit,
        limit: config.limit,
        remaining: Math.max(0, config.limit - current.count),
        reset: Math.ceil((current.resetAt - now) / 1000),
      };
    },
  };
}
