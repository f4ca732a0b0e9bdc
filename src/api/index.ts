/**
 * API Layer Exports
 *
 * API layer is thin - delegates to services for all business logic.
 */

export { createApp } from './app.js';
export {
  createAuthMiddleware,
  createPublicMiddleware,
  createSupabaseTokenVerifier,
} from './middleware/auth.js';
export type { AuthenticatedUser } from './middleware/auth.js';
export {
  createRateLimitMiddleware,
  createUpstashRateLimiter,
  createInMemoryRateLimiter,
  callerIdentifier,
  RATE_LIMITS,
} from './middleware/rateLimit.js';
export type {
  RateLimiter,
  RateLimitConfig,
  RateLimitScope,
} from './middleware/rateLimit.js';
export type { ApiServices } from './types.js';
