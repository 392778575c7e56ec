/**
 * API Layer Exports
 *
 * API layer is thin - delegates to services for all business logic.
 */

export { createApp } from './app.js';
export type { ApiServices } from './types.js';
export type { TokenVerifier } from './middleware/auth.js';
export type { RateLimiter } from './middleware/rateLimit.js';
export {
  createUpstashRateLimiter,
  createInMemoryRateLimiter,
} from './middleware/rateLimit.js';
