/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { CrossChainReconciler } from '@/services/reconciliation.service.js';
import type { PendingUsageTracker } from '@/services/pending-usage.service.js';
import type { SponsorshipAuthorizer } from '@/services/sponsorship.service.js';
import type { SubscriptionLedger } from '@/services/subscription-ledger.service.js';
import type { ActorContext, ErrorCode } from '@/types/index.js';

/**
 * Extended Hono context with actor
 */
declare module 'hono' {
  interface ContextVariableMap {
    actor: ActorContext;
    requestId: string;
  }
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta?: {
    requestId: string;
  };
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

export type ErrorStatus = 400 | 401 | 402 | 403 | 404 | 409 | 429 | 500 | 503;

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Record<ErrorCode, ErrorStatus> = {
  UNAUTHORIZED: 401,
  PERMISSION_DENIED: 403,
  NOT_SPONSORED: 403,
  NOT_FOUND: 404,
  VALIDATION_ERROR: 400,
  INVALID_WINDOW: 400,
  WRONG_CHAIN: 400,
  NOT_ACTIVE: 409,
  STILL_ACTIVE: 409,
  DUPLICATE_OPERATION: 409,
  DUPLICATE_MESSAGE: 409,
  ALREADY_COMMITTED: 409,
  ALREADY_RELEASED: 409,
  INSUFFICIENT_BALANCE: 402,
  INSUFFICIENT_AVAILABLE: 402,
  RATE_LIMITED: 429,
  CHANNEL_UNAVAILABLE: 503,
  INTERNAL_ERROR: 500,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: ErrorCode): ErrorStatus {
  return ERROR_STATUS_MAP[code];
}

/**
 * Service context for dependency injection
 */
export interface ApiServices {
  ledger: SubscriptionLedger;
  tracker: PendingUsageTracker;
  authorizer: SponsorshipAuthorizer;
  reconciler: CrossChainReconciler;
}
