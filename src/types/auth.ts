/**
 * Actor Types
 * Who is calling into the service layer
 */

/**
 * Actor Context - Who is performing the action
 * Every service method receives this context
 */
export interface ActorContext {
  type: 'subscriber' | 'relayer' | 'system' | 'anonymous';
  /** Authenticated user ID (Supabase Auth) for subscriber actors */
  userId?: string;
  /** Wallet address the actor acts for, checksummed */
  address?: string;
  /** Fingerprint of the relayer key that authenticated a relayer actor */
  keyId?: string;
  requestId: string;
  permissions: string[];
  ip?: string;
  userAgent?: string;
}

/**
 * Permissions held by relayer actors (bundlers, bridge executors)
 */
export const RELAYER_PERMISSIONS = [
  'subscription:mint',
  'subscription:deduct',
  'sponsorship:authorize',
  'reconciliation:deliver',
] as const;

/**
 * System actor for background jobs and internal wiring
 * Has all permissions - use with caution
 */
export const SYSTEM_ACTOR: ActorContext = {
  type: 'system',
  requestId: 'system',
  permissions: ['*'],
};

/**
 * Check whether an actor holds a permission (wildcard included)
 */
export function hasPermission(actor: ActorContext, permission: string): boolean {
  return actor.permissions.includes('*') || actor.permissions.includes(permission);
}
