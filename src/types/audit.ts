/**
 * Audit Types
 * Structured change records emitted by every mutating ledger operation
 */

/**
 * Event to be logged to the audit system
 * Used as input to AuditService.log()
 */
export interface AuditEvent {
  action: string; // e.g., 'subscription.deducted', 'reservation.settled'
  resourceType: string; // e.g., 'subscription', 'reservation'
  resourceId?: string;
  details?: Record<string, unknown>;
}

/**
 * Full change record (from database)
 */
export interface AuditLog {
  id: string;
  timestamp: Date;
  actorType: string;
  actorAddress: string | null;
  action: string;
  resourceType: string;
  resourceId: string | null;
  details: Record<string, unknown>;
  requestId: string | null;
}
