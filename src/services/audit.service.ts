/**
 * AuditService Implementation
 *
 * Purpose: Change records for every mutating ledger operation (audit/replay).
 * Owns: ledger_events
 * Dependencies: None (lowest level service)
 *
 * Change records are an observability hook; a failed write never
 * fails the operation that produced it.
 */

import type {
  ActorContext,
  AuditEvent,
  AuditLog,
  Result,
} from '@/types/index.js';
import { success, failure, hasPermission } from '@/types/index.js';

export interface AuditLogEntry {
  actorType: string;
  actorAddress: string | null;
  action: string;
  resourceType: string;
  resourceId: string | null;
  details: Record<string, unknown>;
  requestId: string | null;
}

/**
 * Database abstraction interface for AuditService
 * Allows mocking in tests
 */
export interface AuditServiceDb {
  insertLog: (entry: AuditLogEntry) => Promise<{ id: string }>;
  getLogsByResource: (
    resourceType: string,
    resourceId: string
  ) => Promise<AuditLog[]>;
}

/**
 * AuditService interface
 */
export interface AuditService {
  log(actor: ActorContext, event: AuditEvent): Promise<Result<void>>;
  getResourceHistory(
    actor: ActorContext,
    resourceType: string,
    resourceId: string
  ): Promise<Result<AuditLog[]>>;
}

/**
 * Build log entry from actor and event
 */
function buildLogEntry(actor: ActorContext, event: AuditEvent): AuditLogEntry {
  return {
    actorType: actor.type,
    actorAddress: actor.address ?? null,
    action: event.action,
    resourceType: event.resourceType,
    resourceId: event.resourceId ?? null,
    details: toJsonSafe(event.details ?? {}),
    requestId: actor.requestId,
  };
}

/**
 * Change records carry bigint amounts; JSON columns take them as strings
 */
function toJsonSafe(details: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(details)) {
    if (typeof value === 'bigint') {
      out[key] = value.toString();
    } else if (value instanceof Date) {
      out[key] = value.toISOString();
    } else {
      out[key] = value;
    }
  }
  return out;
}

/**
 * Create AuditService instance
 */
export function createAuditService(deps: { db: AuditServiceDb }): AuditService {
  const { db } = deps;

  return {
    /**
     * Log a change record
     * No permission check - all services can log
     */
    async log(actor: ActorContext, event: AuditEvent): Promise<Result<void>> {
      try {
        await db.insertLog(buildLogEntry(actor, event));
        return success(undefined);
      } catch (err) {
        console.error(`Failed to write change record ${event.action}:`, err);
        return failure('INTERNAL_ERROR', 'Failed to write audit log');
      }
    },

    /**
     * Change history of one resource, newest first
     * Requires: 'audit:read' permission
     */
    async getResourceHistory(
      actor: ActorContext,
      resourceType: string,
      resourceId: string
    ): Promise<Result<AuditLog[]>> {
      if (!hasPermission(actor, 'audit:read')) {
        return failure(
          'PERMISSION_DENIED',
          'Actor lacks audit:read permission'
        );
      }

      try {
        const logs = await db.getLogsByResource(resourceType, resourceId);
        return success(logs);
      } catch (err) {
        console.error('Failed to read change history:', err);
        return failure('INTERNAL_ERROR', 'Failed to read audit log');
      }
    },
  };
}
