/**
 * AuditService Database Adapter
 * Implements AuditServiceDb interface using Supabase
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { AuditLog } from '@/types/index.js';

import type { AuditLogEntry, AuditServiceDb } from './audit.service.js';

/**
 * Database row type
 */
interface LedgerEventRow {
  id: string;
  timestamp: string;
  actor_type: string;
  actor_address: string | null;
  action: string;
  resource_type: string;
  resource_id: string | null;
  details: Record<string, unknown>;
  request_id: string | null;
}

/**
 * Map database row to AuditLog entity
 */
function mapRowToAuditLog(row: LedgerEventRow): AuditLog {
  return {
    id: row.id,
    timestamp: new Date(row.timestamp),
    actorType: row.actor_type,
    actorAddress: row.actor_address,
    action: row.action,
    resourceType: row.resource_type,
    resourceId: row.resource_id,
    details: row.details,
    requestId: row.request_id,
  };
}

/**
 * Create AuditServiceDb implementation using Supabase
 */
export function createAuditServiceDb(supabase: SupabaseClient): AuditServiceDb {
  return {
    async insertLog(entry: AuditLogEntry): Promise<{ id: string }> {
      const { data, error } = await supabase
        .from('ledger_events')
        .insert({
          actor_type: entry.actorType,
          actor_address: entry.actorAddress,
          action: entry.action,
          resource_type: entry.resourceType,
          resource_id: entry.resourceId,
          details: entry.details,
          request_id: entry.requestId,
        })
        .select('id')
        .single<{ id: string }>();

      if (error !== null) {
        throw new Error(`Failed to insert change record: ${error.message}`);
      }

      return { id: data.id };
    },

    async getLogsByResource(
      resourceType: string,
      resourceId: string
    ): Promise<AuditLog[]> {
      const { data, error } = await supabase
        .from('ledger_events')
        .select('*')
        .eq('resource_type', resourceType)
        .eq('resource_id', resourceId)
        .order('timestamp', { ascending: false })
        .returns<LedgerEventRow[]>();

      if (error !== null) {
        throw new Error(`Failed to get logs by resource: ${error.message}`);
      }

      return (data ?? []).map(mapRowToAuditLog);
    },
  };
}
