/**
 * CrossChainReconciler Database Adapter
 * Implements ReconciliationDb interface using Supabase
 *
 * Tables: reconciliation_outbox, applied_messages, reconciliation_sequences
 * Outbound sequences are read off the outbox, so a failed insert leaves no
 * hole. Applying a message goes through apply_reconciliation_message(),
 * which also deducts the subscription balance and keeps the inbound sequence.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type {
  MessageApplication,
  OutboxEntry,
  OutboxStatus,
  ReconciliationMessage,
} from '@/types/index.js';

import type { ReconciliationDb } from './reconciliation.service.js';

/** Row of apply_reconciliation_message(); amounts come back as text */
interface ApplicationRow {
  out_deducted: string;
  out_shortfall: string;
  out_remaining_balance: string;
  out_previous_sequence: number | null;
}

/** Row of reconciliation_outbox; deducted_amount comes back as text */
interface OutboxRow {
  message_id: string;
  subscription_id: string;
  home_chain_id: number;
  source_chain_id: number;
  deducted_amount: string;
  sequence_number: number;
  reservation_id: string | null;
  status: OutboxStatus;
  attempts: number;
  last_error: string | null;
  created_at: string;
  sent_at: string | null;
}

const OUTBOX_SELECT = `
  message_id,
  subscription_id,
  home_chain_id,
  source_chain_id,
  deducted_amount:deducted_amount::text,
  sequence_number,
  reservation_id,
  status,
  attempts,
  last_error,
  created_at,
  sent_at
`;

function mapRowToOutboxEntry(row: OutboxRow): OutboxEntry {
  return {
    message: {
      messageId: row.message_id,
      subscriptionId: row.subscription_id,
      homeChainId: Number(row.home_chain_id),
      sourceChainId: Number(row.source_chain_id),
      deductedAmount: BigInt(row.deducted_amount),
      sequenceNumber: Number(row.sequence_number),
      createdAt: new Date(row.created_at),
    },
    reservationId: row.reservation_id,
    status: row.status,
    attempts: row.attempts,
    lastError: row.last_error,
    createdAt: new Date(row.created_at),
    sentAt: row.sent_at === null ? null : new Date(row.sent_at),
  };
}

/**
 * Create ReconciliationDb implementation using Supabase
 */
export function createReconciliationDb(
  supabase: SupabaseClient
): ReconciliationDb {
  return {
    async nextOutboundSequence(
      subscriptionId: string,
      sourceChainId: number
    ): Promise<number> {
      const { data, error } = await supabase
        .from('reconciliation_outbox')
        .select('sequence_number')
        .eq('subscription_id', subscriptionId)
        .eq('source_chain_id', sourceChainId)
        .order('sequence_number', { ascending: false })
        .limit(1)
        .maybeSingle<{ sequence_number: number }>();

      if (error !== null) {
        throw new Error(`Failed to read outbound sequence: ${error.message}`);
      }

      return (data === null ? 0 : Number(data.sequence_number)) + 1;
    },

    async insertOutbox(
      message: ReconciliationMessage,
      reservationId: string | null
    ): Promise<void> {
      const { error } = await supabase.from('reconciliation_outbox').insert({
        message_id: message.messageId,
        subscription_id: message.subscriptionId,
        home_chain_id: message.homeChainId,
        source_chain_id: message.sourceChainId,
        deducted_amount: message.deductedAmount.toString(),
        sequence_number: message.sequenceNumber,
        reservation_id: reservationId,
        status: 'pending',
        attempts: 0,
        created_at: message.createdAt.toISOString(),
      });

      if (error !== null) {
        throw new Error(`Failed to write outbox entry: ${error.message}`);
      }
    },

    async findOutboxByReservation(
      reservationId: string
    ): Promise<OutboxEntry | null> {
      const { data, error } = await supabase
        .from('reconciliation_outbox')
        .select(OUTBOX_SELECT)
        .eq('reservation_id', reservationId)
        .maybeSingle<OutboxRow>();

      if (error !== null) {
        throw new Error(`Failed to read outbox entry: ${error.message}`);
      }

      return data === null ? null : mapRowToOutboxEntry(data);
    },

    async markSent(messageId: string, sentAt: Date): Promise<void> {
      const { error } = await supabase
        .from('reconciliation_outbox')
        .update({ status: 'sent', sent_at: sentAt.toISOString(), last_error: null })
        .eq('message_id', messageId);

      if (error !== null) {
        throw new Error(`Failed to mark outbox entry sent: ${error.message}`);
      }
    },

    async markAttemptFailed(messageId: string, reason: string): Promise<void> {
      const { data, error: readError } = await supabase
        .from('reconciliation_outbox')
        .select('attempts')
        .eq('message_id', messageId)
        .single<{ attempts: number }>();

      if (readError !== null) {
        throw new Error(`Failed to read outbox entry: ${readError.message}`);
      }

      const { error } = await supabase
        .from('reconciliation_outbox')
        .update({ attempts: data.attempts + 1, last_error: reason })
        .eq('message_id', messageId);

      if (error !== null) {
        throw new Error(`Failed to record outbox failure: ${error.message}`);
      }
    },

    async listPendingOutbox(limit: number): Promise<OutboxEntry[]> {
      const { data, error } = await supabase
        .from('reconciliation_outbox')
        .select(OUTBOX_SELECT)
        .eq('status', 'pending')
        .order('created_at', { ascending: true })
        .limit(limit)
        .returns<OutboxRow[]>();

      if (error !== null) {
        throw new Error(`Failed to list pending outbox: ${error.message}`);
      }

      return (data ?? []).map(mapRowToOutboxEntry);
    },

    async applyMessage(
      message: ReconciliationMessage,
      appliedAt: Date
    ): Promise<MessageApplication | null> {
      const { data, error } = await supabase
        .rpc('apply_reconciliation_message', {
          p_message_id: message.messageId,
          p_subscription_id: message.subscriptionId,
          p_source_chain_id: message.sourceChainId,
          p_sequence_number: message.sequenceNumber,
          p_deducted_amount: message.deductedAmount.toString(),
          p_applied_at: appliedAt.toISOString(),
        })
        .maybeSingle<ApplicationRow>();

      if (error !== null) {
        throw new Error(`Failed to apply message: ${error.message}`);
      }
      if (data === null) {
        return null;
      }

      return {
        charge: {
          deducted: BigInt(data.out_deducted),
          shortfall: BigInt(data.out_shortfall),
          remainingBalance: BigInt(data.out_remaining_balance),
        },
        previousSequence:
          data.out_previous_sequence === null
            ? null
            : Number(data.out_previous_sequence),
      };
    },

    async pruneApplied(appliedBefore: Date): Promise<number> {
      const { error, count } = await supabase
        .from('applied_messages')
        .delete({ count: 'exact' })
        .lt('applied_at', appliedBefore.toISOString());

      if (error !== null) {
        throw new Error(`Failed to prune applied messages: ${error.message}`);
      }

      return count ?? 0;
    },
  };
}
