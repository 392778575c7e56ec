/**
 * SubscriptionLedger Database Adapter
 * Implements SubscriptionLedgerDb interface using Supabase
 *
 * Handles (subscription_handles) point at data records (subscription_records).
 * Amounts are numeric(78,0) columns, selected as text so no precision is lost.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { Subscription } from '@/types/index.js';

import type {
  SubscriptionLedgerDb,
  SubscriptionRecordPatch,
} from './subscription-ledger.service.js';

/**
 * Database row types
 */
interface RecordRow {
  id: string;
  start_time: string;
  end_time: string;
  payment_token: string;
  paid_amount: string;
  remaining_balance: string;
  sponsored_addresses: string[];
  home_chain_id: number;
  created_at: string;
  updated_at: string;
}

interface HandleRow {
  id: string;
  owner: string;
  record_id: string;
  record: RecordRow | null;
}

const HANDLE_SELECT = `
  id,
  owner,
  record_id,
  record:subscription_records (
    id,
    start_time,
    end_time,
    payment_token,
    paid_amount:paid_amount::text,
    remaining_balance:remaining_balance::text,
    sponsored_addresses,
    home_chain_id,
    created_at,
    updated_at
  )
`;

/**
 * Map joined handle/record row to Subscription entity
 */
function mapRowToSubscription(row: HandleRow): Subscription {
  if (row.record === null) {
    throw new Error(`Subscription handle ${row.id} has no record`);
  }
  const record = row.record;
  return {
    id: row.id,
    owner: row.owner,
    startTime: new Date(record.start_time),
    endTime: new Date(record.end_time),
    paymentToken: record.payment_token,
    paidAmount: BigInt(record.paid_amount),
    remainingBalance: BigInt(record.remaining_balance),
    sponsoredAddresses: record.sponsored_addresses,
    homeChainId: Number(record.home_chain_id),
    createdAt: new Date(record.created_at),
    updatedAt: new Date(record.updated_at),
  };
}

/**
 * Create SubscriptionLedgerDb implementation using Supabase
 */
export function createSubscriptionLedgerDb(
  supabase: SupabaseClient
): SubscriptionLedgerDb {
  async function fetchHandle(subscriptionId: string): Promise<HandleRow | null> {
    const { data, error } = await supabase
      .from('subscription_handles')
      .select(HANDLE_SELECT)
      .eq('id', subscriptionId)
      .maybeSingle<HandleRow>();

    if (error !== null) {
      throw new Error(`Failed to get subscription: ${error.message}`);
    }

    return data;
  }

  async function fetchExisting(subscriptionId: string): Promise<Subscription> {
    const row = await fetchHandle(subscriptionId);
    if (row === null) {
      throw new Error(`Subscription disappeared: ${subscriptionId}`);
    }
    return mapRowToSubscription(row);
  }

  return {
    async getSubscription(subscriptionId: string): Promise<Subscription | null> {
      const row = await fetchHandle(subscriptionId);
      return row === null ? null : mapRowToSubscription(row);
    },

    async createSubscription(params): Promise<Subscription> {
      const { error: recordError } = await supabase
        .from('subscription_records')
        .insert({
          id: params.recordId,
          start_time: params.startTime.toISOString(),
          end_time: params.endTime.toISOString(),
          payment_token: params.paymentToken,
          paid_amount: params.paidAmount.toString(),
          remaining_balance: params.remainingBalance.toString(),
          sponsored_addresses: params.sponsoredAddresses,
          home_chain_id: params.homeChainId,
        });

      if (recordError !== null) {
        throw new Error(
          `Failed to create subscription record: ${recordError.message}`
        );
      }

      const { error: handleError } = await supabase
        .from('subscription_handles')
        .insert({
          id: params.id,
          owner: params.owner,
          record_id: params.recordId,
        });

      if (handleError !== null) {
        throw new Error(
          `Failed to create subscription handle: ${handleError.message}`
        );
      }

      return fetchExisting(params.id);
    },

    async updateRecord(
      subscriptionId: string,
      patch: SubscriptionRecordPatch
    ): Promise<Subscription> {
      const handle = await fetchHandle(subscriptionId);
      if (handle === null) {
        throw new Error(`Subscription not found: ${subscriptionId}`);
      }

      const update: Record<string, unknown> = {
        updated_at: new Date().toISOString(),
      };
      if (patch.endTime !== undefined) {
        update.end_time = patch.endTime.toISOString();
      }
      if (patch.paidAmount !== undefined) {
        update.paid_amount = patch.paidAmount.toString();
      }
      if (patch.remainingBalance !== undefined) {
        update.remaining_balance = patch.remainingBalance.toString();
      }
      if (patch.sponsoredAddresses !== undefined) {
        update.sponsored_addresses = patch.sponsoredAddresses;
      }

      const { error } = await supabase
        .from('subscription_records')
        .update(update)
        .eq('id', handle.record_id);

      if (error !== null) {
        throw new Error(`Failed to update subscription: ${error.message}`);
      }

      return fetchExisting(subscriptionId);
    },

    async updateOwner(
      subscriptionId: string,
      owner: string
    ): Promise<Subscription> {
      const { error } = await supabase
        .from('subscription_handles')
        .update({ owner })
        .eq('id', subscriptionId);

      if (error !== null) {
        throw new Error(`Failed to transfer subscription: ${error.message}`);
      }

      return fetchExisting(subscriptionId);
    },

    async deleteSubscription(subscriptionId: string): Promise<void> {
      const handle = await fetchHandle(subscriptionId);
      if (handle === null) {
        return;
      }

      const { error: handleError } = await supabase
        .from('subscription_handles')
        .delete()
        .eq('id', subscriptionId);

      if (handleError !== null) {
        throw new Error(`Failed to burn subscription: ${handleError.message}`);
      }

      const { error: recordError } = await supabase
        .from('subscription_records')
        .delete()
        .eq('id', handle.record_id);

      if (recordError !== null) {
        throw new Error(
          `Failed to delete subscription record: ${recordError.message}`
        );
      }
    },
  };
}
