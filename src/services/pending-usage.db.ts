/**
 * PendingUsageTracker Database Adapter
 * Implements PendingUsageDb interface using Supabase
 *
 * State transitions are conditional on state = 'reserved', so concurrent
 * sweep/commit/release calls resolve to one winner. Settling runs in the
 * settle_reservation function so the balance moves in the same transaction.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type {
  PendingReservation,
  ReservationSettlement,
  ReservationState,
} from '@/types/index.js';

import type { PendingUsageDb } from './pending-usage.service.js';

/** Postgres unique_violation */
const UNIQUE_VIOLATION = '23505';

interface ReservationRow {
  id: string;
  operation_id: string;
  subscription_id: string;
  reserved_amount: string;
  execution_chain_id: number;
  requester: string;
  state: ReservationState;
  settled_amount: string | null;
  shortfall: string | null;
  created_at: string;
  finalized_at: string | null;
}

/** Row of settle_reservation(); amounts come back as text */
interface SettlementRow {
  out_deducted: string;
  out_shortfall: string;
  out_remaining_balance: string;
}

const RESERVATION_SELECT = `
  id,
  operation_id,
  subscription_id,
  reserved_amount:reserved_amount::text,
  execution_chain_id,
  requester,
  state,
  settled_amount:settled_amount::text,
  shortfall:shortfall::text,
  created_at,
  finalized_at
`;

function mapRowToReservation(row: ReservationRow): PendingReservation {
  return {
    id: row.id,
    operationId: row.operation_id,
    subscriptionId: row.subscription_id,
    reservedAmount: BigInt(row.reserved_amount),
    executionChainId: Number(row.execution_chain_id),
    requester: row.requester,
    state: row.state,
    settledAmount: row.settled_amount === null ? null : BigInt(row.settled_amount),
    shortfall: row.shortfall === null ? null : BigInt(row.shortfall),
    createdAt: new Date(row.created_at),
    finalizedAt: row.finalized_at === null ? null : new Date(row.finalized_at),
  };
}

/**
 * Create PendingUsageDb implementation using Supabase
 */
export function createPendingUsageDb(supabase: SupabaseClient): PendingUsageDb {
  async function readReservation(
    reservationId: string
  ): Promise<PendingReservation | null> {
    const { data, error } = await supabase
      .from('pending_reservations')
      .select(RESERVATION_SELECT)
      .eq('id', reservationId)
      .maybeSingle<ReservationRow>();

    if (error !== null) {
      throw new Error(`Failed to get reservation: ${error.message}`);
    }

    return data === null ? null : mapRowToReservation(data);
  }

  return {
    getReservation: readReservation,

    async findLiveByOperation(
      operationId: string
    ): Promise<PendingReservation | null> {
      const { data, error } = await supabase
        .from('pending_reservations')
        .select(RESERVATION_SELECT)
        .eq('operation_id', operationId)
        .eq('state', 'reserved')
        .maybeSingle<ReservationRow>();

      if (error !== null) {
        throw new Error(`Failed to find live reservation: ${error.message}`);
      }

      return data === null ? null : mapRowToReservation(data);
    },

    async findLatestByOperation(
      operationId: string
    ): Promise<PendingReservation | null> {
      const { data, error } = await supabase
        .from('pending_reservations')
        .select(RESERVATION_SELECT)
        .eq('operation_id', operationId)
        .order('created_at', { ascending: false })
        .limit(1)
        .maybeSingle<ReservationRow>();

      if (error !== null) {
        throw new Error(`Failed to find reservation: ${error.message}`);
      }

      return data === null ? null : mapRowToReservation(data);
    },

    async sumLiveReserved(subscriptionId: string): Promise<bigint> {
      const { data, error } = await supabase
        .from('pending_reservations')
        .select('reserved_amount:reserved_amount::text')
        .eq('subscription_id', subscriptionId)
        .eq('state', 'reserved')
        .returns<Array<{ reserved_amount: string }>>();

      if (error !== null) {
        throw new Error(`Failed to sum live reservations: ${error.message}`);
      }

      return (data ?? []).reduce(
        (sum, row) => sum + BigInt(row.reserved_amount),
        0n
      );
    },

    async insertReservation(
      reservation: PendingReservation
    ): Promise<PendingReservation | null> {
      const { data, error } = await supabase
        .from('pending_reservations')
        .insert({
          id: reservation.id,
          operation_id: reservation.operationId,
          subscription_id: reservation.subscriptionId,
          reserved_amount: reservation.reservedAmount.toString(),
          execution_chain_id: reservation.executionChainId,
          requester: reservation.requester,
          state: reservation.state,
          created_at: reservation.createdAt.toISOString(),
        })
        .select(RESERVATION_SELECT)
        .single<ReservationRow>();

      if (error !== null) {
        if (error.code === UNIQUE_VIOLATION) {
          return null;
        }
        throw new Error(`Failed to insert reservation: ${error.message}`);
      }

      return mapRowToReservation(data);
    },

    async settleReservation(
      reservationId: string,
      amount: bigint,
      finalizedAt: Date
    ): Promise<ReservationSettlement | null> {
      const { data, error } = await supabase
        .rpc('settle_reservation', {
          p_reservation_id: reservationId,
          p_amount: amount.toString(),
          p_finalized_at: finalizedAt.toISOString(),
        })
        .maybeSingle<SettlementRow>();

      if (error !== null) {
        throw new Error(`Failed to settle reservation: ${error.message}`);
      }
      if (data === null) {
        return null;
      }

      const reservation = await readReservation(reservationId);
      if (reservation === null) {
        throw new Error(`Settled reservation disappeared: ${reservationId}`);
      }

      return {
        reservation,
        charge: {
          deducted: BigInt(data.out_deducted),
          shortfall: BigInt(data.out_shortfall),
          remainingBalance: BigInt(data.out_remaining_balance),
        },
      };
    },

    async releaseReservation(
      reservationId: string,
      finalizedAt: Date
    ): Promise<PendingReservation | null> {
      const { data, error } = await supabase
        .from('pending_reservations')
        .update({ state: 'released', finalized_at: finalizedAt.toISOString() })
        .eq('id', reservationId)
        .eq('state', 'reserved')
        .select(RESERVATION_SELECT)
        .maybeSingle<ReservationRow>();

      if (error !== null) {
        throw new Error(`Failed to release reservation: ${error.message}`);
      }

      return data === null ? null : mapRowToReservation(data);
    },

    async listStaleReserved(createdBefore: Date): Promise<PendingReservation[]> {
      const { data, error } = await supabase
        .from('pending_reservations')
        .select(RESERVATION_SELECT)
        .eq('state', 'reserved')
        .lt('created_at', createdBefore.toISOString())
        .order('created_at', { ascending: true })
        .returns<ReservationRow[]>();

      if (error !== null) {
        throw new Error(`Failed to list stale reservations: ${error.message}`);
      }

      return (data ?? []).map(mapRowToReservation);
    },
  };
}
