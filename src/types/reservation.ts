/**
 * Pending Reservation Types
 *
 * Lifecycle: reserved → settled | released, exactly once.
 */

import type { ChargeOutcome } from './subscription.js';

export type ReservationState = 'reserved' | 'settled' | 'released';

export interface PendingReservation {
  id: string;
  operationId: string;
  subscriptionId: string;
  reservedAmount: bigint;
  executionChainId: number;
  requester: string;
  state: ReservationState;
  /** Amount actually deducted at commit */
  settledAmount: bigint | null;
  /** Charge that exceeded the balance at commit and was not deducted */
  shortfall: bigint | null;
  createdAt: Date;
  finalizedAt: Date | null;
}

export interface ReserveParams {
  subscriptionId: string;
  amount: bigint;
  executionChainId: number;
  requester: string;
}

export interface SweepResult {
  released: number;
}

/**
 * A reservation moved to 'settled' together with the charge it made
 */
export interface ReservationSettlement {
  reservation: PendingReservation;
  charge: ChargeOutcome;
}
