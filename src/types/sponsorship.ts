/**
 * Sponsorship Types
 * Two-phase authorize / capture around fee advancement
 */

export type SponsorshipState =
  | 'requested'
  | 'pre_authorized'
  | 'settled'
  | 'rejected'
  | 'released';

export type SettlementOutcome =
  | 'succeeded'
  | 'failed_chargeable'
  | 'failed_not_chargeable';

/**
 * What the relay supplies when asking for sponsorship
 */
export interface SponsorshipRequest {
  operationId: string;
  requester: string;
  subscriptionId: string;
  executionChainId: number;
  estimatedAmount: bigint;
}

/**
 * Carried from pre-authorization to settlement
 */
export interface SponsorshipContext {
  operationId: string;
  reservationId: string;
  subscriptionId: string;
  executionChainId: number;
  homeChainId: number;
  estimatedAmount: bigint;
}

export interface PreAuthorization {
  context: SponsorshipContext;
  estimatedAmount: bigint;
}

export interface SettlementReceipt {
  operationId: string;
  state: Extract<SponsorshipState, 'settled' | 'released'>;
  charged: bigint;
  shortfall: bigint;
  reconciliationMessageId?: string;
}

/**
 * Fee accounting knobs
 */
export interface FeePolicy {
  /** Multiplier on the relay's estimate, in basis points (10000 = 1x) */
  estimateBufferBps: number;
  /** Amounts are rounded up to a multiple of this */
  feeGranularity: bigint;
}

export const DEFAULT_FEE_POLICY: FeePolicy = {
  estimateBufferBps: 10000,
  feeGranularity: 1n,
};
