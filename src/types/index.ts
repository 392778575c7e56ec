/**
 * Core type definitions
 * This file exports all shared types used across the application
 */

export type { Result, Success, Failure, ErrorCode } from './result.js';
export { success, failure, isSuccess, isFailure } from './result.js';
export type { ActorContext } from './auth.js';
export { SYSTEM_ACTOR, RELAYER_PERMISSIONS, hasPermission } from './auth.js';
export type { AuditEvent, AuditLog } from './audit.js';
export type {
  Subscription,
  SubscriptionHandle,
  SubscriptionRecord,
  MintSubscriptionParams,
  ChargeOutcome,
} from './subscription.js';
export { isSubscriptionActive, isWithinWindow } from './subscription.js';
export type {
  PendingReservation,
  ReservationState,
  ReservationSettlement,
  ReserveParams,
  SweepResult,
} from './reservation.js';
export type {
  SponsorshipState,
  SettlementOutcome,
  SponsorshipRequest,
  SponsorshipContext,
  PreAuthorization,
  SettlementReceipt,
  FeePolicy,
} from './sponsorship.js';
export { DEFAULT_FEE_POLICY } from './sponsorship.js';
export type {
  ReconciliationMessage,
  ReconciliationMessageWire,
  OutboxEntry,
  OutboxStatus,
  AppliedMessage,
  MessageApplication,
  ReceiveOutcome,
  FlushResult,
} from './reconciliation.js';
export {
  reconciliationMessageWireSchema,
  encodeReconciliationMessage,
  decodeReconciliationMessage,
} from './reconciliation.js';
