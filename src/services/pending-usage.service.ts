/**
 * PendingUsageTracker Implementation
 *
 * SCOPE: Tentative holds against a subscription's balance between
 * pre-authorization and settlement.
 *
 * GUARDRAILS:
 * - At most one live reservation per operation id
 * - available = remainingBalance − Σ live reservations, computed and
 *   reserved inside one critical section per subscription
 * - reserved → settled | released happens exactly once (compare-and-set);
 *   whoever wins the transition decides the outcome, the rest are no-ops
 * - Settling moves the reservation and deducts the balance in one
 *   database transaction; a retried commit finds it settled
 *
 * Dependencies: SubscriptionLedger, AuditService
 */

import { nanoid } from 'nanoid';

import type { KeyedMutex } from '@/lib/keyed-mutex.js';
import type {
  ActorContext,
  PendingReservation,
  ReservationSettlement,
  ReserveParams,
  Result,
  Subscription,
  SweepResult,
} from '@/types/index.js';
import { failure, hasPermission, success } from '@/types/index.js';

import type { ChangeRecorder } from './service-helpers.js';
import { runSafely } from './service-helpers.js';

/**
 * Database abstraction interface for PendingUsageTracker
 */
export interface PendingUsageDb {
  getReservation: (reservationId: string) => Promise<PendingReservation | null>;
  findLiveByOperation: (
    operationId: string
  ) => Promise<PendingReservation | null>;
  findLatestByOperation: (
    operationId: string
  ) => Promise<PendingReservation | null>;
  sumLiveReserved: (subscriptionId: string) => Promise<bigint>;
  /** Returns null when the operation already has a live reservation */
  insertReservation: (
    reservation: PendingReservation
  ) => Promise<PendingReservation | null>;
  /**
   * In one transaction: compare-and-set 'reserved' → 'settled' and deduct
   * min(amount, remainingBalance). Null when it was no longer reserved.
   */
  settleReservation: (
    reservationId: string,
    amount: bigint,
    finalizedAt: Date
  ) => Promise<ReservationSettlement | null>;
  /** Compare-and-set 'reserved' → 'released'; null when no longer reserved */
  releaseReservation: (
    reservationId: string,
    finalizedAt: Date
  ) => Promise<PendingReservation | null>;
  listStaleReserved: (createdBefore: Date) => Promise<PendingReservation[]>;
}

/**
 * What the tracker needs from the ledger
 */
export interface PendingUsageLedger {
  getSubscription: (
    actor: ActorContext,
    subscriptionId: string
  ) => Promise<Result<Subscription>>;
}

/**
 * PendingUsageTracker interface
 */
export interface PendingUsageTracker {
  reserve(
    actor: ActorContext,
    operationId: string,
    params: ReserveParams
  ): Promise<Result<PendingReservation>>;
  commit(
    actor: ActorContext,
    reservationId: string,
    actualAmount?: bigint
  ): Promise<Result<PendingReservation>>;
  release(
    actor: ActorContext,
    reservationId: string
  ): Promise<Result<PendingReservation>>;
  sweep(actor: ActorContext, maxAgeMs: number): Promise<Result<SweepResult>>;
  getAvailable(
    actor: ActorContext,
    subscriptionId: string
  ): Promise<Result<bigint>>;
  findByOperation(
    actor: ActorContext,
    operationId: string
  ): Promise<Result<PendingReservation>>;
}

export interface PendingUsageTrackerDeps {
  db: PendingUsageDb;
  ledger: PendingUsageLedger;
  auditService: ChangeRecorder;
  locks: KeyedMutex;
  now?: () => Date;
}

/**
 * Create PendingUsageTracker instance
 */
export function createPendingUsageTracker(
  deps: PendingUsageTrackerDeps
): PendingUsageTracker {
  const { db, ledger, auditService, locks } = deps;
  const now = deps.now ?? (() => new Date());

  async function loadReservation(
    reservationId: string
  ): Promise<Result<PendingReservation>> {
    const reservation = await db.getReservation(reservationId);
    if (reservation === null) {
      return failure('NOT_FOUND', `Reservation not found: ${reservationId}`);
    }
    return success(reservation);
  }

  /**
   * Resolve the subscription of a reservation, then run fn under its lock
   * with a freshly read copy of the reservation.
   */
  async function withReservationLock<T>(
    operation: string,
    reservationId: string,
    fn: (reservation: PendingReservation) => Promise<Result<T>>
  ): Promise<Result<T>> {
    return runSafely(operation, async () => {
      const initial = await loadReservation(reservationId);
      if (!initial.success) {
        return initial;
      }
      return locks.runExclusive(initial.data.subscriptionId, () =>
        runSafely(operation, async () => {
          const current = await loadReservation(reservationId);
          if (!current.success) {
            return current;
          }
          return fn(current.data);
        })
      );
    });
  }

  /**
   * Lost CAS: report whatever state won
   */
  async function afterLostTransition(
    reservationId: string,
    wanted: 'settled' | 'released'
  ): Promise<Result<PendingReservation>> {
    const current = await loadReservation(reservationId);
    if (!current.success) {
      return current;
    }
    if (current.data.state === wanted) {
      return current;
    }
    return wanted === 'settled'
      ? failure('ALREADY_RELEASED', 'Reservation was released concurrently')
      : failure('ALREADY_COMMITTED', 'Reservation was settled concurrently');
  }

  return {
    async reserve(
      actor: ActorContext,
      operationId: string,
      params: ReserveParams
    ): Promise<Result<PendingReservation>> {
      if (operationId === '') {
        return failure('VALIDATION_ERROR', 'operationId is required');
      }
      if (params.amount <= 0n) {
        return failure('VALIDATION_ERROR', 'Reservation amount must be positive');
      }

      return locks.runExclusive(params.subscriptionId, () =>
        runSafely('reserve', async () => {
          const live = await db.findLiveByOperation(operationId);
          if (live !== null) {
            return failure(
              'DUPLICATE_OPERATION',
              `Operation already has a live reservation: ${operationId}`,
              { reservationId: live.id }
            );
          }

          const found = await ledger.getSubscription(actor, params.subscriptionId);
          if (!found.success) {
            return found;
          }

          const held = await db.sumLiveReserved(params.subscriptionId);
          const available = found.data.remainingBalance - held;
          if (params.amount > available) {
            return failure(
              'INSUFFICIENT_AVAILABLE',
              'Requested amount exceeds available balance',
              {
                requested: params.amount.toString(),
                available: (available > 0n ? available : 0n).toString(),
              }
            );
          }

          const inserted = await db.insertReservation({
            id: `rsv_${nanoid()}`,
            operationId,
            subscriptionId: params.subscriptionId,
            reservedAmount: params.amount,
            executionChainId: params.executionChainId,
            requester: params.requester,
            state: 'reserved',
            settledAmount: null,
            shortfall: null,
            createdAt: now(),
            finalizedAt: null,
          });
          if (inserted === null) {
            return failure(
              'DUPLICATE_OPERATION',
              `Operation already has a live reservation: ${operationId}`
            );
          }

          await auditService.log(actor, {
            action: 'reservation.created',
            resourceType: 'reservation',
            resourceId: inserted.id,
            details: {
              operationId,
              subscriptionId: params.subscriptionId,
              amount: params.amount,
              availableAfter: available - params.amount,
            },
          });

          return success(inserted);
        })
      );
    },

    async commit(
      actor: ActorContext,
      reservationId: string,
      actualAmount?: bigint
    ): Promise<Result<PendingReservation>> {
      if (!hasPermission(actor, 'subscription:deduct')) {
        return failure(
          'PERMISSION_DENIED',
          'Actor lacks subscription:deduct permission'
        );
      }
      if (actualAmount !== undefined && actualAmount < 0n) {
        return failure('VALIDATION_ERROR', 'actualAmount must not be negative');
      }

      return withReservationLock('commit', reservationId, async (reservation) => {
        if (reservation.state === 'settled') {
          return success(reservation);
        }
        if (reservation.state === 'released') {
          return failure('ALREADY_RELEASED', 'Reservation was already released');
        }

        const settled = await db.settleReservation(
          reservationId,
          actualAmount ?? reservation.reservedAmount,
          now()
        );
        if (settled === null) {
          return afterLostTransition(reservationId, 'settled');
        }
        const { charge } = settled;

        await auditService.log(actor, {
          action: 'reservation.settled',
          resourceType: 'reservation',
          resourceId: reservationId,
          details: {
            operationId: reservation.operationId,
            subscriptionId: reservation.subscriptionId,
            reservedAmount: reservation.reservedAmount,
            settledAmount: charge.deducted,
            shortfall: charge.shortfall,
            remainingBalance: charge.remainingBalance,
          },
        });

        return success(settled.reservation);
      });
    },

    async release(
      actor: ActorContext,
      reservationId: string
    ): Promise<Result<PendingReservation>> {
      return withReservationLock('release', reservationId, async (reservation) => {
        if (reservation.state === 'released') {
          return success(reservation);
        }
        if (reservation.state === 'settled') {
          return failure('ALREADY_COMMITTED', 'Reservation was already settled');
        }

        const released = await db.releaseReservation(reservationId, now());
        if (released === null) {
          return afterLostTransition(reservationId, 'released');
        }

        await auditService.log(actor, {
          action: 'reservation.released',
          resourceType: 'reservation',
          resourceId: reservationId,
          details: {
            operationId: reservation.operationId,
            subscriptionId: reservation.subscriptionId,
            reservedAmount: reservation.reservedAmount,
          },
        });

        return success(released);
      });
    },

    async sweep(
      actor: ActorContext,
      maxAgeMs: number
    ): Promise<Result<SweepResult>> {
      if (maxAgeMs < 0) {
        return failure('VALIDATION_ERROR', 'maxAgeMs must not be negative');
      }

      return runSafely('sweep', async () => {
        const cutoff = new Date(now().getTime() - maxAgeMs);
        const stale = await db.listStaleReserved(cutoff);
        let released = 0;

        for (const reservation of stale) {
          const won = await locks.runExclusive(reservation.subscriptionId, () =>
            db.releaseReservation(reservation.id, now())
          );
          if (won === null) {
            continue;
          }
          released += 1;

          await auditService.log(actor, {
            action: 'reservation.expired',
            resourceType: 'reservation',
            resourceId: reservation.id,
            details: {
              operationId: reservation.operationId,
              subscriptionId: reservation.subscriptionId,
              reservedAmount: reservation.reservedAmount,
              createdAt: reservation.createdAt,
            },
          });
        }

        return success({ released });
      });
    },

    async getAvailable(
      actor: ActorContext,
      subscriptionId: string
    ): Promise<Result<bigint>> {
      return locks.runExclusive(subscriptionId, () =>
        runSafely('getAvailable', async () => {
          const found = await ledger.getSubscription(actor, subscriptionId);
          if (!found.success) {
            return found;
          }
          const held = await db.sumLiveReserved(subscriptionId);
          const available = found.data.remainingBalance - held;
          return success(available > 0n ? available : 0n);
        })
      );
    },

    async findByOperation(
      _actor: ActorContext,
      operationId: string
    ): Promise<Result<PendingReservation>> {
      return runSafely('findByOperation', async () => {
        const reservation = await db.findLatestByOperation(operationId);
        if (reservation === null) {
          return failure(
            'NOT_FOUND',
            `No reservation for operation: ${operationId}`
          );
        }
        return success(reservation);
      });
    },
  };
}
