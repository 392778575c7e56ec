/**
 * SponsorshipAuthorizer Implementation
 *
 * SCOPE: Decide whether an operation may be gas-sponsored, and settle it.
 *
 * requested → pre_authorized → settled | rejected | released
 *
 * GUARDRAILS:
 * - Gas is never advanced for a subscription that is unknown, inactive,
 *   or does not sponsor the requester
 * - Settlement charges the actual amount, capped at the remaining balance;
 *   an overrun is recorded as a shortfall, never raised as an error
 * - Usage settled away from the home chain is handed to the reconciler;
 *   settle fails until it is queued, and a repeat settle queues it
 * - Every rejection is returned to the relay, never swallowed
 *
 * Dependencies: SubscriptionLedger, PendingUsageTracker, CrossChainReconciler, AuditService
 */

import { normalizeAddress } from '@/lib/address.js';
import type { KeyedMutex } from '@/lib/keyed-mutex.js';
import type {
  ActorContext,
  Failure,
  FeePolicy,
  PendingReservation,
  PreAuthorization,
  ReconciliationMessage,
  Result,
  SettlementOutcome,
  SettlementReceipt,
  SponsorshipContext,
  SponsorshipRequest,
  Subscription,
} from '@/types/index.js';
import { DEFAULT_FEE_POLICY, failure, hasPermission, success } from '@/types/index.js';

import type { PendingUsageTracker } from './pending-usage.service.js';
import type { SendOptions } from './reconciliation.service.js';
import type { ChangeRecorder } from './service-helpers.js';
import { runSafely } from './service-helpers.js';

/**
 * What the authorizer needs from the ledger
 */
export interface SponsorshipLedger {
  getSubscription: (
    actor: ActorContext,
    subscriptionId: string
  ) => Promise<Result<Subscription>>;
  isActive: (
    actor: ActorContext,
    subscriptionId: string
  ) => Promise<Result<boolean>>;
}

/**
 * What the authorizer needs from the reconciler
 */
export interface SponsorshipReconciler {
  send: (
    actor: ActorContext,
    subscriptionId: string,
    deductedAmount: bigint,
    options?: SendOptions
  ) => Promise<Result<ReconciliationMessage>>;
}

/**
 * SponsorshipAuthorizer interface
 */
export interface SponsorshipAuthorizer {
  preAuthorize(
    actor: ActorContext,
    request: SponsorshipRequest
  ): Promise<Result<PreAuthorization>>;
  resumeContext(
    actor: ActorContext,
    operationId: string
  ): Promise<Result<SponsorshipContext>>;
  settle(
    actor: ActorContext,
    context: SponsorshipContext,
    outcome: SettlementOutcome,
    actualAmount: bigint
  ): Promise<Result<SettlementReceipt>>;
}

export interface SponsorshipAuthorizerDeps {
  ledger: SponsorshipLedger;
  tracker: PendingUsageTracker;
  reconciler: SponsorshipReconciler;
  auditService: ChangeRecorder;
  locks: KeyedMutex;
  /** Chain this node serves; only operations executing here are sponsored */
  chainId: number;
  feePolicy?: FeePolicy;
}

/**
 * Round up to a multiple of the granularity
 */
export function roundUpToGranularity(amount: bigint, granularity: bigint): bigint {
  if (granularity <= 1n) {
    return amount;
  }
  return ((amount + granularity - 1n) / granularity) * granularity;
}

/**
 * Upper-bound reservation for a relay's estimate
 */
export function applyEstimateBuffer(amount: bigint, policy: FeePolicy): bigint {
  const bps = BigInt(policy.estimateBufferBps);
  const buffered = (amount * bps + 9999n) / 10000n;
  return roundUpToGranularity(buffered, policy.feeGranularity);
}

function receiptFromReservation(
  reservation: PendingReservation
): SettlementReceipt {
  if (reservation.state === 'settled') {
    return {
      operationId: reservation.operationId,
      state: 'settled',
      charged: reservation.settledAmount ?? 0n,
      shortfall: reservation.shortfall ?? 0n,
    };
  }
  return {
    operationId: reservation.operationId,
    state: 'released',
    charged: 0n,
    shortfall: 0n,
  };
}

/**
 * Create SponsorshipAuthorizer instance
 */
export function createSponsorshipAuthorizer(
  deps: SponsorshipAuthorizerDeps
): SponsorshipAuthorizer {
  const { ledger, tracker, reconciler, auditService, locks, chainId } = deps;
  const feePolicy = deps.feePolicy ?? DEFAULT_FEE_POLICY;

  function requireAuthorizePermission(actor: ActorContext): Result<void> {
    if (!hasPermission(actor, 'sponsorship:authorize')) {
      return failure(
        'PERMISSION_DENIED',
        'Actor lacks sponsorship:authorize permission'
      );
    }
    return success(undefined);
  }

  async function reject(
    actor: ActorContext,
    request: SponsorshipRequest,
    result: Failure
  ): Promise<Failure> {
    await auditService.log(actor, {
      action: 'sponsorship.rejected',
      resourceType: 'sponsorship',
      resourceId: request.operationId,
      details: {
        subscriptionId: request.subscriptionId,
        requester: request.requester,
        executionChainId: request.executionChainId,
        estimatedAmount: request.estimatedAmount,
        code: result.error.code,
      },
    });
    return result;
  }

  return {
    async preAuthorize(
      actor: ActorContext,
      request: SponsorshipRequest
    ): Promise<Result<PreAuthorization>> {
      const allowed = requireAuthorizePermission(actor);
      if (!allowed.success) {
        return allowed;
      }

      const requester = normalizeAddress(request.requester);
      if (
        request.operationId === '' ||
        requester === null ||
        request.estimatedAmount <= 0n ||
        !Number.isInteger(request.executionChainId) ||
        request.executionChainId <= 0
      ) {
        return reject(
          actor,
          request,
          failure('VALIDATION_ERROR', 'Malformed sponsorship request')
        );
      }
      if (request.executionChainId !== chainId) {
        return reject(
          actor,
          request,
          failure(
            'WRONG_CHAIN',
            `Operation executes on chain ${request.executionChainId}, this is chain ${chainId}`
          )
        );
      }

      return runSafely('preAuthorize', async () => {
        const found = await ledger.getSubscription(actor, request.subscriptionId);
        if (!found.success) {
          return reject(actor, request, found);
        }
        const subscription = found.data;

        if (!subscription.sponsoredAddresses.includes(requester)) {
          return reject(
            actor,
            request,
            failure('NOT_SPONSORED', 'Requester is not sponsored by this subscription', {
              requester,
            })
          );
        }

        const active = await ledger.isActive(actor, request.subscriptionId);
        if (!active.success) {
          return reject(actor, request, active);
        }
        if (!active.data) {
          return reject(
            actor,
            request,
            failure('NOT_ACTIVE', 'Subscription is not active')
          );
        }

        const estimatedAmount = applyEstimateBuffer(
          request.estimatedAmount,
          feePolicy
        );
        const reserved = await tracker.reserve(actor, request.operationId, {
          subscriptionId: request.subscriptionId,
          amount: estimatedAmount,
          executionChainId: request.executionChainId,
          requester,
        });
        if (!reserved.success) {
          return reject(actor, request, reserved);
        }

        const context: SponsorshipContext = {
          operationId: request.operationId,
          reservationId: reserved.data.id,
          subscriptionId: request.subscriptionId,
          executionChainId: request.executionChainId,
          homeChainId: subscription.homeChainId,
          estimatedAmount,
        };

        await auditService.log(actor, {
          action: 'sponsorship.pre_authorized',
          resourceType: 'sponsorship',
          resourceId: request.operationId,
          details: {
            subscriptionId: request.subscriptionId,
            reservationId: reserved.data.id,
            requester,
            executionChainId: request.executionChainId,
            estimatedAmount,
          },
        });

        return success({ context, estimatedAmount });
      });
    },

    async resumeContext(
      actor: ActorContext,
      operationId: string
    ): Promise<Result<SponsorshipContext>> {
      return runSafely('resumeContext', async () => {
        const reservation = await tracker.findByOperation(actor, operationId);
        if (!reservation.success) {
          return reservation;
        }
        const found = await ledger.getSubscription(
          actor,
          reservation.data.subscriptionId
        );
        if (!found.success) {
          return found;
        }
        return success({
          operationId,
          reservationId: reservation.data.id,
          subscriptionId: reservation.data.subscriptionId,
          executionChainId: reservation.data.executionChainId,
          homeChainId: found.data.homeChainId,
          estimatedAmount: reservation.data.reservedAmount,
        });
      });
    },

    async settle(
      actor: ActorContext,
      context: SponsorshipContext,
      outcome: SettlementOutcome,
      actualAmount: bigint
    ): Promise<Result<SettlementReceipt>> {
      const allowed = requireAuthorizePermission(actor);
      if (!allowed.success) {
        return allowed;
      }
      if (actualAmount < 0n) {
        return failure('VALIDATION_ERROR', 'actualAmount must not be negative');
      }

      // Holding the subscription lock across commit and send keeps a
      // repeated settle from reconciling the same usage twice.
      return locks.runExclusive(context.subscriptionId, () =>
        runSafely('settle', async () => {
          const current = await tracker.findByOperation(actor, context.operationId);
          if (!current.success) {
            return current;
          }
          if (current.data.id !== context.reservationId) {
            return failure('NOT_FOUND', 'Reservation does not match the context', {
              operationId: context.operationId,
            });
          }

          if (outcome === 'failed_not_chargeable') {
            const released = await tracker.release(actor, context.reservationId);
            if (!released.success) {
              return released;
            }
            await auditService.log(actor, {
              action: 'sponsorship.released',
              resourceType: 'sponsorship',
              resourceId: context.operationId,
              details: { subscriptionId: context.subscriptionId, outcome },
            });
            return success(receiptFromReservation(released.data));
          }

          let reservation = current.data;
          const fresh = reservation.state !== 'settled';
          const charge = roundUpToGranularity(actualAmount, feePolicy.feeGranularity);
          if (fresh) {
            const committed = await tracker.commit(
              actor,
              context.reservationId,
              charge
            );
            if (!committed.success) {
              return committed;
            }
            reservation = committed.data;
          }
          const receipt = receiptFromReservation(reservation);

          if (fresh && receipt.shortfall > 0n) {
            console.warn(
              `Settlement shortfall of ${receipt.shortfall} on ${context.operationId}`
            );
          }

          let queueFailure: Failure | null = null;
          if (
            context.executionChainId !== context.homeChainId &&
            receipt.charged > 0n
          ) {
            const sent = await reconciler.send(
              actor,
              context.subscriptionId,
              receipt.charged,
              {
                sourceChainId: context.executionChainId,
                reservationId: reservation.id,
              }
            );
            if (sent.success) {
              receipt.reconciliationMessageId = sent.data.messageId;
            } else {
              console.error(
                `Reconciliation for ${context.operationId} not queued: ${sent.error.code} ${sent.error.message}`
              );
              queueFailure = sent;
            }
          }

          if (fresh) {
            await auditService.log(actor, {
              action: 'sponsorship.settled',
              resourceType: 'sponsorship',
              resourceId: context.operationId,
              details: {
                subscriptionId: context.subscriptionId,
                outcome,
                estimatedAmount: context.estimatedAmount,
                actualAmount: charge,
                charged: receipt.charged,
                shortfall: receipt.shortfall,
                reconciliationMessageId: receipt.reconciliationMessageId ?? null,
              },
            });
          }

          // Charged but not queued: the relay retries settle to queue it
          if (queueFailure !== null) {
            return queueFailure;
          }

          return success(receipt);
        })
      );
    },
  };
}
