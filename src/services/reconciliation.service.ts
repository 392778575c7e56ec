/**
 * CrossChainReconciler Implementation
 *
 * SCOPE: Keep a subscription's home-chain balance in step with usage
 * settled on other chains.
 *
 * GUARDRAILS:
 * - Outbound messages are written to the outbox before any send attempt
 * - Sending never waits for delivery; the outbox relay retries pending entries
 * - Applying a messageId twice is a no-op; the id is recorded, the balance
 *   deducted and the inbound sequence advanced in one transaction
 * - Usage from a settled reservation is queued at most once
 * - Sequence gaps and reordering are logged, never buffered: the home
 *   balance is eventually consistent, not an ordered log
 * - Applied deductions are capped at the remaining balance
 *
 * Dependencies: SubscriptionLedger, MessageChannel, AuditService
 */

import { keccak256, toBytes } from 'viem';

import type { KeyedMutex } from '@/lib/keyed-mutex.js';
import type {
  ActorContext,
  FlushResult,
  MessageApplication,
  OutboxEntry,
  ReceiveOutcome,
  ReconciliationMessage,
  Result,
  Subscription,
} from '@/types/index.js';
import { failure, hasPermission, success } from '@/types/index.js';

import type { MessageChannel } from './message-channel.js';
import type { ChangeRecorder } from './service-helpers.js';
import { runSafely } from './service-helpers.js';

/**
 * Database abstraction interface for CrossChainReconciler
 */
export interface ReconciliationDb {
  /** One past the highest outbox sequence for (subscription, source chain) */
  nextOutboundSequence: (
    subscriptionId: string,
    sourceChainId: number
  ) => Promise<number>;
  insertOutbox: (
    message: ReconciliationMessage,
    reservationId: string | null
  ) => Promise<void>;
  findOutboxByReservation: (reservationId: string) => Promise<OutboxEntry | null>;
  markSent: (messageId: string, sentAt: Date) => Promise<void>;
  markAttemptFailed: (messageId: string, reason: string) => Promise<void>;
  listPendingOutbox: (limit: number) => Promise<OutboxEntry[]>;
  /**
   * In one transaction: record the messageId, deduct
   * min(deductedAmount, remainingBalance) and raise the inbound sequence.
   * Null when the messageId was already recorded.
   */
  applyMessage: (
    message: ReconciliationMessage,
    appliedAt: Date
  ) => Promise<MessageApplication | null>;
  pruneApplied: (appliedBefore: Date) => Promise<number>;
}

/**
 * What the reconciler needs from the ledger
 */
export interface ReconciliationLedger {
  getSubscription: (
    actor: ActorContext,
    subscriptionId: string
  ) => Promise<Result<Subscription>>;
}

export interface SendOptions {
  /** Chain the usage was settled on; defaults to this node's chain */
  sourceChainId?: number;
  /** Settled reservation behind the usage; a repeat send returns its message */
  reservationId?: string;
}

/**
 * CrossChainReconciler interface
 */
export interface CrossChainReconciler {
  send(
    actor: ActorContext,
    subscriptionId: string,
    deductedAmount: bigint,
    options?: SendOptions
  ): Promise<Result<ReconciliationMessage>>;
  receive(
    actor: ActorContext,
    message: ReconciliationMessage
  ): Promise<Result<ReceiveOutcome>>;
  flushOutbox(actor: ActorContext, limit: number): Promise<Result<FlushResult>>;
  pruneApplied(
    actor: ActorContext,
    maxAgeMs: number
  ): Promise<Result<{ pruned: number }>>;
}

export interface CrossChainReconcilerDeps {
  db: ReconciliationDb;
  ledger: ReconciliationLedger;
  channel: MessageChannel;
  auditService: ChangeRecorder;
  locks: KeyedMutex;
  chainId: number;
  now?: () => Date;
}

/**
 * Deterministic message id: a resend of the same outbox row keeps its id
 */
export function computeMessageId(
  sourceChainId: number,
  subscriptionId: string,
  sequenceNumber: number
): string {
  return keccak256(
    toBytes(`${sourceChainId}:${subscriptionId}:${sequenceNumber}`)
  );
}

/**
 * Create CrossChainReconciler instance
 */
export function createCrossChainReconciler(
  deps: CrossChainReconcilerDeps
): CrossChainReconciler {
  const { db, ledger, channel, auditService, locks, chainId } = deps;
  const now = deps.now ?? (() => new Date());

  /**
   * One delivery attempt; failures stay in the outbox as pending
   */
  async function deliver(message: ReconciliationMessage): Promise<boolean> {
    const sent = await channel.send(message.homeChainId, message);
    if (sent.success) {
      await db.markSent(message.messageId, now());
      return true;
    }
    console.warn(
      `Reconciliation message ${message.messageId} not delivered: ${sent.error.code} ${sent.error.message}`
    );
    await db.markAttemptFailed(message.messageId, sent.error.message);
    return false;
  }

  return {
    async send(
      actor: ActorContext,
      subscriptionId: string,
      deductedAmount: bigint,
      options: SendOptions = {}
    ): Promise<Result<ReconciliationMessage>> {
      const sourceChainId = options.sourceChainId ?? chainId;
      const reservationId = options.reservationId ?? null;
      if (deductedAmount <= 0n) {
        return failure('VALIDATION_ERROR', 'deductedAmount must be positive');
      }

      const queued = await locks.runExclusive(subscriptionId, () =>
        runSafely('reconciliation.send', async () => {
          const found = await ledger.getSubscription(actor, subscriptionId);
          if (!found.success) {
            return found;
          }
          const homeChainId = found.data.homeChainId;
          if (homeChainId === sourceChainId) {
            return failure(
              'VALIDATION_ERROR',
              'Usage on the home chain needs no reconciliation',
              { subscriptionId, homeChainId }
            );
          }

          if (reservationId !== null) {
            const existing = await db.findOutboxByReservation(reservationId);
            if (existing !== null) {
              return success({ message: existing.message, fresh: false });
            }
          }

          const sequenceNumber = await db.nextOutboundSequence(
            subscriptionId,
            sourceChainId
          );
          const message: ReconciliationMessage = {
            messageId: computeMessageId(sourceChainId, subscriptionId, sequenceNumber),
            subscriptionId,
            homeChainId,
            sourceChainId,
            deductedAmount,
            sequenceNumber,
            createdAt: now(),
          };

          await db.insertOutbox(message, reservationId);

          await auditService.log(actor, {
            action: 'reconciliation.queued',
            resourceType: 'reconciliation_message',
            resourceId: message.messageId,
            details: {
              subscriptionId,
              homeChainId,
              sourceChainId,
              deductedAmount,
              sequenceNumber,
              reservationId,
            },
          });

          return success({ message, fresh: true });
        })
      );
      if (!queued.success) {
        return queued;
      }
      const { message, fresh } = queued.data;
      if (!fresh) {
        return success(message);
      }

      // Persisted; a failed hand-off is retried by the outbox relay
      try {
        await deliver(message);
      } catch (err) {
        console.error(
          `Delivery of ${message.messageId} deferred to the outbox relay:`,
          err
        );
      }
      return success(message);
    },

    async receive(
      actor: ActorContext,
      message: ReconciliationMessage
    ): Promise<Result<ReceiveOutcome>> {
      if (!hasPermission(actor, 'reconciliation:deliver')) {
        return failure(
          'PERMISSION_DENIED',
          'Actor lacks reconciliation:deliver permission'
        );
      }
      if (message.homeChainId !== chainId) {
        return failure(
          'WRONG_CHAIN',
          `Message is addressed to chain ${message.homeChainId}, this is chain ${chainId}`,
          { messageId: message.messageId }
        );
      }
      if (message.deductedAmount < 0n) {
        return failure('VALIDATION_ERROR', 'deductedAmount must not be negative');
      }

      return locks.runExclusive(message.subscriptionId, () =>
        runSafely<ReceiveOutcome>('reconciliation.receive', async () => {
          const found = await ledger.getSubscription(actor, message.subscriptionId);
          if (!found.success) {
            return found;
          }

          const application = await db.applyMessage(message, now());
          if (application === null) {
            console.warn(
              `DUPLICATE_MESSAGE ${message.messageId} for ${message.subscriptionId} ignored`
            );
            return success({
              messageId: message.messageId,
              applied: false,
              duplicate: true,
              appliedAmount: 0n,
              shortfall: 0n,
              gap: null,
            });
          }
          const { charge, previousSequence } = application;

          const expected = (previousSequence ?? 0) + 1;
          const gap =
            message.sequenceNumber === expected
              ? null
              : { expected, received: message.sequenceNumber };
          if (gap !== null) {
            console.warn(
              `Sequence gap for ${message.subscriptionId} from chain ${message.sourceChainId}: expected ${gap.expected}, received ${gap.received}`
            );
          }

          await auditService.log(actor, {
            action: 'reconciliation.applied',
            resourceType: 'reconciliation_message',
            resourceId: message.messageId,
            details: {
              subscriptionId: message.subscriptionId,
              sourceChainId: message.sourceChainId,
              sequenceNumber: message.sequenceNumber,
              deductedAmount: message.deductedAmount,
              appliedAmount: charge.deducted,
              shortfall: charge.shortfall,
              gap,
            },
          });

          return success({
            messageId: message.messageId,
            applied: true,
            duplicate: false,
            appliedAmount: charge.deducted,
            shortfall: charge.shortfall,
            gap,
          });
        })
      );
    },

    async flushOutbox(
      _actor: ActorContext,
      limit: number
    ): Promise<Result<FlushResult>> {
      return runSafely('reconciliation.flushOutbox', async () => {
        const pending = await db.listPendingOutbox(limit);
        let sent = 0;
        let failed = 0;
        for (const entry of pending) {
          if (await deliver(entry.message)) {
            sent += 1;
          } else {
            failed += 1;
          }
        }
        return success({ sent, failed });
      });
    },

    async pruneApplied(
      actor: ActorContext,
      maxAgeMs: number
    ): Promise<Result<{ pruned: number }>> {
      if (maxAgeMs < 0) {
        return failure('VALIDATION_ERROR', 'maxAgeMs must not be negative');
      }
      return runSafely('reconciliation.pruneApplied', async () => {
        const cutoff = new Date(now().getTime() - maxAgeMs);
        const pruned = await db.pruneApplied(cutoff);
        if (pruned > 0) {
          await auditService.log(actor, {
            action: 'reconciliation.pruned',
            resourceType: 'applied_messages',
            details: { pruned, appliedBefore: cutoff },
          });
        }
        return success({ pruned });
      });
    },
  };
}
