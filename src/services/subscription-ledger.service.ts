/**
 * SubscriptionLedger Implementation
 *
 * SCOPE: Subscription records - balance, validity window, sponsored addresses
 *
 * GUARDRAILS:
 * - remainingBalance never goes negative
 * - Mutations of one subscription are serialized through the keyed mutex
 * - Owner-only operations go through the SubscriptionOwnership capability
 * - Burn never succeeds on an active subscription
 *
 * Dependencies: AuditService
 */

import { nanoid } from 'nanoid';

import { normalizeAddress, normalizeAddressList } from '@/lib/address.js';
import type { KeyedMutex } from '@/lib/keyed-mutex.js';
import type {
  ActorContext,
  ChargeOutcome,
  MintSubscriptionParams,
  Result,
  Subscription,
} from '@/types/index.js';
import {
  failure,
  hasPermission,
  isSubscriptionActive,
  isWithinWindow,
  success,
} from '@/types/index.js';

import type { SubscriptionOwnership } from './ownership.js';
import type { ChangeRecorder } from './service-helpers.js';
import { runSafely } from './service-helpers.js';

/**
 * Fields of the data record that mutations may change
 */
export interface SubscriptionRecordPatch {
  endTime?: Date;
  paidAmount?: bigint;
  remainingBalance?: bigint;
  sponsoredAddresses?: string[];
}

/**
 * Database abstraction interface for SubscriptionLedger
 * The adapter owns the handle → record indirection.
 */
export interface SubscriptionLedgerDb {
  getSubscription: (subscriptionId: string) => Promise<Subscription | null>;
  createSubscription: (params: {
    id: string;
    recordId: string;
    owner: string;
    startTime: Date;
    endTime: Date;
    paymentToken: string;
    paidAmount: bigint;
    remainingBalance: bigint;
    sponsoredAddresses: string[];
    homeChainId: number;
  }) => Promise<Subscription>;
  updateRecord: (
    subscriptionId: string,
    patch: SubscriptionRecordPatch
  ) => Promise<Subscription>;
  updateOwner: (subscriptionId: string, owner: string) => Promise<Subscription>;
  deleteSubscription: (subscriptionId: string) => Promise<void>;
}

/**
 * SubscriptionLedger interface
 */
export interface SubscriptionLedger {
  mint(
    actor: ActorContext,
    params: MintSubscriptionParams
  ): Promise<Result<Subscription>>;
  getSubscription(
    actor: ActorContext,
    subscriptionId: string
  ): Promise<Result<Subscription>>;
  isActive(actor: ActorContext, subscriptionId: string): Promise<Result<boolean>>;
  deduct(
    actor: ActorContext,
    subscriptionId: string,
    amount: bigint
  ): Promise<Result<Subscription>>;
  settleCharge(
    actor: ActorContext,
    subscriptionId: string,
    amount: bigint
  ): Promise<Result<ChargeOutcome>>;
  topUp(
    actor: ActorContext,
    subscriptionId: string,
    amount: bigint
  ): Promise<Result<Subscription>>;
  extendWindow(
    actor: ActorContext,
    subscriptionId: string,
    additionalDurationMs: number
  ): Promise<Result<Subscription>>;
  setSponsoredAddresses(
    actor: ActorContext,
    subscriptionId: string,
    addresses: string[]
  ): Promise<Result<Subscription>>;
  addSponsored(
    actor: ActorContext,
    subscriptionId: string,
    address: string
  ): Promise<Result<Subscription>>;
  removeSponsored(
    actor: ActorContext,
    subscriptionId: string,
    address: string
  ): Promise<Result<Subscription>>;
  transferOwnership(
    actor: ActorContext,
    subscriptionId: string,
    newOwner: string
  ): Promise<Result<Subscription>>;
  burn(actor: ActorContext, subscriptionId: string): Promise<Result<void>>;
}

export interface SubscriptionLedgerDeps {
  db: SubscriptionLedgerDb;
  auditService: ChangeRecorder;
  ownership: SubscriptionOwnership;
  locks: KeyedMutex;
  /** Chain this node serves; default home chain for new subscriptions */
  chainId: number;
  now?: () => Date;
}

/**
 * Create SubscriptionLedger instance
 */
export function createSubscriptionLedger(
  deps: SubscriptionLedgerDeps
): SubscriptionLedger {
  const { db, auditService, ownership, locks, chainId } = deps;
  const now = deps.now ?? (() => new Date());

  // ─────────────────────────────────────────────────────────────
  // HELPER FUNCTIONS
  // ─────────────────────────────────────────────────────────────

  async function load(subscriptionId: string): Promise<Result<Subscription>> {
    const subscription = await db.getSubscription(subscriptionId);
    if (subscription === null) {
      return failure('NOT_FOUND', `Subscription not found: ${subscriptionId}`);
    }
    return success(subscription);
  }

  async function loadManageable(
    actor: ActorContext,
    subscriptionId: string
  ): Promise<Result<Subscription>> {
    const found = await load(subscriptionId);
    if (!found.success) {
      return found;
    }
    if (!(await ownership.canManage(actor, found.data))) {
      return failure(
        'PERMISSION_DENIED',
        'Only the subscription owner can perform this operation'
      );
    }
    return found;
  }

  /**
   * Serialized, exception-safe body for one subscription
   */
  function exclusive<T>(
    operation: string,
    subscriptionId: string,
    fn: () => Promise<Result<T>>
  ): Promise<Result<T>> {
    return locks.runExclusive(subscriptionId, () => runSafely(operation, fn));
  }

  function requireDeductPermission(actor: ActorContext): Result<void> {
    if (!hasPermission(actor, 'subscription:deduct')) {
      return failure(
        'PERMISSION_DENIED',
        'Actor lacks subscription:deduct permission'
      );
    }
    return success(undefined);
  }

  // ─────────────────────────────────────────────────────────────
  // SERVICE IMPLEMENTATION
  // ─────────────────────────────────────────────────────────────

  return {
    async mint(
      actor: ActorContext,
      params: MintSubscriptionParams
    ): Promise<Result<Subscription>> {
      if (!hasPermission(actor, 'subscription:mint')) {
        return failure(
          'PERMISSION_DENIED',
          'Actor lacks subscription:mint permission'
        );
      }

      if (params.startTime.getTime() >= params.endTime.getTime()) {
        return failure('INVALID_WINDOW', 'startTime must be before endTime', {
          startTime: params.startTime.toISOString(),
          endTime: params.endTime.toISOString(),
        });
      }
      if (params.paidAmount < 0n) {
        return failure('VALIDATION_ERROR', 'paidAmount must not be negative');
      }

      const owner = normalizeAddress(params.subscriber);
      const paymentToken = normalizeAddress(params.paymentToken);
      const sponsored = normalizeAddressList(params.sponsoredAddresses);
      if (owner === null || paymentToken === null || sponsored === null) {
        return failure('VALIDATION_ERROR', 'Invalid address in mint request');
      }

      const homeChainId = params.homeChainId ?? chainId;
      if (!Number.isInteger(homeChainId) || homeChainId <= 0) {
        return failure('VALIDATION_ERROR', 'homeChainId must be a positive integer');
      }

      const isMirror = homeChainId !== chainId;
      if (params.subscriptionId !== undefined && !isMirror) {
        return failure(
          'VALIDATION_ERROR',
          'Only mirrors of another chain take an explicit subscriptionId'
        );
      }
      if (isMirror && params.subscriptionId === undefined) {
        return failure(
          'VALIDATION_ERROR',
          'A mirror needs the subscriptionId issued by its home chain'
        );
      }

      return runSafely('mint', async () => {
        const id = params.subscriptionId ?? `sub_${nanoid()}`;
        if (isMirror && (await db.getSubscription(id)) !== null) {
          return failure('VALIDATION_ERROR', `Subscription already exists: ${id}`);
        }

        const subscription = await db.createSubscription({
          id,
          recordId: `rec_${nanoid()}`,
          owner,
          startTime: params.startTime,
          endTime: params.endTime,
          paymentToken,
          paidAmount: params.paidAmount,
          remainingBalance: params.paidAmount,
          sponsoredAddresses: sponsored,
          homeChainId,
        });

        await auditService.log(actor, {
          action: 'subscription.minted',
          resourceType: 'subscription',
          resourceId: subscription.id,
          details: {
            owner,
            paidAmount: subscription.paidAmount,
            startTime: subscription.startTime,
            endTime: subscription.endTime,
            homeChainId,
            mirror: isMirror,
          },
        });

        return success(subscription);
      });
    },

    async getSubscription(
      _actor: ActorContext,
      subscriptionId: string
    ): Promise<Result<Subscription>> {
      return runSafely('getSubscription', () => load(subscriptionId));
    },

    async isActive(
      _actor: ActorContext,
      subscriptionId: string
    ): Promise<Result<boolean>> {
      return runSafely('isActive', async () => {
        const found = await load(subscriptionId);
        if (!found.success) {
          return found;
        }
        return success(isSubscriptionActive(found.data, now()));
      });
    },

    async deduct(
      actor: ActorContext,
      subscriptionId: string,
      amount: bigint
    ): Promise<Result<Subscription>> {
      const allowed = requireDeductPermission(actor);
      if (!allowed.success) {
        return allowed;
      }
      if (amount < 0n) {
        return failure('VALIDATION_ERROR', 'amount must not be negative');
      }

      return exclusive('deduct', subscriptionId, async () => {
        const found = await load(subscriptionId);
        if (!found.success) {
          return found;
        }
        const subscription = found.data;

        // Window first, then balance: a deduction may exhaust the balance
        if (!isWithinWindow(subscription, now())) {
          return failure('NOT_ACTIVE', 'Subscription window is not open', {
            startTime: subscription.startTime.toISOString(),
            endTime: subscription.endTime.toISOString(),
          });
        }
        if (amount > subscription.remainingBalance) {
          return failure('INSUFFICIENT_BALANCE', 'Amount exceeds remaining balance', {
            requested: amount.toString(),
            remainingBalance: subscription.remainingBalance.toString(),
          });
        }

        const updated = await db.updateRecord(subscriptionId, {
          remainingBalance: subscription.remainingBalance - amount,
        });

        await auditService.log(actor, {
          action: 'subscription.deducted',
          resourceType: 'subscription',
          resourceId: subscriptionId,
          details: { amount, remainingBalance: updated.remainingBalance },
        });

        return success(updated);
      });
    },

    async settleCharge(
      actor: ActorContext,
      subscriptionId: string,
      amount: bigint
    ): Promise<Result<ChargeOutcome>> {
      const allowed = requireDeductPermission(actor);
      if (!allowed.success) {
        return allowed;
      }
      if (amount < 0n) {
        return failure('VALIDATION_ERROR', 'amount must not be negative');
      }

      return exclusive('settleCharge', subscriptionId, async () => {
        const found = await load(subscriptionId);
        if (!found.success) {
          return found;
        }
        const subscription = found.data;

        const deducted =
          amount > subscription.remainingBalance
            ? subscription.remainingBalance
            : amount;
        const shortfall = amount - deducted;

        let remainingBalance = subscription.remainingBalance;
        if (deducted > 0n) {
          const updated = await db.updateRecord(subscriptionId, {
            remainingBalance: subscription.remainingBalance - deducted,
          });
          remainingBalance = updated.remainingBalance;
        }

        await auditService.log(actor, {
          action: 'subscription.charged',
          resourceType: 'subscription',
          resourceId: subscriptionId,
          details: { requested: amount, deducted, shortfall, remainingBalance },
        });

        return success({ deducted, shortfall, remainingBalance });
      });
    },

    async topUp(
      actor: ActorContext,
      subscriptionId: string,
      amount: bigint
    ): Promise<Result<Subscription>> {
      if (amount <= 0n) {
        return failure('VALIDATION_ERROR', 'Top-up amount must be positive');
      }

      return exclusive('topUp', subscriptionId, async () => {
        const found = await loadManageable(actor, subscriptionId);
        if (!found.success) {
          return found;
        }
        const subscription = found.data;

        const updated = await db.updateRecord(subscriptionId, {
          paidAmount: subscription.paidAmount + amount,
          remainingBalance: subscription.remainingBalance + amount,
        });

        await auditService.log(actor, {
          action: 'subscription.topped_up',
          resourceType: 'subscription',
          resourceId: subscriptionId,
          details: {
            amount,
            paidAmount: updated.paidAmount,
            remainingBalance: updated.remainingBalance,
          },
        });

        return success(updated);
      });
    },

    async extendWindow(
      actor: ActorContext,
      subscriptionId: string,
      additionalDurationMs: number
    ): Promise<Result<Subscription>> {
      if (!Number.isInteger(additionalDurationMs) || additionalDurationMs <= 0) {
        return failure(
          'VALIDATION_ERROR',
          'additionalDurationMs must be a positive integer'
        );
      }

      return exclusive('extendWindow', subscriptionId, async () => {
        const found = await loadManageable(actor, subscriptionId);
        if (!found.success) {
          return found;
        }

        const endTime = new Date(
          found.data.endTime.getTime() + additionalDurationMs
        );
        const updated = await db.updateRecord(subscriptionId, { endTime });

        await auditService.log(actor, {
          action: 'subscription.extended',
          resourceType: 'subscription',
          resourceId: subscriptionId,
          details: {
            previousEndTime: found.data.endTime,
            endTime,
          },
        });

        return success(updated);
      });
    },

    async setSponsoredAddresses(
      actor: ActorContext,
      subscriptionId: string,
      addresses: string[]
    ): Promise<Result<Subscription>> {
      const sponsored = normalizeAddressList(addresses);
      if (sponsored === null) {
        return failure('VALIDATION_ERROR', 'Invalid sponsored address');
      }

      return exclusive('setSponsoredAddresses', subscriptionId, async () => {
        const found = await loadManageable(actor, subscriptionId);
        if (!found.success) {
          return found;
        }

        const updated = await db.updateRecord(subscriptionId, {
          sponsoredAddresses: sponsored,
        });

        await auditService.log(actor, {
          action: 'subscription.sponsored_set',
          resourceType: 'subscription',
          resourceId: subscriptionId,
          details: { sponsoredAddresses: sponsored },
        });

        return success(updated);
      });
    },

    async addSponsored(
      actor: ActorContext,
      subscriptionId: string,
      address: string
    ): Promise<Result<Subscription>> {
      const normalized = normalizeAddress(address);
      if (normalized === null) {
        return failure('VALIDATION_ERROR', `Invalid address: ${address}`);
      }

      return exclusive('addSponsored', subscriptionId, async () => {
        const found = await loadManageable(actor, subscriptionId);
        if (!found.success) {
          return found;
        }
        if (found.data.sponsoredAddresses.includes(normalized)) {
          return found;
        }

        const updated = await db.updateRecord(subscriptionId, {
          sponsoredAddresses: [...found.data.sponsoredAddresses, normalized],
        });

        await auditService.log(actor, {
          action: 'subscription.sponsored_added',
          resourceType: 'subscription',
          resourceId: subscriptionId,
          details: { address: normalized },
        });

        return success(updated);
      });
    },

    async removeSponsored(
      actor: ActorContext,
      subscriptionId: string,
      address: string
    ): Promise<Result<Subscription>> {
      const normalized = normalizeAddress(address);
      if (normalized === null) {
        return failure('VALIDATION_ERROR', `Invalid address: ${address}`);
      }

      return exclusive('removeSponsored', subscriptionId, async () => {
        const found = await loadManageable(actor, subscriptionId);
        if (!found.success) {
          return found;
        }
        if (!found.data.sponsoredAddresses.includes(normalized)) {
          return failure('NOT_FOUND', `Address is not sponsored: ${normalized}`);
        }

        const updated = await db.updateRecord(subscriptionId, {
          sponsoredAddresses: found.data.sponsoredAddresses.filter(
            (a) => a !== normalized
          ),
        });

        await auditService.log(actor, {
          action: 'subscription.sponsored_removed',
          resourceType: 'subscription',
          resourceId: subscriptionId,
          details: { address: normalized },
        });

        return success(updated);
      });
    },

    async transferOwnership(
      actor: ActorContext,
      subscriptionId: string,
      newOwner: string
    ): Promise<Result<Subscription>> {
      const normalized = normalizeAddress(newOwner);
      if (normalized === null) {
        return failure('VALIDATION_ERROR', `Invalid address: ${newOwner}`);
      }

      return exclusive('transferOwnership', subscriptionId, async () => {
        const found = await loadManageable(actor, subscriptionId);
        if (!found.success) {
          return found;
        }

        const updated = await db.updateOwner(subscriptionId, normalized);

        await auditService.log(actor, {
          action: 'subscription.transferred',
          resourceType: 'subscription',
          resourceId: subscriptionId,
          details: { from: found.data.owner, to: normalized },
        });

        return success(updated);
      });
    },

    async burn(
      actor: ActorContext,
      subscriptionId: string
    ): Promise<Result<void>> {
      return exclusive('burn', subscriptionId, async () => {
        const found = await loadManageable(actor, subscriptionId);
        if (!found.success) {
          return found;
        }
        if (isSubscriptionActive(found.data, now())) {
          return failure('STILL_ACTIVE', 'Cannot burn an active subscription', {
            remainingBalance: found.data.remainingBalance.toString(),
            endTime: found.data.endTime.toISOString(),
          });
        }

        await db.deleteSubscription(subscriptionId);

        await auditService.log(actor, {
          action: 'subscription.burned',
          resourceType: 'subscription',
          resourceId: subscriptionId,
          details: { owner: found.data.owner },
        });

        return success(undefined);
      });
    },
  };
}
