/**
 * Subscription Ownership
 * Capability check for owner-only ledger operations.
 *
 * Deployments that verify ownership elsewhere (an NFT contract, a signature
 * service) supply their own SubscriptionOwnership.
 */

import type { ActorContext, Subscription } from '@/types/index.js';

export interface SubscriptionOwnership {
  canManage(actor: ActorContext, subscription: Subscription): Promise<boolean>;
}

/**
 * Owner of the handle as recorded in the ledger; system actors always pass
 */
export function createHandleOwnership(): SubscriptionOwnership {
  return {
    async canManage(
      actor: ActorContext,
      subscription: Subscription
    ): Promise<boolean> {
      if (actor.type === 'system') {
        return true;
      }
      if (actor.type !== 'subscriber' || actor.address === undefined) {
        return false;
      }
      return actor.address.toLowerCase() === subscription.owner.toLowerCase();
    },
  };
}
