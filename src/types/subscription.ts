/**
 * Subscription Domain Types
 *
 * SCOPE: Balance- and time-bounded gas sponsorship entitlements
 *
 * A subscription is addressed by its handle. The handle carries ownership,
 * the record carries the data; transferring the handle never touches the record.
 */

/**
 * Subscription handle - the transferable capability
 */
export interface SubscriptionHandle {
  id: string;
  owner: string;
  recordId: string;
}

/**
 * Subscription data record
 */
export interface SubscriptionRecord {
  id: string;
  startTime: Date;
  endTime: Date;
  paymentToken: string;
  paidAmount: bigint;
  remainingBalance: bigint;
  sponsoredAddresses: string[];
  homeChainId: number;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Subscription entity - handle joined with its record
 */
export interface Subscription {
  id: string;
  owner: string;
  startTime: Date;
  endTime: Date;
  paymentToken: string;
  paidAmount: bigint;
  remainingBalance: bigint;
  sponsoredAddresses: string[];
  homeChainId: number;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Parameters for minting a subscription
 */
export interface MintSubscriptionParams {
  subscriber: string;
  startTime: Date;
  endTime: Date;
  paymentToken: string;
  paidAmount: bigint;
  sponsoredAddresses: string[];
  /** Defaults to the local chain; a different value registers a mirror */
  homeChainId?: number;
  /** Handle id of a mirror; must be the id issued by the home chain */
  subscriptionId?: string;
}

/**
 * Outcome of a capped charge against the balance
 */
export interface ChargeOutcome {
  deducted: bigint;
  shortfall: bigint;
  remainingBalance: bigint;
}

/**
 * A subscription is active iff it has balance left and now lies inside
 * [startTime, endTime], both bounds inclusive.
 */
export function isSubscriptionActive(
  subscription: Pick<Subscription, 'startTime' | 'endTime' | 'remainingBalance'>,
  now: Date
): boolean {
  return (
    subscription.remainingBalance > 0n && isWithinWindow(subscription, now)
  );
}

export function isWithinWindow(
  subscription: Pick<Subscription, 'startTime' | 'endTime'>,
  now: Date
): boolean {
  const t = now.getTime();
  return (
    t >= subscription.startTime.getTime() && t <= subscription.endTime.getTime()
  );
}
