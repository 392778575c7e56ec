/**
 * Subscription Routes
 * Mint, inspect and manage sponsorship subscriptions
 *
 * Owner checks happen in the ledger; routes only shape requests.
 */

import type { Context } from 'hono';
import { Hono } from 'hono';
import { z } from 'zod';

import type { PendingUsageTracker } from '@/services/pending-usage.service.js';
import type { SubscriptionLedger } from '@/services/subscription-ledger.service.js';
import type { ActorContext } from '@/types/index.js';

import {
  errorResponse,
  readJsonBody,
  successResponse,
  validationErrorResponse,
} from '../utils/response.js';

interface SubscriptionRoutesDeps {
  ledger: SubscriptionLedger;
  tracker: Pick<PendingUsageTracker, 'getAvailable'>;
}

/**
 * Helper to get actor from context
 */
function getActor(c: Context): ActorContext {
  return c.get('actor');
}

/**
 * Helper to get request ID from context
 */
function getRequestId(c: Context): string {
  return c.get('requestId') || getActor(c).requestId;
}

// Zod Schemas
export const amountSchema = z
  .string()
  .regex(/^\d+$/, 'amount must be a non-negative integer string')
  .transform((value) => BigInt(value));

const mintSchema = z.object({
  subscriber: z.string(),
  startTime: z.string().datetime({ offset: true }),
  endTime: z.string().datetime({ offset: true }),
  paymentToken: z.string(),
  paidAmount: amountSchema,
  sponsoredAddresses: z.array(z.string()).default([]),
  homeChainId: z.number().int().positive().optional(),
  subscriptionId: z.string().min(1).optional(),
});

const topUpSchema = z.object({ amount: amountSchema });

const extendSchema = z.object({
  additionalDurationMs: z.number().int().positive(),
});

const setSponsoredSchema = z.object({ addresses: z.array(z.string()) });

const addSponsoredSchema = z.object({ address: z.string() });

const transferSchema = z.object({ newOwner: z.string() });

/**
 * Create subscription routes
 */
export function createSubscriptionRoutes(deps: SubscriptionRoutesDeps): Hono {
  const { ledger, tracker } = deps;
  const app = new Hono();

  /**
   * POST /subscriptions
   * Mint a subscription (relayer)
   */
  app.post('/subscriptions', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const validation = mintSchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(c, validation.error, requestId);
    }
    const body = validation.data;

    const result = await ledger.mint(actor, {
      subscriber: body.subscriber,
      startTime: new Date(body.startTime),
      endTime: new Date(body.endTime),
      paymentToken: body.paymentToken,
      paidAmount: body.paidAmount,
      sponsoredAddresses: body.sponsoredAddresses,
      ...(body.homeChainId !== undefined && { homeChainId: body.homeChainId }),
      ...(body.subscriptionId !== undefined && {
        subscriptionId: body.subscriptionId,
      }),
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId, 201);
  });

  /**
   * GET /subscriptions/:id
   * Subscription record with its activity flag and available balance
   */
  app.get('/subscriptions/:id', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);
    const subscriptionId = c.req.param('id');

    const found = await ledger.getSubscription(actor, subscriptionId);
    if (!found.success) {
      return errorResponse(c, found.error, requestId);
    }

    const active = await ledger.isActive(actor, subscriptionId);
    if (!active.success) {
      return errorResponse(c, active.error, requestId);
    }

    const available = await tracker.getAvailable(actor, subscriptionId);
    if (!available.success) {
      return errorResponse(c, available.error, requestId);
    }

    return successResponse(
      c,
      { ...found.data, isActive: active.data, available: available.data },
      requestId
    );
  });

  /**
   * POST /subscriptions/:id/top-up
   */
  app.post('/subscriptions/:id/top-up', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const validation = topUpSchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(c, validation.error, requestId);
    }

    const result = await ledger.topUp(
      actor,
      c.req.param('id'),
      validation.data.amount
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  /**
   * POST /subscriptions/:id/extend
   */
  app.post('/subscriptions/:id/extend', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const validation = extendSchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(c, validation.error, requestId);
    }

    const result = await ledger.extendWindow(
      actor,
      c.req.param('id'),
      validation.data.additionalDurationMs
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  /**
   * PUT /subscriptions/:id/sponsored-addresses
   * Replace the sponsored set
   */
  app.put('/subscriptions/:id/sponsored-addresses', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const validation = setSponsoredSchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(c, validation.error, requestId);
    }

    const result = await ledger.setSponsoredAddresses(
      actor,
      c.req.param('id'),
      validation.data.addresses
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  /**
   * POST /subscriptions/:id/sponsored-addresses
   */
  app.post('/subscriptions/:id/sponsored-addresses', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const validation = addSponsoredSchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(c, validation.error, requestId);
    }

    const result = await ledger.addSponsored(
      actor,
      c.req.param('id'),
      validation.data.address
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  /**
   * DELETE /subscriptions/:id/sponsored-addresses/:address
   */
  app.delete('/subscriptions/:id/sponsored-addresses/:address', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await ledger.removeSponsored(
      actor,
      c.req.param('id'),
      c.req.param('address')
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  /**
   * POST /subscriptions/:id/transfer
   */
  app.post('/subscriptions/:id/transfer', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const validation = transferSchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(c, validation.error, requestId);
    }

    const result = await ledger.transferOwnership(
      actor,
      c.req.param('id'),
      validation.data.newOwner
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  /**
   * DELETE /subscriptions/:id
   * Burn an inactive subscription
   */
  app.delete('/subscriptions/:id', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);
    const subscriptionId = c.req.param('id');

    const result = await ledger.burn(actor, subscriptionId);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, { id: subscriptionId, burned: true }, requestId);
  });

  return app;
}
