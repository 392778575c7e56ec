/**
 * Sponsorship Routes
 * Pre-authorization and settlement for relays
 */

import type { Context } from 'hono';
import { Hono } from 'hono';
import { z } from 'zod';

import type { SponsorshipAuthorizer } from '@/services/sponsorship.service.js';
import type { ActorContext } from '@/types/index.js';

import {
  errorResponse,
  readJsonBody,
  successResponse,
  validationErrorResponse,
} from '../utils/response.js';

import { amountSchema } from './subscriptions.js';

interface SponsorshipRoutesDeps {
  authorizer: SponsorshipAuthorizer;
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
const preAuthorizeSchema = z.object({
  operationId: z.string().min(1),
  requester: z.string(),
  subscriptionId: z.string().min(1),
  executionChainId: z.number().int().positive(),
  estimatedAmount: amountSchema,
});

const settleSchema = z.object({
  outcome: z.enum(['succeeded', 'failed_chargeable', 'failed_not_chargeable']),
  actualAmount: amountSchema.default('0'),
});

/**
 * Create sponsorship routes
 */
export function createSponsorshipRoutes(deps: SponsorshipRoutesDeps): Hono {
  const { authorizer } = deps;
  const app = new Hono();

  /**
   * POST /sponsorship/pre-authorize
   * Reserve the estimated fee for an operation
   */
  app.post('/sponsorship/pre-authorize', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const validation = preAuthorizeSchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(c, validation.error, requestId);
    }

    const result = await authorizer.preAuthorize(actor, validation.data);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId, 201);
  });

  /**
   * POST /sponsorship/:operationId/settle
   * Report the outcome and actual fee of a pre-authorized operation
   */
  app.post('/sponsorship/:operationId/settle', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const validation = settleSchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(c, validation.error, requestId);
    }

    const context = await authorizer.resumeContext(
      actor,
      c.req.param('operationId')
    );
    if (!context.success) {
      return errorResponse(c, context.error, requestId);
    }

    const result = await authorizer.settle(
      actor,
      context.data,
      validation.data.outcome,
      validation.data.actualAmount
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  return app;
}
