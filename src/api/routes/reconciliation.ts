/**
 * Reconciliation Routes
 * Direct delivery of reconciliation messages by a bridge executor
 */

import type { Context } from 'hono';
import { Hono } from 'hono';

import type { CrossChainReconciler } from '@/services/reconciliation.service.js';
import type { ActorContext } from '@/types/index.js';
import {
  decodeReconciliationMessage,
  reconciliationMessageWireSchema,
} from '@/types/index.js';

import {
  errorResponse,
  readJsonBody,
  successResponse,
  validationErrorResponse,
} from '../utils/response.js';

interface ReconciliationRoutesDeps {
  reconciler: Pick<CrossChainReconciler, 'receive'>;
}

/**
 * Helper to get actor from context
 */
function getActor(c: Context): ActorContext {
  return c.get('actor');
}

/**
 * Create reconciliation routes
 */
export function createReconciliationRoutes(deps: ReconciliationRoutesDeps): Hono {
  const { reconciler } = deps;
  const app = new Hono();

  /**
   * POST /reconciliation/messages
   * Apply one message addressed to this chain; redelivery is a no-op
   */
  app.post('/reconciliation/messages', async (c) => {
    const actor = getActor(c);
    const requestId = actor.requestId;

    const validation = reconciliationMessageWireSchema.safeParse(
      await readJsonBody(c)
    );
    if (!validation.success) {
      return validationErrorResponse(c, validation.error, requestId);
    }

    const result = await reconciler.receive(
      actor,
      decodeReconciliationMessage(validation.data)
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  return app;
}
