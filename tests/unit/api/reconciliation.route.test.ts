/**
 * Reconciliation Routes Unit Tests
 */

import type { Hono } from 'hono';
import { describe, it, expect, beforeEach, vi } from 'vitest';

import { computeMessageId } from '@/services/reconciliation.service.js';
import type { ReconciliationMessageWire, Subscription } from '@/types/index.js';

import {
  asBearer,
  asRelayer,
  createTestApp,
  OWNER_TOKEN,
  send,
} from '../../helpers/api-utils.js';
import type { TestEngine } from '../../helpers/test-utils.js';
import {
  createTestEngine,
  HOME_CHAIN,
  mintOrThrow,
  REMOTE_CHAIN,
} from '../../helpers/test-utils.js';

describe('Reconciliation Routes', () => {
  let engine: TestEngine;
  let app: Hono;
  let subscription: Subscription;

  const wire = (overrides?: Partial<ReconciliationMessageWire>): ReconciliationMessageWire => ({
    messageId: computeMessageId(REMOTE_CHAIN, subscription.id, 1),
    subscriptionId: subscription.id,
    homeChainId: HOME_CHAIN,
    sourceChainId: REMOTE_CHAIN,
    deductedAmount: '20',
    sequenceNumber: 1,
    createdAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  });

  const deliver = (body: unknown, headers = asRelayer()): Promise<Response> =>
    send(app, 'POST', '/api/v1/reconciliation/messages', headers, body);

  beforeEach(async () => {
    engine = createTestEngine();
    app = createTestApp(engine);
    subscription = await mintOrThrow(engine, { paidAmount: 50n });
  });

  describe('POST /reconciliation/messages', () => {
    it('should apply a delivered message', async () => {
      const res = await deliver(wire());

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: {
          messageId: wire().messageId,
          applied: true,
          duplicate: false,
          appliedAmount: '20',
          shortfall: '0',
          gap: null,
        },
      });
    });

    it('should acknowledge a redelivery without applying it again', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      await deliver(wire());

      const res = await deliver(wire());

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: { applied: false, duplicate: true, appliedAmount: '0' },
      });
      expect(engine.db.reconciliation.applied()).toHaveLength(1);
    });

    it('should reject a malformed message id', async () => {
      const res = await deliver(wire({ messageId: '0x12' }));

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: { code: 'VALIDATION_ERROR' } });
    });

    it('should reject a numeric amount', async () => {
      const res = await deliver({ ...wire(), deductedAmount: 20 });

      expect(res.status).toBe(400);
    });

    it('should refuse a message for another home chain', async () => {
      const res = await deliver(wire({ homeChainId: REMOTE_CHAIN }));

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: { code: 'WRONG_CHAIN' } });
    });

    it('should return 404 for an unknown subscription', async () => {
      const res = await deliver(wire({ subscriptionId: 'sub_missing' }));

      expect(res.status).toBe(404);
    });

    it('should refuse a subscriber token', async () => {
      const res = await deliver(wire(), asBearer(OWNER_TOKEN));

      expect(res.status).toBe(403);
      expect(await res.json()).toMatchObject({ error: { code: 'PERMISSION_DENIED' } });
    });

    it('should require authentication', async () => {
      const res = await deliver(wire(), { 'Content-Type': 'application/json' });

      expect(res.status).toBe(401);
    });
  });
});
