/**
 * PendingUsageTracker Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import type { ReserveParams, Subscription } from '@/types/index.js';

import type { TestEngine } from '../../helpers/test-utils.js';
import {
  createRelayerActor,
  createSystemActor,
  createTestEngine,
  HOME_CHAIN,
  HOUR,
  mintOrThrow,
  SPONSORED_A,
} from '../../helpers/test-utils.js';

describe('PendingUsageTracker', () => {
  let engine: TestEngine;
  let subscription: Subscription;
  const relayer = createRelayerActor();

  const params = (amount: bigint): ReserveParams => ({
    subscriptionId: subscription.id,
    amount,
    executionChainId: HOME_CHAIN,
    requester: SPONSORED_A,
  });

  const available = async (): Promise<bigint | undefined> => {
    const result = await engine.tracker.getAvailable(relayer, subscription.id);
    return result.success ? result.data : undefined;
  };

  const balance = async (): Promise<bigint | undefined> => {
    const result = await engine.ledger.getSubscription(relayer, subscription.id);
    return result.success ? result.data.remainingBalance : undefined;
  };

  beforeEach(async () => {
    engine = createTestEngine();
    subscription = await mintOrThrow(engine);
  });

  describe('reserve', () => {
    it('should hold the amount against the available balance', async () => {
      const result = await engine.tracker.reserve(relayer, 'op_1', params(300n));

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data).toMatchObject({
        operationId: 'op_1',
        subscriptionId: subscription.id,
        reservedAmount: 300n,
        state: 'reserved',
        settledAmount: null,
      });
      expect(await available()).toBe(700n);
      expect(await balance()).toBe(1000n);
    });

    it('should refuse a second live reservation for the operation', async () => {
      await engine.tracker.reserve(relayer, 'op_1', params(100n));

      const result = await engine.tracker.reserve(relayer, 'op_1', params(100n));

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('DUPLICATE_OPERATION');
      expect(await available()).toBe(900n);
    });

    it('should refuse more than is available', async () => {
      await engine.tracker.reserve(relayer, 'op_1', params(600n));

      const result = await engine.tracker.reserve(relayer, 'op_2', params(500n));

      expect(result).toEqual({
        success: false,
        error: {
          code: 'INSUFFICIENT_AVAILABLE',
          message: 'Requested amount exceeds available balance',
          details: { requested: '500', available: '400' },
        },
      });
    });

    it('should fail for an unknown subscription', async () => {
      const result = await engine.tracker.reserve(relayer, 'op_1', {
        ...params(1n),
        subscriptionId: 'sub_missing',
      });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('NOT_FOUND');
    });

    it('should reject a non-positive amount', async () => {
      const result = await engine.tracker.reserve(relayer, 'op_1', params(0n));

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('VALIDATION_ERROR');
    });

    it('should never over-commit under concurrent reservations', async () => {
      const results = await Promise.all(
        Array.from({ length: 10 }, (_, i) =>
          engine.tracker.reserve(relayer, `op_${i}`, params(150n))
        )
      );

      const granted = results.filter((r) => r.success);
      const refused = results.filter(
        (r) => !r.success && r.error.code === 'INSUFFICIENT_AVAILABLE'
      );
      expect(granted).toHaveLength(6);
      expect(refused).toHaveLength(4);
      expect(await available()).toBe(100n);
    });
  });

  describe('commit', () => {
    it('should deduct the reserved amount by default', async () => {
      const reserved = await engine.tracker.reserve(relayer, 'op_1', params(300n));
      if (!reserved.success) throw new Error('reserve failed');

      const result = await engine.tracker.commit(relayer, reserved.data.id);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data).toMatchObject({
        state: 'settled',
        settledAmount: 300n,
        shortfall: 0n,
      });
      expect(await balance()).toBe(700n);
      expect(await available()).toBe(700n);
    });

    it('should deduct the actual amount and free the rest', async () => {
      const reserved = await engine.tracker.reserve(relayer, 'op_1', params(300n));
      if (!reserved.success) throw new Error('reserve failed');

      await engine.tracker.commit(relayer, reserved.data.id, 120n);

      expect(await balance()).toBe(880n);
      expect(await available()).toBe(880n);
    });

    it('should record a shortfall instead of overdrawing', async () => {
      const reserved = await engine.tracker.reserve(relayer, 'op_1', params(1000n));
      if (!reserved.success) throw new Error('reserve failed');

      const result = await engine.tracker.commit(relayer, reserved.data.id, 1250n);

      expect(result.success && result.data).toMatchObject({
        settledAmount: 1000n,
        shortfall: 250n,
      });
      expect(await balance()).toBe(0n);
    });

    it('should be a no-op the second time', async () => {
      const reserved = await engine.tracker.reserve(relayer, 'op_1', params(300n));
      if (!reserved.success) throw new Error('reserve failed');
      await engine.tracker.commit(relayer, reserved.data.id);

      const again = await engine.tracker.commit(relayer, reserved.data.id, 999n);

      expect(again.success && again.data.settledAmount).toBe(300n);
      expect(await balance()).toBe(700n);
    });

    it('should refuse a released reservation', async () => {
      const reserved = await engine.tracker.reserve(relayer, 'op_1', params(300n));
      if (!reserved.success) throw new Error('reserve failed');
      await engine.tracker.release(relayer, reserved.data.id);

      const result = await engine.tracker.commit(relayer, reserved.data.id);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('ALREADY_RELEASED');
      expect(await balance()).toBe(1000n);
    });

    it('should leave the balance untouched when settlement fails', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      vi.spyOn(engine.db.usage, 'settleReservation').mockRejectedValueOnce(
        new Error('connection reset')
      );
      const reserved = await engine.tracker.reserve(relayer, 'op_1', params(300n));
      if (!reserved.success) throw new Error('reserve failed');

      const failed = await engine.tracker.commit(relayer, reserved.data.id, 250n);

      expect(failed.success).toBe(false);
      if (failed.success) return;
      expect(failed.error.code).toBe('INTERNAL_ERROR');
      expect(await balance()).toBe(1000n);
      expect(engine.db.usage.all().map((r) => r.state)).toEqual(['reserved']);

      const retried = await engine.tracker.commit(relayer, reserved.data.id, 250n);

      expect(retried.success && retried.data.settledAmount).toBe(250n);
      expect(await balance()).toBe(750n);
    });

    it('should not charge twice when the reply to a settlement is lost', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const settleReservation = engine.db.usage.settleReservation;
      vi.spyOn(engine.db.usage, 'settleReservation').mockImplementationOnce(
        async (id, amount, finalizedAt) => {
          await settleReservation(id, amount, finalizedAt);
          throw new Error('connection reset');
        }
      );
      const reserved = await engine.tracker.reserve(relayer, 'op_1', params(300n));
      if (!reserved.success) throw new Error('reserve failed');

      const failed = await engine.tracker.commit(relayer, reserved.data.id, 250n);
      const retried = await engine.tracker.commit(relayer, reserved.data.id, 250n);

      expect(failed.success).toBe(false);
      expect(retried.success && retried.data).toMatchObject({
        state: 'settled',
        settledAmount: 250n,
      });
      expect(await balance()).toBe(750n);
    });

    it('should require the deduct permission', async () => {
      const reserved = await engine.tracker.reserve(relayer, 'op_1', params(300n));
      if (!reserved.success) throw new Error('reserve failed');
      const limited = createRelayerActor({ permissions: ['sponsorship:authorize'] });

      const result = await engine.tracker.commit(limited, reserved.data.id);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('PERMISSION_DENIED');
      expect(await balance()).toBe(1000n);
    });

    it('should fail for an unknown reservation', async () => {
      const result = await engine.tracker.commit(relayer, 'rsv_missing');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('NOT_FOUND');
    });
  });

  describe('release', () => {
    it('should restore availability without touching the balance', async () => {
      const reserved = await engine.tracker.reserve(relayer, 'op_1', params(300n));
      if (!reserved.success) throw new Error('reserve failed');

      const result = await engine.tracker.release(relayer, reserved.data.id);

      expect(result.success && result.data.state).toBe('released');
      expect(await available()).toBe(1000n);
      expect(await balance()).toBe(1000n);
    });

    it('should be idempotent', async () => {
      const reserved = await engine.tracker.reserve(relayer, 'op_1', params(300n));
      if (!reserved.success) throw new Error('reserve failed');
      await engine.tracker.release(relayer, reserved.data.id);

      const again = await engine.tracker.release(relayer, reserved.data.id);

      expect(again.success && again.data.state).toBe('released');
    });

    it('should refuse a settled reservation', async () => {
      const reserved = await engine.tracker.reserve(relayer, 'op_1', params(300n));
      if (!reserved.success) throw new Error('reserve failed');
      await engine.tracker.commit(relayer, reserved.data.id);

      const result = await engine.tracker.release(relayer, reserved.data.id);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('ALREADY_COMMITTED');
    });

    it('should free the operation id for a new reservation', async () => {
      const first = await engine.tracker.reserve(relayer, 'op_1', params(300n));
      if (!first.success) throw new Error('reserve failed');
      await engine.tracker.release(relayer, first.data.id);

      const second = await engine.tracker.reserve(relayer, 'op_1', params(200n));
      expect(second.success).toBe(true);
      if (!second.success) return;

      const latest = await engine.tracker.findByOperation(relayer, 'op_1');
      expect(latest.success && latest.data.id).toBe(second.data.id);
    });
  });

  describe('sweep', () => {
    it('should release only reservations older than the cutoff', async () => {
      const old = await engine.tracker.reserve(relayer, 'op_old', params(300n));
      if (!old.success) throw new Error('reserve failed');
      engine.clock.advance(2 * HOUR);
      const fresh = await engine.tracker.reserve(relayer, 'op_fresh', params(100n));
      if (!fresh.success) throw new Error('reserve failed');

      const result = await engine.tracker.sweep(createSystemActor(), HOUR);

      expect(result).toEqual({ success: true, data: { released: 1 } });
      const states = engine.db.usage.all().map((r) => [r.operationId, r.state]);
      expect(states).toEqual([
        ['op_old', 'released'],
        ['op_fresh', 'reserved'],
      ]);
      expect(await available()).toBe(900n);
      expect(engine.db.audit.actions()).toContain('reservation.expired');
    });

    it('should leave a settled reservation alone', async () => {
      const reserved = await engine.tracker.reserve(relayer, 'op_1', params(300n));
      if (!reserved.success) throw new Error('reserve failed');
      await engine.tracker.commit(relayer, reserved.data.id);
      engine.clock.advance(2 * HOUR);

      const result = await engine.tracker.sweep(createSystemActor(), HOUR);

      expect(result).toEqual({ success: true, data: { released: 0 } });
    });

    it('should resolve a race with commit to exactly one terminal state', async () => {
      const reserved = await engine.tracker.reserve(relayer, 'op_1', params(300n));
      if (!reserved.success) throw new Error('reserve failed');
      engine.clock.advance(2 * HOUR);

      const [swept, committed] = await Promise.all([
        engine.tracker.sweep(createSystemActor(), HOUR),
        engine.tracker.commit(relayer, reserved.data.id),
      ]);

      const [final] = engine.db.usage.all();
      expect(swept.success).toBe(true);
      if (!swept.success || final === undefined) return;

      if (final.state === 'settled') {
        expect(committed.success).toBe(true);
        expect(swept.data.released).toBe(0);
        expect(await balance()).toBe(700n);
      } else {
        expect(final.state).toBe('released');
        expect(committed.success).toBe(false);
        expect(swept.data.released).toBe(1);
        expect(await balance()).toBe(1000n);
      }
    });
  });
});
