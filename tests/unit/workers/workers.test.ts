/**
 * Background worker Unit Tests
 */

import { afterEach, describe, it, expect, beforeEach, vi } from 'vitest';

import { computeMessageId } from '@/services/reconciliation.service.js';
import type { ReconciliationMessage, Subscription } from '@/types/index.js';
import {
  consumeInbox,
  createAppliedPruner,
  createInboxConsumer,
  createOutboxRelay,
  createReservationSweeper,
  runTick,
  startWorkers,
} from '@/workers/index.js';

import type { InMemoryNetwork, TestEngine } from '../../helpers/test-utils.js';
import {
  createInMemoryNetwork,
  createRelayerActor,
  createTestEngine,
  DAY,
  HOME_CHAIN,
  HOUR,
  mintOrThrow,
  REMOTE_CHAIN,
  SPONSORED_A,
  T0,
} from '../../helpers/test-utils.js';

describe('runTick', () => {
  it('should log a failing tick instead of throwing', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const failure = new Error('boom');

    await runTick({
      name: 'flaky',
      intervalMs: 1000,
      tick: () => Promise.reject(failure),
    });

    expect(error).toHaveBeenCalledWith('Worker flaky tick failed:', failure);
  });
});

describe('startWorkers', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should tick on every interval until stopped', async () => {
    const tick = vi.fn<() => Promise<void>>().mockResolvedValue(undefined);
    const running = startWorkers([{ name: 'counter', intervalMs: 1000, tick }]);

    await vi.advanceTimersByTimeAsync(3000);
    expect(tick).toHaveBeenCalledTimes(3);

    running.stop();
    await vi.advanceTimersByTimeAsync(3000);
    expect(tick).toHaveBeenCalledTimes(3);
  });

  it('should skip a tick while the previous one is still running', async () => {
    let finish: () => void = () => undefined;
    const tick = vi.fn<() => Promise<void>>().mockImplementation(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        })
    );
    const running = startWorkers([{ name: 'slow', intervalMs: 1000, tick }]);

    await vi.advanceTimersByTimeAsync(3000);
    expect(tick).toHaveBeenCalledTimes(1);

    finish();
    await vi.advanceTimersByTimeAsync(1000);
    expect(tick).toHaveBeenCalledTimes(2);

    running.stop();
  });
});

describe('reconciliation workers', () => {
  let home: TestEngine;
  let network: InMemoryNetwork;
  let subscription: Subscription;
  const relayer = createRelayerActor();

  const message = (
    sequenceNumber: number,
    overrides?: Partial<ReconciliationMessage>
  ): ReconciliationMessage => ({
    messageId: computeMessageId(REMOTE_CHAIN, subscription.id, sequenceNumber),
    subscriptionId: subscription.id,
    homeChainId: HOME_CHAIN,
    sourceChainId: REMOTE_CHAIN,
    deductedAmount: 20n,
    sequenceNumber,
    createdAt: T0,
    ...overrides,
  });

  const balance = async (): Promise<bigint | undefined> => {
    const result = await home.ledger.getSubscription(relayer, subscription.id);
    return result.success ? result.data.remainingBalance : undefined;
  };

  beforeEach(async () => {
    network = createInMemoryNetwork();
    home = createTestEngine({ chainId: HOME_CHAIN, channel: network.channel });
    subscription = await mintOrThrow(home, { paidAmount: 50n });
  });

  describe('consumeInbox', () => {
    it('should apply, skip duplicates and park what can never apply', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const unknown = message(2, { subscriptionId: 'sub_missing' });
      const misrouted = message(3, { homeChainId: REMOTE_CHAIN });
      network.inject(HOME_CHAIN, message(1));
      network.inject(HOME_CHAIN, message(1));
      network.inject(HOME_CHAIN, unknown);
      network.inject(HOME_CHAIN, misrouted);

      const stats = await consumeInbox(home.reconciler, network.inbox(HOME_CHAIN));

      expect(stats).toEqual({ applied: 1, duplicates: 1, requeued: 0, deadLettered: 2, stranded: 0 });
      expect(network.deadLetters).toEqual([
        { message: unknown, reason: 'NOT_FOUND' },
        { message: misrouted, reason: 'WRONG_CHAIN' },
      ]);
      expect(network.pending(HOME_CHAIN)).toEqual([]);
      expect(await balance()).toBe(30n);
    });

    it('should requeue a message that failed for a transient reason', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      vi.spyOn(home.db.ledger, 'getSubscription').mockRejectedValueOnce(
        new Error('connection reset')
      );
      network.inject(HOME_CHAIN, message(1));

      const first = await consumeInbox(home.reconciler, network.inbox(HOME_CHAIN));

      expect(first).toEqual({ applied: 0, duplicates: 0, requeued: 1, deadLettered: 0, stranded: 0 });
      expect(network.pending(HOME_CHAIN)).toEqual([message(1)]);

      const second = await consumeInbox(home.reconciler, network.inbox(HOME_CHAIN));

      expect(second).toEqual({ applied: 1, duplicates: 0, requeued: 0, deadLettered: 0, stranded: 0 });
      expect(await balance()).toBe(30n);
    });

    it('should leave the balance untouched when applying the message fails', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      vi.spyOn(home.db.reconciliation, 'applyMessage').mockRejectedValueOnce(
        new Error('connection reset')
      );
      network.inject(HOME_CHAIN, message(1));

      const first = await consumeInbox(home.reconciler, network.inbox(HOME_CHAIN));

      expect(first.requeued).toBe(1);
      expect(await balance()).toBe(50n);
      expect(home.db.reconciliation.applied()).toEqual([]);

      const second = await consumeInbox(home.reconciler, network.inbox(HOME_CHAIN));

      expect(second.applied).toBe(1);
      expect(await balance()).toBe(30n);
      expect(home.db.reconciliation.observedSequence(subscription.id, REMOTE_CHAIN)).toBe(1);
    });

    it('should not charge twice when the reply to an apply is lost', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const applyMessage = home.db.reconciliation.applyMessage;
      vi.spyOn(home.db.reconciliation, 'applyMessage').mockImplementationOnce(
        async (applied, appliedAt) => {
          await applyMessage(applied, appliedAt);
          throw new Error('connection reset');
        }
      );
      network.inject(HOME_CHAIN, message(1));

      const first = await consumeInbox(home.reconciler, network.inbox(HOME_CHAIN));
      const second = await consumeInbox(home.reconciler, network.inbox(HOME_CHAIN));

      expect(first.requeued).toBe(1);
      expect(second).toEqual({ applied: 0, duplicates: 1, requeued: 0, deadLettered: 0, stranded: 0 });
      expect(await balance()).toBe(30n);
      expect(warn).not.toHaveBeenCalledWith(expect.stringContaining('Sequence gap'));
    });

    it('should keep a message whose requeue failed and apply it on the next pass', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      vi.spyOn(home.db.ledger, 'getSubscription').mockRejectedValueOnce(
        new Error('connection reset')
      );
      const inbox = network.inbox(HOME_CHAIN);
      vi.spyOn(inbox, 'requeue').mockRejectedValueOnce(new Error('fetch failed'));
      network.inject(HOME_CHAIN, message(1));
      network.inject(HOME_CHAIN, message(2));

      const first = await consumeInbox(home.reconciler, inbox);

      expect(first).toEqual({ applied: 1, duplicates: 0, requeued: 0, deadLettered: 0, stranded: 1 });
      expect(network.processing(HOME_CHAIN)).toEqual([message(1)]);
      expect(network.pending(HOME_CHAIN)).toEqual([]);
      expect(await balance()).toBe(30n);

      const second = await consumeInbox(home.reconciler, inbox);

      expect(warn).toHaveBeenCalledWith('Recovered 1 unfinished reconciliation messages');
      expect(second).toEqual({ applied: 1, duplicates: 0, requeued: 0, deadLettered: 0, stranded: 0 });
      expect(network.processing(HOME_CHAIN)).toEqual([]);
      expect(await balance()).toBe(10n);
    });

    it('should absorb the redelivery of a message whose acknowledgement failed', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const inbox = network.inbox(HOME_CHAIN);
      vi.spyOn(inbox, 'ack').mockRejectedValueOnce(new Error('fetch failed'));
      network.inject(HOME_CHAIN, message(1));

      const first = await consumeInbox(home.reconciler, inbox);
      const second = await consumeInbox(home.reconciler, inbox);

      expect(first.stranded).toBe(1);
      expect(second.duplicates).toBe(1);
      expect(network.processing(HOME_CHAIN)).toEqual([]);
      expect(await balance()).toBe(30n);
    });

    it('should take at most one batch per pass', async () => {
      network.inject(HOME_CHAIN, message(1, { deductedAmount: 1n }));
      network.inject(HOME_CHAIN, message(2, { deductedAmount: 1n }));
      network.inject(HOME_CHAIN, message(3, { deductedAmount: 1n }));

      const stats = await consumeInbox(home.reconciler, network.inbox(HOME_CHAIN), 2);

      expect(stats.applied).toBe(2);
      expect(network.pending(HOME_CHAIN)).toHaveLength(1);
    });
  });

  it('should summarize an inbox pass', async () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    network.inject(HOME_CHAIN, message(1));
    const worker = createInboxConsumer({
      reconciler: home.reconciler,
      inbox: network.inbox(HOME_CHAIN),
      intervalMs: 1000,
    });

    await worker.tick();

    expect(info).toHaveBeenCalledWith(
      'Inbox: 1 applied, 0 duplicate, 0 requeued, 0 dead-lettered'
    );
  });

  it('should flush the outbox and report what is still pending', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const remote = createTestEngine({ chainId: REMOTE_CHAIN, channel: network.channel });
    await mintOrThrow(remote, { homeChainId: HOME_CHAIN, subscriptionId: 'sub_home1' });
    network.setAvailable(false);
    await remote.reconciler.send(relayer, 'sub_home1', 5n);
    const worker = createOutboxRelay({ reconciler: remote.reconciler, intervalMs: 1000 });

    await worker.tick();
    expect(warn).toHaveBeenLastCalledWith('Outbox flush: 0 sent, 1 still pending');

    network.setAvailable(true);
    await worker.tick();
    expect(network.pending(HOME_CHAIN)).toHaveLength(1);
    expect(remote.db.reconciliation.outbox()).toMatchObject([{ status: 'sent' }]);
  });

  it('should prune applied ids past retention', async () => {
    await home.reconciler.receive(relayer, message(1));
    home.clock.advance(2 * DAY);
    const worker = createAppliedPruner({
      reconciler: home.reconciler,
      retentionMs: DAY,
      intervalMs: 1000,
    });

    await worker.tick();

    expect(home.db.reconciliation.applied()).toEqual([]);
  });

  it('should sweep stale reservations', async () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    await home.tracker.reserve(relayer, 'op_1', {
      subscriptionId: subscription.id,
      amount: 10n,
      executionChainId: HOME_CHAIN,
      requester: SPONSORED_A,
    });
    home.clock.advance(2 * HOUR);
    const worker = createReservationSweeper({
      tracker: home.tracker,
      maxAgeMs: HOUR,
      intervalMs: 1000,
    });

    await worker.tick();

    expect(home.db.usage.all().map((r) => r.state)).toEqual(['released']);
    expect(info).toHaveBeenCalledWith('Released 1 stale reservations');
  });
});
