/**
 * Reconciliation background workers
 *
 * - outbox-relay: re-sends outbox entries still pending
 * - inbox-consumer: applies messages addressed to this chain
 * - applied-pruner: forgets applied message ids past the retention window
 */

import { nanoid } from 'nanoid';

import type { MessageInbox } from '@/services/message-channel.js';
import type { CrossChainReconciler } from '@/services/reconciliation.service.js';
import type {
  ActorContext,
  ErrorCode,
  ReconciliationMessage,
} from '@/types/index.js';
import { SYSTEM_ACTOR } from '@/types/index.js';

import type { Worker } from './periodic.js';

const OUTBOX_BATCH = 100;
const INBOX_BATCH = 100;

/**
 * Failures that no retry can fix; the message is parked instead of requeued
 */
const PERMANENT_FAILURES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  'NOT_FOUND',
  'WRONG_CHAIN',
  'VALIDATION_ERROR',
  'PERMISSION_DENIED',
]);

function workerActor(prefix: string): ActorContext {
  return { ...SYSTEM_ACTOR, requestId: `${prefix}_${nanoid(10)}` };
}

export function createOutboxRelay(deps: {
  reconciler: CrossChainReconciler;
  intervalMs: number;
}): Worker {
  return {
    name: 'outbox-relay',
    intervalMs: deps.intervalMs,
    async tick() {
      const result = await deps.reconciler.flushOutbox(
        workerActor('outbox'),
        OUTBOX_BATCH
      );
      if (!result.success) {
        console.error(`Outbox flush failed: ${result.error.message}`);
        return;
      }
      if (result.data.failed > 0) {
        console.warn(
          `Outbox flush: ${result.data.sent} sent, ${result.data.failed} still pending`
        );
      }
    },
  };
}

export interface InboxConsumerStats {
  applied: number;
  duplicates: number;
  requeued: number;
  deadLettered: number;
  /** Left in processing after a failure; recovered on the next pass */
  stranded: number;
}

type Disposition = 'applied' | 'duplicates' | 'requeued' | 'deadLettered';

async function handleMessage(
  reconciler: CrossChainReconciler,
  inbox: MessageInbox,
  message: ReconciliationMessage
): Promise<Disposition> {
  const result = await reconciler.receive(workerActor('inbox'), message);
  if (result.success) {
    await inbox.ack(message);
    return result.data.duplicate ? 'duplicates' : 'applied';
  }

  if (PERMANENT_FAILURES.has(result.error.code)) {
    console.error(
      `Dead-lettering ${message.messageId}: ${result.error.code} ${result.error.message}`
    );
    await inbox.deadLetter(message, result.error.code);
    return 'deadLettered';
  }
  await inbox.requeue(message);
  return 'requeued';
}

/**
 * Drain one batch from the inbox. A message leaves processing only once
 * it is applied, parked or requeued.
 */
export async function consumeInbox(
  reconciler: CrossChainReconciler,
  inbox: MessageInbox,
  limit: number = INBOX_BATCH
): Promise<InboxConsumerStats> {
  const stats: InboxConsumerStats = {
    applied: 0,
    duplicates: 0,
    requeued: 0,
    deadLettered: 0,
    stranded: 0,
  };

  const recovered = await inbox.recover();
  if (recovered > 0) {
    console.warn(`Recovered ${recovered} unfinished reconciliation messages`);
  }

  const messages = await inbox.pull(limit);
  for (const message of messages) {
    try {
      stats[await handleMessage(reconciler, inbox, message)] += 1;
    } catch (err) {
      console.error(`Inbox message ${message.messageId} left in processing:`, err);
      stats.stranded += 1;
    }
  }

  return stats;
}

export function createInboxConsumer(deps: {
  reconciler: CrossChainReconciler;
  inbox: MessageInbox;
  intervalMs: number;
}): Worker {
  return {
    name: 'inbox-consumer',
    intervalMs: deps.intervalMs,
    async tick() {
      const stats = await consumeInbox(deps.reconciler, deps.inbox);
      const handled =
        stats.applied + stats.duplicates + stats.requeued + stats.deadLettered;
      if (handled > 0) {
        console.info(
          `Inbox: ${stats.applied} applied, ${stats.duplicates} duplicate, ${stats.requeued} requeued, ${stats.deadLettered} dead-lettered`
        );
      }
      if (stats.stranded > 0) {
        console.warn(`Inbox: ${stats.stranded} left in processing`);
      }
    },
  };
}

export function createAppliedPruner(deps: {
  reconciler: CrossChainReconciler;
  retentionMs: number;
  intervalMs: number;
}): Worker {
  return {
    name: 'applied-pruner',
    intervalMs: deps.intervalMs,
    async tick() {
      const result = await deps.reconciler.pruneApplied(
        workerActor('prune'),
        deps.retentionMs
      );
      if (!result.success) {
        console.error(`Applied-message pruning failed: ${result.error.message}`);
      }
    },
  };
}
