/**
 * Reconciliation Message Channel
 *
 * The transport between chain nodes is an external collaborator: at-least-once,
 * unordered, no corruption. The shipped implementation is one Upstash Redis
 * list per destination chain. The inbox side moves entries into a processing
 * list with LMOVE and removes each one only once it has been handled, so an
 * interrupted pass leaves its messages behind for recover().
 */

import type { ReconciliationMessage, Result } from '@/types/index.js';
import {
  decodeReconciliationMessage,
  encodeReconciliationMessage,
  failure,
  reconciliationMessageWireSchema,
  success,
} from '@/types/index.js';

export interface MessageChannel {
  send(
    destinationChainId: number,
    message: ReconciliationMessage
  ): Promise<Result<void>>;
}

export interface MessageInbox {
  /** Return entries an interrupted pass left in processing; the count moved */
  recover(): Promise<number>;
  /** Move up to `limit` messages into processing and return them */
  pull(limit: number): Promise<ReconciliationMessage[]>;
  /** Drop a handled message from processing */
  ack(message: ReconciliationMessage): Promise<void>;
  /** Put a message back on the inbox for a later attempt */
  requeue(message: ReconciliationMessage): Promise<void>;
  /** Park a message that can never be applied */
  deadLetter(message: ReconciliationMessage, reason: string): Promise<void>;
}

type ListEnd = 'left' | 'right';

/**
 * The list operations the channel uses; an Upstash Redis client satisfies it
 */
export interface ListStore {
  rpush(key: string, value: string): Promise<unknown>;
  lmove(
    source: string,
    destination: string,
    whereFrom: ListEnd,
    whereTo: ListEnd
  ): Promise<unknown>;
  lrem(key: string, count: number, value: string): Promise<unknown>;
}

export function inboxKey(chainId: number): string {
  return `reconciliation:inbox:${chainId}`;
}

export function processingKey(chainId: number): string {
  return `reconciliation:processing:${chainId}`;
}

export function deadLetterKey(chainId: number): string {
  return `reconciliation:dead-letter:${chainId}`;
}

/**
 * Serialize for the wire
 */
function toWire(message: ReconciliationMessage): string {
  return JSON.stringify(encodeReconciliationMessage(message));
}

/**
 * The string stored in Redis for an entry it handed back, possibly
 * deserialized; LREM matches on it
 */
function storedForm(entry: unknown): string {
  return typeof entry === 'string' ? entry : JSON.stringify(entry);
}

/**
 * Parse a moved entry. Upstash deserializes JSON values by default,
 * so an entry may arrive as a string or as an object.
 */
export function parseWireEntry(entry: unknown): ReconciliationMessage | null {
  let value: unknown = entry;
  if (typeof entry === 'string') {
    try {
      value = JSON.parse(entry);
    } catch {
      return null;
    }
  }
  const parsed = reconciliationMessageWireSchema.safeParse(value);
  return parsed.success ? decodeReconciliationMessage(parsed.data) : null;
}

export function createRedisMessageChannel(redis: ListStore): MessageChannel {
  return {
    async send(
      destinationChainId: number,
      message: ReconciliationMessage
    ): Promise<Result<void>> {
      try {
        await redis.rpush(inboxKey(destinationChainId), toWire(message));
        return success(undefined);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        return failure('CHANNEL_UNAVAILABLE', 'Message channel unavailable', {
          destinationChainId,
          messageId: message.messageId,
          reason,
        });
      }
    },
  };
}

export function createRedisMessageInbox(
  redis: ListStore,
  chainId: number
): MessageInbox {
  const key = inboxKey(chainId);
  const processing = processingKey(chainId);
  /** messageId → entry as stored, for the LREM that settles it */
  const inFlight = new Map<string, string>();

  async function settle(message: ReconciliationMessage): Promise<void> {
    const stored = inFlight.get(message.messageId) ?? toWire(message);
    await redis.lrem(processing, 1, stored);
    inFlight.delete(message.messageId);
  }

  return {
    async recover(): Promise<number> {
      let moved = 0;
      for (;;) {
        const entry = await redis.lmove(processing, key, 'left', 'right');
        if (entry === null || entry === undefined) {
          break;
        }
        moved += 1;
      }
      inFlight.clear();
      return moved;
    },

    async pull(limit: number): Promise<ReconciliationMessage[]> {
      const messages: ReconciliationMessage[] = [];
      for (let i = 0; i < limit; i += 1) {
        const entry = await redis.lmove(key, processing, 'left', 'right');
        if (entry === null || entry === undefined) {
          break;
        }
        const stored = storedForm(entry);
        const message = parseWireEntry(entry);
        if (message === null) {
          console.error(`Dropping malformed reconciliation entry on ${key}`);
          await redis.rpush(deadLetterKey(chainId), JSON.stringify({ entry: stored }));
          await redis.lrem(processing, 1, stored);
          continue;
        }
        inFlight.set(message.messageId, stored);
        messages.push(message);
      }
      return messages;
    },

    async ack(message: ReconciliationMessage): Promise<void> {
      await settle(message);
    },

    async requeue(message: ReconciliationMessage): Promise<void> {
      await redis.rpush(key, inFlight.get(message.messageId) ?? toWire(message));
      await settle(message);
    },

    async deadLetter(message: ReconciliationMessage, reason: string): Promise<void> {
      await redis.rpush(
        deadLetterKey(chainId),
        JSON.stringify({ message: encodeReconciliationMessage(message), reason })
      );
      await settle(message);
    },
  };
}
