/**
 * Cross-chain Reconciliation Types
 */

import { z } from 'zod';

import type { ChargeOutcome } from './subscription.js';

export interface ReconciliationMessage {
  messageId: string;
  subscriptionId: string;
  homeChainId: number;
  sourceChainId: number;
  deductedAmount: bigint;
  sequenceNumber: number;
  createdAt: Date;
}

export type OutboxStatus = 'pending' | 'sent';

/**
 * Write-ahead record of an outbound message
 */
export interface OutboxEntry {
  message: ReconciliationMessage;
  /** Settled reservation the usage came from, when there is one */
  reservationId: string | null;
  status: OutboxStatus;
  attempts: number;
  lastError: string | null;
  createdAt: Date;
  sentAt: Date | null;
}

export interface AppliedMessage {
  messageId: string;
  subscriptionId: string;
  sourceChainId: number;
  sequenceNumber: number;
  appliedAmount: bigint;
  appliedAt: Date;
}

/**
 * A message recorded as applied together with its charge, and the
 * inbound sequence observed before it
 */
export interface MessageApplication {
  charge: ChargeOutcome;
  previousSequence: number | null;
}

export interface ReceiveOutcome {
  messageId: string;
  applied: boolean;
  duplicate: boolean;
  appliedAmount: bigint;
  shortfall: bigint;
  /** Set when the sequence number did not follow the last observed one */
  gap: { expected: number; received: number } | null;
}

export interface FlushResult {
  sent: number;
  failed: number;
}

/**
 * Wire encoding - amounts travel as decimal strings, times as ISO strings
 */
export const reconciliationMessageWireSchema = z.object({
  messageId: z.string().regex(/^0x[0-9a-fA-F]{64}$/),
  subscriptionId: z.string().min(1),
  homeChainId: z.number().int().positive(),
  sourceChainId: z.number().int().positive(),
  deductedAmount: z.string().regex(/^\d+$/),
  sequenceNumber: z.number().int().positive(),
  createdAt: z.string().datetime(),
});

export type ReconciliationMessageWire = z.infer<
  typeof reconciliationMessageWireSchema
>;

export function encodeReconciliationMessage(
  message: ReconciliationMessage
): ReconciliationMessageWire {
  return {
    messageId: message.messageId,
    subscriptionId: message.subscriptionId,
    homeChainId: message.homeChainId,
    sourceChainId: message.sourceChainId,
    deductedAmount: message.deductedAmount.toString(),
    sequenceNumber: message.sequenceNumber,
    createdAt: message.createdAt.toISOString(),
  };
}

export function decodeReconciliationMessage(
  wire: ReconciliationMessageWire
): ReconciliationMessage {
  return {
    messageId: wire.messageId,
    subscriptionId: wire.subscriptionId,
    homeChainId: wire.homeChainId,
    sourceChainId: wire.sourceChainId,
    deductedAmount: BigInt(wire.deductedAmount),
    sequenceNumber: wire.sequenceNumber,
    createdAt: new Date(wire.createdAt),
  };
}
