/**
 * Service Layer Exports
 *
 * Services are the ONLY gateway to the database.
 * All business logic lives here.
 */

// AuditService
export type { AuditService, AuditServiceDb, AuditLogEntry } from './audit.service.js';
export { createAuditService } from './audit.service.js';
export { createAuditServiceDb } from './audit.db.js';

// Shared plumbing
export type { ChangeRecorder } from './service-helpers.js';
export { runSafely } from './service-helpers.js';
export type { SubscriptionOwnership } from './ownership.js';
export { createHandleOwnership } from './ownership.js';

// SubscriptionLedger
export type {
  SubscriptionLedger,
  SubscriptionLedgerDb,
  SubscriptionLedgerDeps,
  SubscriptionRecordPatch,
} from './subscription-ledger.service.js';
export { createSubscriptionLedger } from './subscription-ledger.service.js';
export { createSubscriptionLedgerDb } from './subscription-ledger.db.js';

// PendingUsageTracker
export type {
  PendingUsageTracker,
  PendingUsageDb,
  PendingUsageLedger,
  PendingUsageTrackerDeps,
} from './pending-usage.service.js';
export { createPendingUsageTracker } from './pending-usage.service.js';
export { createPendingUsageDb } from './pending-usage.db.js';

// CrossChainReconciler
export type {
  CrossChainReconciler,
  CrossChainReconcilerDeps,
  ReconciliationDb,
  ReconciliationLedger,
  SendOptions,
} from './reconciliation.service.js';
export {
  createCrossChainReconciler,
  computeMessageId,
} from './reconciliation.service.js';
export { createReconciliationDb } from './reconciliation.db.js';
export type { ListStore, MessageChannel, MessageInbox } from './message-channel.js';
export {
  createRedisMessageChannel,
  createRedisMessageInbox,
  inboxKey,
  processingKey,
  deadLetterKey,
  parseWireEntry,
} from './message-channel.js';

// SponsorshipAuthorizer
export type {
  SponsorshipAuthorizer,
  SponsorshipAuthorizerDeps,
  SponsorshipLedger,
  SponsorshipReconciler,
} from './sponsorship.service.js';
export {
  createSponsorshipAuthorizer,
  applyEstimateBuffer,
  roundUpToGranularity,
} from './sponsorship.service.js';
