/**
 * Background Workers Exports
 *
 * Each worker is an idempotent pass, safe to repeat after a crash.
 */

export type { Worker, RunningWorkers } from './periodic.js';
export { startWorkers, runTick } from './periodic.js';
export { createReservationSweeper } from './reservation-sweeper.js';
export type { InboxConsumerStats } from './reconciliation.workers.js';
export {
  createOutboxRelay,
  createInboxConsumer,
  createAppliedPruner,
  consumeInbox,
} from './reconciliation.workers.js';
