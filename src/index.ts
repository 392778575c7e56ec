/**
 * Application Entry Point
 *
 * Wires together all services, starts the Hono application and the
 * background workers for the chain this process serves.
 */

import { serve } from '@hono/node-server';
import { Ratelimit } from '@upstash/ratelimit';

import { createApp } from './api/app.js';
import {
  createInMemoryRateLimiter,
  createUpstashRateLimiter,
} from './api/middleware/rateLimit.js';
import { loadConfig } from './config/index.js';
import { createKeyedMutex, createRedis, createSupabaseAdmin } from './lib/index.js';
import {
  createAuditService,
  createAuditServiceDb,
  createCrossChainReconciler,
  createHandleOwnership,
  createPendingUsageDb,
  createPendingUsageTracker,
  createReconciliationDb,
  createRedisMessageChannel,
  createRedisMessageInbox,
  createSponsorshipAuthorizer,
  createSubscriptionLedger,
  createSubscriptionLedgerDb,
} from './services/index.js';
import {
  createAppliedPruner,
  createInboxConsumer,
  createOutboxRelay,
  createReservationSweeper,
  startWorkers,
} from './workers/index.js';

const config = loadConfig();

const supabase = createSupabaseAdmin(config.supabase);
const redis = createRedis(config.redis);

// One lock table per process: every service serializes on the same keys
const locks = createKeyedMutex();

// Wire all services
const auditService = createAuditService({ db: createAuditServiceDb(supabase) });

const ledger = createSubscriptionLedger({
  db: createSubscriptionLedgerDb(supabase),
  auditService,
  ownership: createHandleOwnership(),
  locks,
  chainId: config.chainId,
});

const tracker = createPendingUsageTracker({
  db: createPendingUsageDb(supabase),
  ledger,
  auditService,
  locks,
});

const reconciler = createCrossChainReconciler({
  db: createReconciliationDb(supabase),
  ledger,
  channel: createRedisMessageChannel(redis),
  auditService,
  locks,
  chainId: config.chainId,
});

const authorizer = createSponsorshipAuthorizer({
  ledger,
  tracker,
  reconciler,
  auditService,
  locks,
  chainId: config.chainId,
  feePolicy: config.feePolicy,
});

const rateLimiter =
  config.env === 'production'
    ? createUpstashRateLimiter(
        new Ratelimit({
          redis,
          limiter: Ratelimit.slidingWindow(config.rateLimit.perMinute, '1 m'),
          prefix: `ratelimit:sponsorship:${config.chainId}`,
        })
      )
    : createInMemoryRateLimiter({ limit: config.rateLimit.perMinute, windowSeconds: 60 });

// Create the API application
const app = createApp({
  supabaseClient: supabase,
  services: { ledger, tracker, authorizer, reconciler },
  chainId: config.chainId,
  relayerApiKeys: config.relayerApiKeys,
  rateLimiter,
  allowedOrigins: config.server.allowedOrigins,
});

const workers = startWorkers([
  createReservationSweeper({
    tracker,
    maxAgeMs: config.workers.reservationMaxAgeMs,
    intervalMs: config.workers.sweepIntervalMs,
  }),
  createOutboxRelay({
    reconciler,
    intervalMs: config.workers.outboxIntervalMs,
  }),
  createInboxConsumer({
    reconciler,
    inbox: createRedisMessageInbox(redis, config.chainId),
    intervalMs: config.workers.inboxIntervalMs,
  }),
  createAppliedPruner({
    reconciler,
    retentionMs: config.workers.appliedMessageRetentionMs,
    intervalMs: config.workers.sweepIntervalMs,
  }),
]);

console.error(`Server starting on port ${config.server.port} for chain ${config.chainId}`);

const server = serve({
  fetch: app.fetch,
  port: config.server.port,
});

function shutdown(signal: string): void {
  console.error(`${signal} received, shutting down`);
  workers.stop();
  server.close();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export { app };
