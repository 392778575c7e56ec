/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';

import type { TokenVerifier } from './middleware/auth.js';
import {
  createAuthMiddleware,
  createPublicMiddleware,
} from './middleware/auth.js';
import type { RateLimiter } from './middleware/rateLimit.js';
import { createRateLimitMiddleware } from './middleware/rateLimit.js';
import { createHealthRoutes } from './routes/health.js';
import { createReconciliationRoutes } from './routes/reconciliation.js';
import { createSponsorshipRoutes } from './routes/sponsorship.js';
import { createSubscriptionRoutes } from './routes/subscriptions.js';
import type { ApiServices } from './types.js';

/**
 * App configuration
 */
interface AppConfig {
  supabaseClient: TokenVerifier;
  services: ApiServices;
  chainId: number;
  relayerApiKeys: string[];
  rateLimiter: RateLimiter;
  allowedOrigins?: string[];
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { supabaseClient, services, chainId, relayerApiKeys, rateLimiter } =
    config;
  const app = new Hono();

  // Global middleware
  app.use('*', logger());
  app.use(
    '*',
    cors({
      origin: config.allowedOrigins ?? ['http://localhost:3000'],
      credentials: true,
    })
  );

  // Public routes (no auth)
  app.use('/api/v1/health', createPublicMiddleware());
  app.route('/api/v1', createHealthRoutes({ chainId }));

  // Auth middleware for protected routes
  const authMiddleware = createAuthMiddleware({ supabaseClient, relayerApiKeys });

  // Subscription routes
  app.use('/api/v1/subscriptions/*', authMiddleware);
  app.use('/api/v1/subscriptions', authMiddleware);
  app.route(
    '/api/v1',
    createSubscriptionRoutes({
      ledger: services.ledger,
      tracker: services.tracker,
    })
  );

  // Sponsorship routes (rate limited per relayer)
  app.use('/api/v1/sponsorship/*', authMiddleware);
  app.use('/api/v1/sponsorship/*', createRateLimitMiddleware(rateLimiter));
  app.route(
    '/api/v1',
    createSponsorshipRoutes({ authorizer: services.authorizer })
  );

  // Reconciliation delivery
  app.use('/api/v1/reconciliation/*', authMiddleware);
  app.route(
    '/api/v1',
    createReconciliationRoutes({ reconciler: services.reconciler })
  );

  // 404 handler
  app.notFound((c) => {
    const actor = c.get('actor');
    const requestId = actor?.requestId ?? 'unknown';

    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId,
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    console.error('Unhandled error:', err);
    const actor = c.get('actor');
    const requestId = actor?.requestId ?? 'unknown';

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId,
        },
      },
      500
    );
  });

  return app;
}
