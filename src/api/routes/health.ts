/**
 * Liveness endpoint for the chain node
 *
 * Reports which chain this node serves, so a relayer can check it is talking
 * to the node its operations execute on before it pre-authorizes anything.
 */

import { Hono } from 'hono';

export function createHealthRoutes(deps: { chainId: number }): Hono {
  const app = new Hono();

  // GET /health (public)
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      chainId: deps.chainId,
      timestamp: new Date().toISOString(),
      version: 'v1',
    });
  });

  return app;
}
