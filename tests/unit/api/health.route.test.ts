/**
 * Health Route Unit Tests
 */

import { Hono } from 'hono';
import { describe, it, expect } from 'vitest';

import { createHealthRoutes } from '@/api/routes/health.js';

import { createTestApp } from '../../helpers/api-utils.js';
import { createTestEngine, REMOTE_CHAIN } from '../../helpers/test-utils.js';

describe('Health Route', () => {
  describe('GET /health', () => {
    it('should report status, chain and version', async () => {
      const app = new Hono();
      app.route('/api/v1', createHealthRoutes({ chainId: REMOTE_CHAIN }));

      const res = await app.request('/api/v1/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        status: 'ok',
        chainId: REMOTE_CHAIN,
        version: 'v1',
      });
    });

    it('should include an ISO timestamp', async () => {
      const app = new Hono();
      app.route('/api/v1', createHealthRoutes({ chainId: REMOTE_CHAIN }));

      const res = await app.request('/api/v1/health');

      expect(await res.json()).toMatchObject({
        timestamp: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/),
      });
    });

    it('should not require authentication in the full app', async () => {
      const app = createTestApp(createTestEngine({ chainId: REMOTE_CHAIN }));

      const res = await app.request('/api/v1/health');

      expect(res.status).toBe(200);
    });
  });

  describe('unknown endpoints', () => {
    it('should return the standard 404 body', async () => {
      const app = createTestApp(createTestEngine());

      const res = await app.request('/api/v1/nowhere');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: { code: 'NOT_FOUND', message: 'Endpoint not found', requestId: 'unknown' },
      });
    });
  });
});
