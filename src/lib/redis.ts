/**
 * Upstash Redis Client Configuration
 * Backs the reconciliation message channel and rate limiting
 */

import { Redis } from '@upstash/redis';

export function createRedis(config: { url: string; token: string }): Redis {
  if (config.url === '' || config.token === '') {
    throw new Error('UPSTASH_REDIS_URL and UPSTASH_REDIS_TOKEN are required');
  }
  return new Redis({
    url: config.url,
    token: config.token,
  });
}
