/**
 * Shared Library Exports
 * Common utilities used across the application
 */

export { createSupabaseAdmin } from './supabase.js';
export { createRedis } from './redis.js';
export { createKeyedMutex, type KeyedMutex } from './keyed-mutex.js';
export { normalizeAddress, normalizeAddressList } from './address.js';
