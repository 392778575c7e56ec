/**
 * Supabase Client Configuration
 * Service-role client used by the database adapters and token verification
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

/**
 * Create a Supabase admin client that bypasses RLS
 * Use this ONLY inside the service layer; NEVER expose it to handlers
 */
export function createSupabaseAdmin(config: {
  url: string;
  serviceKey: string;
}): SupabaseClient {
  return createClient(config.url, config.serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
  });
}
