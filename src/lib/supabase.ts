/**
 * Supabase Client Configuration
 * The authorization store runs with the service key; it is never exposed
 * to user-facing code.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

/**
 * Create a Supabase admin client that bypasses RLS
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
