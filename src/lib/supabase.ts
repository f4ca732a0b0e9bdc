/**
 * Supabase Client Configuration
 * Service-role client for the engine's database adapters and JWT checks
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export interface SupabaseConfig {
  url: string;
  serviceKey: string;
}

/**
 * Create a Supabase admin client that bypasses RLS
 * Use this ONLY inside the engine; NEVER hand it to user-facing code
 */
export function createSupabaseAdmin(config: SupabaseConfig): SupabaseClient {
  if (!config.url || !config.serviceKey) {
    throw new Error('SUPABASE_URL and SUPABASE_SERVICE_KEY are required');
  }

  return createClient(config.url, config.serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
  });
}
