/**
 * Supabase Client Configuration
 * The licensing engine talks to storage with the service role only
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export interface SupabaseConfig {
  url: string;
  serviceKey: string;
}

/**
 * Create a Supabase admin client that bypasses RLS
 * Use this ONLY inside repository adapters
 */
export function createSupabaseAdmin(config: SupabaseConfig): SupabaseClient {
  if (config.url === '') {
    throw new Error('SUPABASE_URL is required');
  }
  if (config.serviceKey === '') {
    throw new Error('SUPABASE_SERVICE_KEY is required for admin client');
  }

  return createClient(config.url, config.serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
  });
}
