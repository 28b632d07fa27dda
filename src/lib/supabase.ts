/**
 * Supabase Client Configuration
 * Service-role client used by the persistence adapter
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

import type { AppConfig } from './config.js';

/**
 * Create a Supabase admin client that bypasses RLS
 * NEVER expose this to user-facing code
 */
export function createSupabaseAdmin(
  config: Pick<AppConfig, 'supabaseUrl' | 'supabaseServiceKey'>
): SupabaseClient {
  return createClient(config.supabaseUrl, config.supabaseServiceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
  });
}
