/**
 * Supabase Client Configuration
 * The core only talks to the database with the service role
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

/**
 * Create a Supabase admin client that bypasses RLS
 * Use this ONLY for system operations that require elevated privileges
 */
export function createSupabaseAdmin(
  url: string,
  serviceKey: string
): SupabaseClient {
  return createClient(url, serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
  });
}

/**
 * PostgreSQL unique_violation, passed through by PostgREST
 */
export const UNIQUE_VIOLATION = '23505';

/**
 * PostgREST "no rows" code for .single()
 */
export const NO_ROWS = 'PGRST116';
