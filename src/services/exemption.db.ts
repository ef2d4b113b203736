/**
 * Exemption lookup backed by the whitelist table
 * A member is exempt while a whitelist row exists with revoked_at IS NULL.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { ExemptionChecker } from '../types/index.js';

export function createWhitelistExemptionChecker(
  supabase: SupabaseClient
): ExemptionChecker {
  return {
    async isExempt(userId: number): Promise<boolean> {
      const { count, error } = await supabase
        .from('whitelist')
        .select('user_id', { count: 'exact', head: true })
        .eq('user_id', userId)
        .is('revoked_at', null);

      if (error !== null) {
        throw new Error(`Failed to check whitelist: ${error.message}`);
      }

      return (count ?? 0) > 0;
    },
  };
}
