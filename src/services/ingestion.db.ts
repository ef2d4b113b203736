/**
 * IngestionService Database Adapter
 * Failed payments are parked in failed_payments for manual review.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { FailedPaymentEntry } from '../types/index.js';

import type { IngestionServiceDb } from './ingestion.service.js';

export function createIngestionServiceDb(supabase: SupabaseClient): IngestionServiceDb {
  return {
    async enqueueFailedPayment(entry: FailedPaymentEntry): Promise<void> {
      const { error } = await supabase.from('failed_payments').insert({
        user_id: entry.userId,
        charge_id: entry.chargeId,
        error: entry.error,
        raw_event: entry.rawEvent,
      });

      if (error !== null) {
        throw new Error(`Failed to enqueue failed payment: ${error.message}`);
      }
    },
  };
}
