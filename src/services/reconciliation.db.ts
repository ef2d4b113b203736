/**
 * ReconciliationService Database Adapter
 * Singleton cursor row (id = 1) in reconciliation_cursor
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { ReconciliationCursor } from '../types/index.js';

import type { ReconciliationServiceDb } from './reconciliation.service.js';

interface CursorRow {
  last_seen_at: string | null;
  last_seen_tx_id: string | null;
  updated_at: string | null;
}

function mapRowToCursor(row: CursorRow | null): ReconciliationCursor {
  if (row === null) {
    return { lastSeenAt: null, lastSeenTxId: null, updatedAt: null };
  }
  return {
    lastSeenAt: row.last_seen_at !== null ? new Date(row.last_seen_at) : null,
    lastSeenTxId: row.last_seen_tx_id,
    updatedAt: row.updated_at !== null ? new Date(row.updated_at) : null,
  };
}

/**
 * Create ReconciliationServiceDb implementation using Supabase
 */
export function createReconciliationServiceDb(
  supabase: SupabaseClient
): ReconciliationServiceDb {
  return {
    async getCursor(): Promise<ReconciliationCursor> {
      const { data, error } = await supabase
        .from('reconciliation_cursor')
        .select('last_seen_at, last_seen_tx_id, updated_at')
        .eq('id', 1)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to read cursor: ${error.message}`);
      }

      return mapRowToCursor(data as CursorRow | null);
    },

    async advanceCursor(at: Date, txId: string): Promise<ReconciliationCursor> {
      const { data, error } = await supabase.rpc('advance_reconciliation_cursor', {
        p_last_seen_at: at.toISOString(),
        p_last_seen_tx_id: txId,
      });

      if (error !== null) {
        throw new Error(`Failed to advance cursor: ${error.message}`);
      }

      return mapRowToCursor(data as CursorRow);
    },
  };
}
