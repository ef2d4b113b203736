/**
 * AccessService Database Adapter
 * Implements AccessServiceDb interface using Supabase
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { FinalizationStatus, FinalizationTask } from '../types/index.js';

import type { AccessServiceDb } from './access.service.js';

/**
 * Database row type
 */
interface FinalizationRow {
  user_id: number;
  status: FinalizationStatus;
  attempt_count: number;
  last_attempt_at: string | null;
  next_attempt_at: string | null;
  last_error: string | null;
  updated_at: string;
}

function toDate(value: string | null): Date | null {
  return value !== null ? new Date(value) : null;
}

function mapRowToTask(row: FinalizationRow): FinalizationTask {
  return {
    userId: row.user_id,
    status: row.status,
    attemptCount: row.attempt_count,
    lastAttemptAt: toDate(row.last_attempt_at),
    nextAttemptAt: toDate(row.next_attempt_at),
    lastError: row.last_error,
    updatedAt: new Date(row.updated_at),
  };
}

/**
 * Create AccessServiceDb implementation using Supabase
 */
export function createAccessServiceDb(supabase: SupabaseClient): AccessServiceDb {
  return {
    async getTask(userId: number): Promise<FinalizationTask | null> {
      const { data, error } = await supabase
        .from('access_finalizations')
        .select('*')
        .eq('user_id', userId)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get finalization: ${error.message}`);
      }

      return data !== null ? mapRowToTask(data as FinalizationRow) : null;
    },

    async saveTask(task: FinalizationTask): Promise<void> {
      const { error } = await supabase.from('access_finalizations').upsert(
        {
          user_id: task.userId,
          status: task.status,
          attempt_count: task.attemptCount,
          last_attempt_at: task.lastAttemptAt?.toISOString() ?? null,
          next_attempt_at: task.nextAttemptAt?.toISOString() ?? null,
          last_error: task.lastError,
          updated_at: task.updatedAt.toISOString(),
        },
        { onConflict: 'user_id' }
      );

      if (error !== null) {
        throw new Error(`Failed to save finalization: ${error.message}`);
      }
    },

    async listInProgress(limit: number): Promise<FinalizationTask[]> {
      const { data, error } = await supabase
        .from('access_finalizations')
        .select('*')
        .eq('status', 'in_progress')
        .order('updated_at', { ascending: true })
        .limit(limit);

      if (error !== null) {
        throw new Error(`Failed to list finalizations: ${error.message}`);
      }

      return (data as FinalizationRow[]).map(mapRowToTask);
    },
  };
}
