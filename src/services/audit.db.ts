/**
 * AuditService Database Adapter
 * Implements AuditServiceDb interface using Supabase
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { AuditActorType, AuditLog } from '../types/index.js';

import type { AuditLogEntry, AuditServiceDb } from './audit.service.js';

/**
 * Database row type
 */
interface AuditLogRow {
  id: string;
  timestamp: string;
  actor_id: string | null;
  actor_type: AuditActorType;
  action: string;
  resource_type: string;
  resource_id: string | null;
  user_id: number | null;
  details: Record<string, unknown>;
  request_id: string | null;
}

function mapRowToAuditLog(row: AuditLogRow): AuditLog {
  return {
    id: row.id,
    timestamp: new Date(row.timestamp),
    actorId: row.actor_id,
    actorType: row.actor_type,
    action: row.action,
    resourceType: row.resource_type,
    resourceId: row.resource_id,
    userId: row.user_id,
    details: row.details,
    requestId: row.request_id,
  };
}

function toInsertRow(entry: AuditLogEntry): Record<string, unknown> {
  return {
    actor_id: entry.actorId,
    actor_type: entry.actorType,
    action: entry.action,
    resource_type: entry.resourceType,
    resource_id: entry.resourceId,
    user_id: entry.userId,
    details: entry.details,
    request_id: entry.requestId,
  };
}

/**
 * Create AuditServiceDb implementation using Supabase
 */
export function createAuditServiceDb(supabase: SupabaseClient): AuditServiceDb {
  return {
    async insertLog(entry: AuditLogEntry): Promise<{ id: string }> {
      const { data, error } = await supabase
        .from('audit_logs')
        .insert(toInsertRow(entry))
        .select('id')
        .single();

      if (error !== null) {
        throw new Error(`Failed to insert audit log: ${error.message}`);
      }

      return { id: (data as { id: string }).id };
    },

    async getLogsByUser(userId: number, limit: number): Promise<AuditLog[]> {
      const { data, error } = await supabase
        .from('audit_logs')
        .select('*')
        .eq('user_id', userId)
        .order('timestamp', { ascending: false })
        .limit(limit);

      if (error !== null) {
        throw new Error(`Failed to query audit logs: ${error.message}`);
      }

      return (data as AuditLogRow[]).map(mapRowToAuditLog);
    },
  };
}
