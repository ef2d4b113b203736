/**
 * NotificationService Database Adapter
 * Implements NotificationServiceDb interface using Supabase
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { Notification, NotificationType } from '../types/index.js';

import type { NotificationServiceDb } from './notification.service.js';

interface NotificationRow {
  id: string;
  user_id: number;
  type: NotificationType;
  metadata: Record<string, unknown> | null;
  sent: boolean;
  sent_at: string | null;
  attempts: number;
  last_error: string | null;
  abandoned_at: string | null;
  created_at: string;
}

function mapRowToNotification(row: NotificationRow): Notification {
  return {
    id: row.id,
    userId: row.user_id,
    type: row.type,
    metadata: row.metadata ?? {},
    sent: row.sent,
    sentAt: row.sent_at !== null ? new Date(row.sent_at) : null,
    attempts: row.attempts,
    lastError: row.last_error,
    abandonedAt: row.abandoned_at !== null ? new Date(row.abandoned_at) : null,
    createdAt: new Date(row.created_at),
  };
}

/**
 * Create NotificationServiceDb implementation using Supabase
 */
export function createNotificationServiceDb(
  supabase: SupabaseClient
): NotificationServiceDb {
  return {
    async insertNotification(params): Promise<Notification> {
      const { data, error } = await supabase
        .from('notifications_queue')
        .insert({
          user_id: params.userId,
          type: params.type,
          metadata: params.metadata,
        })
        .select('*')
        .single();

      if (error !== null) {
        throw new Error(`Failed to queue notification: ${error.message}`);
      }

      return mapRowToNotification(data as NotificationRow);
    },

    async listUnsent(limit: number): Promise<Notification[]> {
      const { data, error } = await supabase
        .from('notifications_queue')
        .select('*')
        .eq('sent', false)
        .is('abandoned_at', null)
        .order('created_at', { ascending: true })
        .limit(limit);

      if (error !== null) {
        throw new Error(`Failed to list notifications: ${error.message}`);
      }

      return (data as NotificationRow[]).map(mapRowToNotification);
    },

    async markSent(notificationId: string, sentAt: Date): Promise<void> {
      const { error } = await supabase
        .from('notifications_queue')
        .update({ sent: true, sent_at: sentAt.toISOString() })
        .eq('id', notificationId);

      if (error !== null) {
        throw new Error(`Failed to mark notification sent: ${error.message}`);
      }
    },

    async recordFailure(notificationId, failure): Promise<void> {
      const { error } = await supabase
        .from('notifications_queue')
        .update({
          attempts: failure.attempts,
          last_error: failure.error,
          abandoned_at: failure.abandonedAt?.toISOString() ?? null,
        })
        .eq('id', notificationId);

      if (error !== null) {
        throw new Error(`Failed to record notification failure: ${error.message}`);
      }
    },
  };
}
