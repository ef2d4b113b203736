/**
 * SubscriptionService Database Adapter
 * Implements SubscriptionServiceDb interface using Supabase
 *
 * Every write goes through a version-guarded update or the
 * apply_subscription_payment function (see supabase/migrations).
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import { NO_ROWS, UNIQUE_VIOLATION } from '../lib/supabase.js';
import type {
  RevocationState,
  Subscription,
  SubscriptionStatus,
} from '../types/index.js';
import { CURRENT_STATUSES } from '../types/index.js';

import type {
  ApplyPaymentOutcome,
  DueQuery,
  SubscriptionPatch,
  SubscriptionServiceDb,
} from './subscription.service.js';

/**
 * Database row type
 */
interface SubscriptionRow {
  id: string;
  user_id: number;
  status: SubscriptionStatus;
  expires_at: string | null;
  grace_until: string | null;
  is_recurring: boolean;
  cancelled_at: string | null;
  reminder_sent_at: string | null;
  grace_notified_at: string | null;
  revocation_state: RevocationState | null;
  revocation_attempts: number;
  version: number;
  created_at: string;
  updated_at: string;
}

interface ApplyRpcResult {
  status: 'applied' | 'already_applied' | 'conflict';
  subscription?: SubscriptionRow;
}

function toDate(value: string | null): Date | null {
  return value !== null ? new Date(value) : null;
}

function iso(value: Date | null): string | null {
  return value !== null ? value.toISOString() : null;
}

function mapRowToSubscription(row: SubscriptionRow): Subscription {
  return {
    id: row.id,
    userId: row.user_id,
    status: row.status,
    expiresAt: toDate(row.expires_at),
    graceUntil: toDate(row.grace_until),
    isRecurring: row.is_recurring,
    cancelledAt: toDate(row.cancelled_at),
    reminderSentAt: toDate(row.reminder_sent_at),
    graceNotifiedAt: toDate(row.grace_notified_at),
    revocationState: row.revocation_state,
    revocationAttempts: row.revocation_attempts,
    version: row.version,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function patchToRow(patch: SubscriptionPatch): Record<string, unknown> {
  const row: Record<string, unknown> = {};
  if (patch.status !== undefined) row.status = patch.status;
  if (patch.graceUntil !== undefined) row.grace_until = iso(patch.graceUntil);
  if (patch.cancelledAt !== undefined) row.cancelled_at = iso(patch.cancelledAt);
  if (patch.isRecurring !== undefined) row.is_recurring = patch.isRecurring;
  if (patch.graceNotifiedAt !== undefined) {
    row.grace_notified_at = iso(patch.graceNotifiedAt);
  }
  if (patch.reminderSentAt !== undefined) {
    row.reminder_sent_at = iso(patch.reminderSentAt);
  }
  if (patch.revocationState !== undefined) {
    row.revocation_state = patch.revocationState;
  }
  if (patch.revocationAttempts !== undefined) {
    row.revocation_attempts = patch.revocationAttempts;
  }
  return row;
}

/**
 * Create SubscriptionServiceDb implementation using Supabase
 */
export function createSubscriptionServiceDb(
  supabase: SupabaseClient
): SubscriptionServiceDb {
  return {
    async getCurrentSubscription(userId: number): Promise<Subscription | null> {
      const { data, error } = await supabase
        .from('subscriptions')
        .select('*')
        .eq('user_id', userId)
        .in('status', [...CURRENT_STATUSES])
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get subscription: ${error.message}`);
      }

      return data !== null ? mapRowToSubscription(data as SubscriptionRow) : null;
    },

    async getLatestSubscription(userId: number): Promise<Subscription | null> {
      const { data, error } = await supabase
        .from('subscriptions')
        .select('*')
        .eq('user_id', userId)
        .order('created_at', { ascending: false })
        .limit(1);

      if (error !== null) {
        throw new Error(`Failed to get subscription: ${error.message}`);
      }

      const rows = data as SubscriptionRow[];
      return rows.length > 0 ? mapRowToSubscription(rows[0]) : null;
    },

    async applyPayment(params): Promise<ApplyPaymentOutcome> {
      const { data, error } = await supabase.rpc('apply_subscription_payment', {
        p_payment_id: params.paymentId,
        p_user_id: params.userId,
        p_subscription_id: params.subscriptionId,
        p_expected_version: params.expectedVersion,
        p_expires_at: params.window.expiresAt.toISOString(),
        p_is_recurring: params.window.isRecurring,
        p_now: params.appliedAt.toISOString(),
      });

      if (error !== null) {
        throw new Error(`Failed to apply payment: ${error.message}`);
      }

      const result = data as ApplyRpcResult;
      if (result.status === 'applied') {
        if (result.subscription === undefined) {
          throw new Error('apply_subscription_payment returned no subscription');
        }
        return {
          status: 'applied',
          subscription: mapRowToSubscription(result.subscription),
        };
      }
      return { status: result.status };
    },

    async insertPendingSubscription(
      userId: number,
      now: Date
    ): Promise<Subscription | null> {
      const { data, error } = await supabase
        .from('subscriptions')
        .insert({
          user_id: userId,
          status: 'pending',
          is_recurring: false,
          created_at: now.toISOString(),
          updated_at: now.toISOString(),
        })
        .select('*')
        .single();

      if (error !== null) {
        if (error.code === UNIQUE_VIOLATION) {
          return null;
        }
        throw new Error(`Failed to create subscription: ${error.message}`);
      }

      return mapRowToSubscription(data as SubscriptionRow);
    },

    async updateSubscription(
      subscriptionId: string,
      expectedVersion: number,
      patch: SubscriptionPatch,
      now: Date
    ): Promise<Subscription | null> {
      const { data, error } = await supabase
        .from('subscriptions')
        .update({
          ...patchToRow(patch),
          version: expectedVersion + 1,
          updated_at: now.toISOString(),
        })
        .eq('id', subscriptionId)
        .eq('version', expectedVersion)
        .select('*')
        .single();

      if (error !== null) {
        if (error.code === NO_ROWS) {
          return null;
        }
        throw new Error(`Failed to update subscription: ${error.message}`);
      }

      return mapRowToSubscription(data as SubscriptionRow);
    },

    async listDue(query: DueQuery, limit: number): Promise<Subscription[]> {
      let request = supabase.from('subscriptions').select('*');

      switch (query.due) {
        case 'grace':
          request = request
            .in('status', ['active', 'cancelled'])
            .is('grace_until', null)
            .lt('expires_at', query.now.toISOString());
          break;
        case 'expiry':
          request = request
            .in('status', ['grace', 'cancelled'])
            .not('grace_until', 'is', null)
            .lt('grace_until', query.now.toISOString());
          break;
        case 'grace_notification':
          request = request.eq('status', 'grace').is('grace_notified_at', null);
          break;
        case 'revocation':
          request = request.eq('status', 'expired').is('revocation_state', null);
          break;
        case 'reminder':
          request = request
            .eq('status', 'active')
            .eq('is_recurring', false)
            .gt('expires_at', query.now.toISOString())
            .lte('expires_at', query.horizon.toISOString())
            .or(
              `reminder_sent_at.is.null,reminder_sent_at.lt.${query.remindedBefore.toISOString()}`
            );
          break;
      }

      const { data, error } = await request
        .order('updated_at', { ascending: true })
        .limit(limit);

      if (error !== null) {
        throw new Error(`Failed to list subscriptions: ${error.message}`);
      }

      return (data as SubscriptionRow[]).map(mapRowToSubscription);
    },

    async getLatestRecurringChargeId(userId: number): Promise<string | null> {
      const { data, error } = await supabase
        .from('payments')
        .select('charge_id')
        .eq('user_id', userId)
        .eq('is_recurring', true)
        .not('charge_id', 'is', null)
        .order('created_at', { ascending: false })
        .limit(1);

      if (error !== null) {
        throw new Error(`Failed to find recurring charge: ${error.message}`);
      }

      const rows = data as Array<{ charge_id: string }>;
      return rows.length > 0 ? rows[0].charge_id : null;
    },
  };
}
