/**
 * PaymentService Database Adapter
 * Implements PaymentServiceDb interface using Supabase
 *
 * Uniqueness of charge_id and external_tx_id comes from partial unique
 * indexes; a 23505 from PostgREST is the duplicate signal.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import { NO_ROWS, UNIQUE_VIOLATION } from '../lib/supabase.js';
import type { NewPayment, Payment, PaymentKind } from '../types/index.js';

import type { NaturalKeys, PaymentServiceDb } from './payment.service.js';

/**
 * Database row type
 */
interface PaymentRow {
  id: string;
  user_id: number;
  charge_id: string | null;
  external_tx_id: string | null;
  amount: number;
  currency: string;
  kind: PaymentKind;
  is_recurring: boolean;
  subscription_expiration_hint: string | null;
  invoice_payload: string | null;
  subscription_id: string | null;
  applied_at: string | null;
  created_at: string;
}

function toDate(value: string | null): Date | null {
  return value !== null ? new Date(value) : null;
}

export function mapRowToPayment(row: PaymentRow): Payment {
  return {
    id: row.id,
    userId: row.user_id,
    chargeId: row.charge_id,
    externalTxId: row.external_tx_id,
    amount: row.amount,
    currency: row.currency,
    kind: row.kind,
    isRecurring: row.is_recurring,
    subscriptionExpirationHint: toDate(row.subscription_expiration_hint),
    invoicePayload: row.invoice_payload,
    subscriptionId: row.subscription_id,
    appliedAt: toDate(row.applied_at),
    createdAt: new Date(row.created_at),
  };
}

/**
 * Create PaymentServiceDb implementation using Supabase
 */
export function createPaymentServiceDb(supabase: SupabaseClient): PaymentServiceDb {
  async function findOne(column: string, value: string): Promise<Payment | null> {
    const { data, error } = await supabase
      .from('payments')
      .select('*')
      .eq(column, value)
      .single();

    if (error !== null) {
      if (error.code === NO_ROWS) {
        return null;
      }
      throw new Error(`Failed to get payment: ${error.message}`);
    }

    return mapRowToPayment(data as PaymentRow);
  }

  return {
    async insertPayment(payment: NewPayment): Promise<Payment | null> {
      const row: Record<string, unknown> = {
        user_id: payment.userId,
        charge_id: payment.chargeId,
        external_tx_id: payment.externalTxId,
        amount: payment.amount,
        currency: payment.currency ?? 'XTR',
        kind: payment.kind,
        is_recurring: payment.isRecurring,
        subscription_expiration_hint:
          payment.subscriptionExpirationHint?.toISOString() ?? null,
        invoice_payload: payment.invoicePayload ?? null,
      };
      if (payment.createdAt !== undefined) {
        row.created_at = payment.createdAt.toISOString();
      }

      const { data, error } = await supabase
        .from('payments')
        .insert(row)
        .select('*')
        .single();

      if (error !== null) {
        if (error.code === UNIQUE_VIOLATION) {
          return null;
        }
        throw new Error(`Failed to insert payment: ${error.message}`);
      }

      return mapRowToPayment(data as PaymentRow);
    },

    async getPayment(paymentId: string): Promise<Payment | null> {
      return findOne('id', paymentId);
    },

    async findByChargeId(chargeId: string): Promise<Payment | null> {
      return findOne('charge_id', chargeId);
    },

    async findByExternalTxId(externalTxId: string): Promise<Payment | null> {
      return findOne('external_tx_id', externalTxId);
    },

    async attachNaturalKeys(
      paymentId: string,
      keys: NaturalKeys
    ): Promise<Payment | null> {
      let current: Payment | null = null;

      // One column per update so each only fills a NULL
      for (const [column, value] of [
        ['charge_id', keys.chargeId],
        ['external_tx_id', keys.externalTxId],
      ] as const) {
        if (value === undefined) {
          continue;
        }
        const { data, error } = await supabase
          .from('payments')
          .update({ [column]: value })
          .eq('id', paymentId)
          .is(column, null)
          .select('*');

        if (error !== null) {
          if (error.code === UNIQUE_VIOLATION) {
            return null;
          }
          throw new Error(`Failed to link payment keys: ${error.message}`);
        }
        const rows = data as PaymentRow[];
        if (rows.length > 0) {
          current = mapRowToPayment(rows[0]);
        }
      }

      return current ?? findOne('id', paymentId);
    },

    async listUserPayments(userId: number, limit: number): Promise<Payment[]> {
      const { data, error } = await supabase
        .from('payments')
        .select('*')
        .eq('user_id', userId)
        .order('created_at', { ascending: false })
        .limit(limit);

      if (error !== null) {
        throw new Error(`Failed to list payments: ${error.message}`);
      }

      return (data as PaymentRow[]).map(mapRowToPayment);
    },
  };
}
