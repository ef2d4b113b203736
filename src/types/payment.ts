/**
 * Payment Domain Types
 *
 * A Payment is an immutable fact. At most one row exists per non-null
 * chargeId and per non-null externalTxId; the storage layer enforces it.
 */

export type PaymentKind = 'one_time' | 'recurring_initial' | 'recurring_renewal';

export const PAYMENT_KINDS: readonly PaymentKind[] = [
  'one_time',
  'recurring_initial',
  'recurring_renewal',
] as const;

export interface Payment {
  id: string;
  userId: number;
  chargeId: string | null;
  externalTxId: string | null;
  amount: number;
  currency: string;
  kind: PaymentKind;
  isRecurring: boolean;
  subscriptionExpirationHint: Date | null;
  invoicePayload: string | null;
  subscriptionId: string | null;
  appliedAt: Date | null; // set by the ledger when the payment extended access
  createdAt: Date;
}

/**
 * A payment proposed by either ingestion path (live event or reconciliation)
 */
export interface NewPayment {
  userId: number;
  chargeId: string | null;
  externalTxId: string | null;
  amount: number;
  currency?: string;
  kind: PaymentKind;
  isRecurring: boolean;
  subscriptionExpirationHint?: Date | null;
  invoicePayload?: string | null;
  createdAt?: Date;
}

/**
 * Outcome of PaymentStore.record()
 * Duplicates are a normal outcome, not an error.
 */
export type RecordOutcome =
  | { outcome: 'inserted'; payment: Payment }
  | { outcome: 'already_exists'; payment: Payment };

/**
 * Live payment event as delivered by the transport layer
 */
export interface PaymentEvent {
  userId: number;
  chargeId: string;
  externalTxId?: string | null;
  amount: number;
  kind: PaymentKind;
  recurringExpiry?: Date | null;
  invoicePayload?: string | null;
  user?: {
    username?: string | null;
    firstName?: string | null;
    lastName?: string | null;
    languageCode?: string | null;
  };
}

/**
 * Failed-payment queue entry for manual review
 */
export interface FailedPaymentEntry {
  userId: number;
  chargeId: string | null;
  error: string;
  rawEvent: Record<string, unknown>;
}
