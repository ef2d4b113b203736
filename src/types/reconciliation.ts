/**
 * Reconciliation Types
 */

/**
 * Singleton cursor row. Only ever moves forward.
 */
export interface ReconciliationCursor {
  lastSeenAt: Date | null;
  lastSeenTxId: string | null;
  updatedAt: Date | null;
}

/**
 * Transaction as reported by the external ledger
 */
export interface ExternalTransaction {
  id: string;
  userId: number | null; // null for transactions not sourced from a user
  amount: number;
  date: Date;
  chargeId: string | null;
  isRecurring: boolean | null; // null when the ledger cannot tell
  subscriptionExpiresAt: Date | null;
  invoicePayload: string | null;
}

export interface LedgerPage {
  transactions: ExternalTransaction[];
  hasMore: boolean;
}

export interface ReconciliationRunResult {
  paymentsFound: number;
  transactionsScanned: number;
  repaired: number;
  windowStart: Date;
  cursorAdvancedTo: Date | null;
}
