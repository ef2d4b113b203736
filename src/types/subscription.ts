/**
 * Subscription Domain Types
 *
 * One logical current row per user (status pending, active, grace or
 * cancelled). Expired rows are history.
 */

export type SubscriptionStatus =
  | 'pending'
  | 'active'
  | 'grace'
  | 'expired'
  | 'cancelled';

/**
 * Statuses that make a row the user's current subscription
 */
export const CURRENT_STATUSES: readonly SubscriptionStatus[] = [
  'pending',
  'active',
  'grace',
  'cancelled',
] as const;

/**
 * Outcome of revoking external access after expiry
 * - done: revoked on the platform
 * - skipped: user is exempt
 * - superseded: user holds access through a newer row
 * - failed: the platform kept refusing; needs manual removal
 */
export type RevocationState = 'done' | 'skipped' | 'superseded' | 'failed';

export interface Subscription {
  id: string;
  userId: number;
  status: SubscriptionStatus;
  expiresAt: Date | null;
  graceUntil: Date | null;
  isRecurring: boolean;
  cancelledAt: Date | null;
  reminderSentAt: Date | null;
  graceNotifiedAt: Date | null;
  revocationState: RevocationState | null;
  revocationAttempts: number;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Fields written when a payment is applied
 */
export interface SubscriptionWindow {
  status: 'active';
  expiresAt: Date;
  isRecurring: boolean;
}

/**
 * Result of SubscriptionLedger.apply()
 */
export type SubscriptionTransition =
  | {
      kind: 'activated' | 'extended';
      subscriptionId: string;
      userId: number;
      previousStatus: SubscriptionStatus | null;
      previousExpiresAt: Date | null;
      expiresAt: Date;
      isRecurring: boolean;
    }
  | {
      kind: 'noop';
      userId: number;
      reason: 'already_applied';
    };

/**
 * Read model for user-facing status queries
 */
export interface AccessStatus {
  userId: number;
  status: SubscriptionStatus | 'none';
  expiresAt: Date | null;
  graceUntil: Date | null;
  isRecurring: boolean;
  cancelledAt: Date | null;
  hasAccess: boolean;
}

export interface CancelResult {
  userId: number;
  cancelledAt: Date;
  expiresAt: Date | null;
  stoppedRecurring: boolean;
}
