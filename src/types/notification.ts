/**
 * Notification Queue Types
 */

export type NotificationType =
  | 'payment_received'
  | 'subscription_renewed'
  | 'grace_period_started'
  | 'subscription_expired'
  | 'expiry_reminder'
  | 'access_pending';

export interface Notification {
  id: string;
  userId: number;
  type: NotificationType;
  metadata: Record<string, unknown>;
  sent: boolean;
  sentAt: Date | null;
  /** Failed delivery attempts so far */
  attempts: number;
  lastError: string | null;
  /** Set once delivery is given up; the row is never retried after that */
  abandonedAt: Date | null;
  createdAt: Date;
}

/**
 * Thrown by a Notifier when the member can never receive messages,
 * e.g. they blocked the bot. The queue stops retrying such rows at once.
 */
export class NotificationUndeliverableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotificationUndeliverableError';
  }
}

export interface NotificationBatchResult {
  processed: number;
  sent: number;
  errors: number;
}
