/**
 * Lifecycle Sweep Types
 */

import type { SubscriptionStatus } from './subscription.js';

export interface LifecycleTransition {
  subscriptionId: string;
  userId: number;
  from: SubscriptionStatus;
  to: 'grace' | 'expired';
  at: Date;
  graceUntil?: Date;
}

export interface SweepResult {
  transitions: LifecycleTransition[];
  notificationsQueued: number;
  revoked: number;
  revocationsSkipped: number;
  errors: number;
}

export interface ReminderResult {
  remindersQueued: number;
  errors: number;
}
