/**
 * Core type definitions
 * This file exports all shared types used across the application
 */

export type { Result, Success, Failure, ErrorCode } from './result.js';
export {
  success,
  failure,
  failureFromError,
  isSuccess,
  isFailure,
} from './result.js';
export type { ActorContext, Permission } from './auth.js';
export {
  SYSTEM_ACTOR,
  SERVICE_PERMISSIONS,
  OPERATOR_PERMISSIONS,
  hasPermission,
} from './auth.js';
export type { AuditActorType, AuditEvent, AuditLog } from './audit.js';
export type { User, UserStatus, UpsertUserParams } from './user.js';
export type {
  PaymentKind,
  Payment,
  NewPayment,
  RecordOutcome,
  PaymentEvent,
  FailedPaymentEntry,
} from './payment.js';
export { PAYMENT_KINDS } from './payment.js';
export type {
  SubscriptionStatus,
  RevocationState,
  Subscription,
  SubscriptionWindow,
  SubscriptionTransition,
  AccessStatus,
  CancelResult,
} from './subscription.js';
export { CURRENT_STATUSES } from './subscription.js';
export type {
  FinalizationStatus,
  FinalizationTask,
  FinalizeOutcome,
  EnterOutcome,
} from './access.js';
export { BACKOFF_SCHEDULE_MS } from './access.js';
export type {
  ReconciliationCursor,
  ExternalTransaction,
  LedgerPage,
  ReconciliationRunResult,
} from './reconciliation.js';
export type {
  LifecycleTransition,
  SweepResult,
  ReminderResult,
} from './lifecycle.js';
export type {
  NotificationType,
  Notification,
  NotificationBatchResult,
} from './notification.js';
export { NotificationUndeliverableError } from './notification.js';
export type {
  GrantResult,
  RevokeResult,
  AccessPlatform,
  TransactionLedger,
  ExemptionChecker,
  Notifier,
} from './platform.js';
export type { AccessPolicy } from './policy.js';
export { DEFAULT_ACCESS_POLICY, HOUR_MS, DAY_MS } from './policy.js';
