/**
 * Service Layer Exports
 *
 * Services are the ONLY gateway to the database.
 * All business logic lives here.
 */

// AuditService
export type { AuditService, AuditServiceDb } from './audit.service.js';
export { createAuditService } from './audit.service.js';
export { createAuditServiceDb } from './audit.db.js';

// UserService
export type {
  UserService,
  UserServiceDb,
  UserServiceAudit,
} from './user.service.js';
export { createUserService } from './user.service.js';
export { createUserServiceDb } from './user.db.js';

// PaymentService (PaymentStore)
export type {
  PaymentService,
  PaymentServiceDb,
  PaymentServiceAudit,
  NaturalKeys,
} from './payment.service.js';
export { createPaymentService } from './payment.service.js';
export { createPaymentServiceDb } from './payment.db.js';

// SubscriptionService (SubscriptionLedger)
export type {
  SubscriptionService,
  SubscriptionServiceDb,
  SubscriptionServiceAudit,
  SubscriptionPatch,
  ApplyPaymentOutcome,
  DueQuery,
} from './subscription.service.js';
export {
  createSubscriptionService,
  computeTransition,
  accessEndsAt,
  isAccessValid,
} from './subscription.service.js';
export { createSubscriptionServiceDb } from './subscription.db.js';

// AccessService (AccessFinalizer)
export type { AccessService, AccessServiceDb } from './access.service.js';
export { createAccessService } from './access.service.js';
export { createAccessServiceDb } from './access.db.js';

// NotificationService
export type {
  NotificationService,
  NotificationServiceDb,
} from './notification.service.js';
export { createNotificationService } from './notification.service.js';
export { createNotificationServiceDb } from './notification.db.js';

// ReconciliationService (ReconciliationEngine)
export type {
  ReconciliationService,
  ReconciliationServiceDb,
} from './reconciliation.service.js';
export {
  createReconciliationService,
  computeWindowStart,
  transactionToPayment,
} from './reconciliation.service.js';
export { createReconciliationServiceDb } from './reconciliation.db.js';

// LifecycleService (LifecycleScheduler)
export type { LifecycleService } from './lifecycle.service.js';
export { createLifecycleService } from './lifecycle.service.js';

// IngestionService
export type {
  IngestionService,
  IngestionServiceDb,
  IngestOutcome,
  SubmitReceipt,
} from './ingestion.service.js';
export { createIngestionService, eventToPayment } from './ingestion.service.js';
export { createIngestionServiceDb } from './ingestion.db.js';

// Exemptions
export { createWhitelistExemptionChecker } from './exemption.db.js';
