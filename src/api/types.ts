/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { AuditService } from '../services/audit.service.js';
import type { AccessService } from '../services/access.service.js';
import type { IngestionService } from '../services/ingestion.service.js';
import type { PaymentService } from '../services/payment.service.js';
import type { ReconciliationService } from '../services/reconciliation.service.js';
import type { SubscriptionService } from '../services/subscription.service.js';
import type { UserService } from '../services/user.service.js';
import type { ActorContext, ErrorCode } from '../types/index.js';
import type { JobRunner } from '../workers/job-runner.js';

/**
 * Extended Hono context with actor
 */
declare module 'hono' {
  interface ContextVariableMap {
    actor: ActorContext;
    requestId: string;
  }
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta?: {
    requestId: string;
  };
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

export type ErrorStatus = 400 | 401 | 402 | 403 | 404 | 409 | 500 | 502 | 503;

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Record<ErrorCode, ErrorStatus> = {
  VALIDATION_ERROR: 400,
  UNAUTHORIZED: 401,
  NO_ACTIVE_ACCESS: 402,
  PERMISSION_DENIED: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  JOB_IN_PROGRESS: 409,
  INTERNAL_ERROR: 500,
  LEDGER_UNAVAILABLE: 502,
  PLATFORM_ERROR: 502,
  STORAGE_UNAVAILABLE: 503,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: ErrorCode): ErrorStatus {
  return ERROR_STATUS_MAP[code];
}

/**
 * Service context for dependency injection
 */
export interface ApiServices {
  auditService: Pick<AuditService, 'getUserHistory'>;
  userService: Pick<UserService, 'upsertUser' | 'getUser'>;
  paymentService: Pick<PaymentService, 'listUserPayments'>;
  subscriptionService: Pick<SubscriptionService, 'getStatus' | 'beginCheckout' | 'cancel'>;
  accessService: Pick<AccessService, 'enter'>;
  ingestionService: Pick<IngestionService, 'submit'>;
  reconciliationService: Pick<ReconciliationService, 'getCursor'>;
  jobRunner: JobRunner;
}
