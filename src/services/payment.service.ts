/**
 * PaymentService Implementation (PaymentStore)
 *
 * SCOPE: Idempotent record of every accepted payment
 * NOT IN SCOPE: Subscription windows (SubscriptionService), platform access
 *
 * GUARDRAILS:
 * - Duplicate natural keys are a normal outcome, never an error
 * - Duplicate detection is the storage unique constraint, never check-then-insert
 * - Payment rows are immutable apart from key linking and the ledger's applied mark
 *
 * Dependencies: AuditService
 */

import type { Logger } from 'pino';

import { getLogger } from '../lib/logger.js';
import type {
  ActorContext,
  AuditEvent,
  NewPayment,
  Payment,
  RecordOutcome,
  Result,
} from '../types/index.js';
import {
  PAYMENT_KINDS,
  success,
  failure,
  failureFromError,
  hasPermission,
} from '../types/index.js';

/**
 * Natural keys to attach to an existing row
 */
export interface NaturalKeys {
  chargeId?: string;
  externalTxId?: string;
}

/**
 * Database abstraction interface for PaymentService
 */
export interface PaymentServiceDb {
  /** Returns null when a unique natural key already exists */
  insertPayment: (payment: NewPayment) => Promise<Payment | null>;
  getPayment: (paymentId: string) => Promise<Payment | null>;
  findByChargeId: (chargeId: string) => Promise<Payment | null>;
  findByExternalTxId: (externalTxId: string) => Promise<Payment | null>;
  /** Fills null key columns only. Returns null when another row holds the key. */
  attachNaturalKeys: (paymentId: string, keys: NaturalKeys) => Promise<Payment | null>;
  listUserPayments: (userId: number, limit: number) => Promise<Payment[]>;
}

/**
 * Minimal AuditService interface
 */
export interface PaymentServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

/**
 * PaymentService interface
 */
export interface PaymentService {
  record(actor: ActorContext, payment: NewPayment): Promise<Result<RecordOutcome>>;
  getPayment(actor: ActorContext, paymentId: string): Promise<Result<Payment>>;
  listUserPayments(
    actor: ActorContext,
    userId: number,
    limit?: number
  ): Promise<Result<Payment[]>>;
}

const MAX_KEY_LENGTH = 255;
const DEFAULT_LIST_LIMIT = 50;

function isPresent(value: string | null): value is string {
  return value !== null && value !== '';
}

function validatePayment(payment: NewPayment): string | null {
  if (!Number.isSafeInteger(payment.userId) || payment.userId <= 0) {
    return 'userId must be a positive integer';
  }
  if (!isPresent(payment.chargeId) && !isPresent(payment.externalTxId)) {
    return 'At least one of chargeId or externalTxId is required';
  }
  if (
    (payment.chargeId?.length ?? 0) > MAX_KEY_LENGTH ||
    (payment.externalTxId?.length ?? 0) > MAX_KEY_LENGTH
  ) {
    return `Natural keys must be ${MAX_KEY_LENGTH} characters or less`;
  }
  if (!Number.isFinite(payment.amount) || payment.amount < 0) {
    return 'amount must be a non-negative number';
  }
  if (!PAYMENT_KINDS.includes(payment.kind)) {
    return `Unknown payment kind: ${String(payment.kind)}`;
  }
  return null;
}

/**
 * Keys the proposal carries that the stored row is missing
 */
function missingKeys(existing: Payment, proposed: NewPayment): NaturalKeys | null {
  const keys: NaturalKeys = {};
  if (existing.chargeId === null && isPresent(proposed.chargeId)) {
    keys.chargeId = proposed.chargeId;
  }
  if (existing.externalTxId === null && isPresent(proposed.externalTxId)) {
    keys.externalTxId = proposed.externalTxId;
  }
  return keys.chargeId !== undefined || keys.externalTxId !== undefined
    ? keys
    : null;
}

/**
 * Create PaymentService instance
 */
export function createPaymentService(deps: {
  db: PaymentServiceDb;
  auditService: PaymentServiceAudit;
  logger?: Logger;
}): PaymentService {
  const { db, auditService } = deps;
  const log = (deps.logger ?? getLogger()).child({ component: 'payment-store' });

  // ─────────────────────────────────────────────────────────────
  // HELPER FUNCTIONS
  // ─────────────────────────────────────────────────────────────

  async function findExisting(payment: NewPayment): Promise<Payment | null> {
    if (isPresent(payment.chargeId)) {
      const byCharge = await db.findByChargeId(payment.chargeId);
      if (byCharge !== null) {
        return byCharge;
      }
    }
    if (isPresent(payment.externalTxId)) {
      return db.findByExternalTxId(payment.externalTxId);
    }
    return null;
  }

  async function linkKeys(existing: Payment, proposed: NewPayment): Promise<Payment> {
    const keys = missingKeys(existing, proposed);
    if (keys === null) {
      return existing;
    }

    const linked = await db.attachNaturalKeys(existing.id, keys);
    if (linked === null) {
      log.warn(
        { paymentId: existing.id, keys },
        'payment.link_conflict: key already held by another row'
      );
      return existing;
    }
    return linked;
  }

  // ─────────────────────────────────────────────────────────────
  // SERVICE IMPLEMENTATION
  // ─────────────────────────────────────────────────────────────

  return {
    /**
     * Record a payment fact
     * Requires: 'payments:write' permission
     */
    async record(
      actor: ActorContext,
      payment: NewPayment
    ): Promise<Result<RecordOutcome>> {
      if (!hasPermission(actor, 'payments:write')) {
        return failure('PERMISSION_DENIED', 'Actor lacks payments:write permission');
      }

      const validationError = validatePayment(payment);
      if (validationError !== null) {
        return failure('VALIDATION_ERROR', validationError);
      }

      try {
        const inserted = await db.insertPayment(payment);
        if (inserted !== null) {
          log.info(
            {
              paymentId: inserted.id,
              userId: inserted.userId,
              kind: inserted.kind,
              amount: inserted.amount,
            },
            'payment.recorded'
          );
          await auditService.log(actor, {
            action: 'payment.recorded',
            resourceType: 'payment',
            resourceId: inserted.id,
            userId: inserted.userId,
            details: {
              chargeId: inserted.chargeId,
              externalTxId: inserted.externalTxId,
              amount: inserted.amount,
              kind: inserted.kind,
            },
          });
          return success({ outcome: 'inserted', payment: inserted });
        }

        const existing = await findExisting(payment);
        if (existing === null) {
          // Unique violation on a key no row holds: the conflicting row vanished
          return failure(
            'CONFLICT',
            'Payment insert conflicted but no existing row was found'
          );
        }

        if (existing.userId !== payment.userId) {
          log.warn(
            {
              paymentId: existing.id,
              storedUserId: existing.userId,
              proposedUserId: payment.userId,
            },
            'payment.user_mismatch'
          );
        }

        const linked = await linkKeys(existing, payment);
        log.debug({ paymentId: linked.id }, 'payment.duplicate');
        return success({ outcome: 'already_exists', payment: linked });
      } catch (err) {
        log.error({ err, userId: payment.userId }, 'payment.record_failed');
        return failureFromError('STORAGE_UNAVAILABLE', 'Failed to record payment', err);
      }
    },

    async getPayment(
      actor: ActorContext,
      paymentId: string
    ): Promise<Result<Payment>> {
      if (!hasPermission(actor, 'subscriptions:read')) {
        return failure(
          'PERMISSION_DENIED',
          'Actor lacks subscriptions:read permission'
        );
      }

      try {
        const payment = await db.getPayment(paymentId);
        if (payment === null) {
          return failure('NOT_FOUND', `Payment not found: ${paymentId}`);
        }
        return success(payment);
      } catch (err) {
        return failureFromError('STORAGE_UNAVAILABLE', 'Failed to read payment', err);
      }
    },

    async listUserPayments(
      actor: ActorContext,
      userId: number,
      limit: number = DEFAULT_LIST_LIMIT
    ): Promise<Result<Payment[]>> {
      if (!hasPermission(actor, 'subscriptions:read')) {
        return failure(
          'PERMISSION_DENIED',
          'Actor lacks subscriptions:read permission'
        );
      }

      try {
        const payments = await db.listUserPayments(userId, Math.max(1, limit));
        return success(payments);
      } catch (err) {
        return failureFromError('STORAGE_UNAVAILABLE', 'Failed to list payments', err);
      }
    },
  };
}
