/**
 * IngestionService Implementation
 *
 * Entry point for live payment events. submit() accepts immediately;
 * process() runs: upsert user -> record payment -> apply -> finalize.
 *
 * Every step is safe to re-run from the top, so a redelivered event
 * converges instead of double-extending. A duplicate still schedules
 * finalization: a repeated delivery of a real payment must still end
 * with access granted.
 *
 * Dependencies: UserService, PaymentService, SubscriptionService,
 * AccessService, NotificationService
 */

import type { Logger } from 'pino';

import { getLogger } from '../lib/logger.js';
import type {
  ActorContext,
  FailedPaymentEntry,
  NewPayment,
  NotificationType,
  Payment,
  PaymentEvent,
  RecordOutcome,
  Result,
  SubscriptionTransition,
  UpsertUserParams,
  User,
} from '../types/index.js';
import {
  PAYMENT_KINDS,
  success,
  failure,
  hasPermission,
  isFailure,
} from '../types/index.js';

/**
 * Database abstraction interface for IngestionService
 */
export interface IngestionServiceDb {
  enqueueFailedPayment: (entry: FailedPaymentEntry) => Promise<void>;
}

export interface IngestionDeps {
  upsertUser: (actor: ActorContext, params: UpsertUserParams) => Promise<Result<User>>;
  record: (actor: ActorContext, payment: NewPayment) => Promise<Result<RecordOutcome>>;
  apply: (actor: ActorContext, payment: Payment) => Promise<Result<SubscriptionTransition>>;
  schedule: (actor: ActorContext, userId: number) => void;
  queue: (
    actor: ActorContext,
    userId: number,
    type: NotificationType,
    metadata?: Record<string, unknown>
  ) => Promise<Result<unknown>>;
}

export interface IngestOutcome {
  userId: number;
  paymentId: string;
  outcome: 'applied' | 'duplicate';
  transition: SubscriptionTransition | null;
}

export interface SubmitReceipt {
  accepted: true;
  userId: number;
  chargeId: string;
}

/**
 * IngestionService interface
 */
export interface IngestionService {
  submit(actor: ActorContext, event: PaymentEvent): Result<SubmitReceipt>;
  process(actor: ActorContext, event: PaymentEvent): Promise<Result<IngestOutcome>>;
  whenIdle(): Promise<void>;
}

function validateEvent(event: PaymentEvent): string | null {
  if (!Number.isSafeInteger(event.userId) || event.userId <= 0) {
    return 'userId must be a positive integer';
  }
  if (event.chargeId.trim() === '') {
    return 'chargeId is required';
  }
  if (!Number.isFinite(event.amount) || event.amount < 0) {
    return 'amount must be a non-negative number';
  }
  if (!PAYMENT_KINDS.includes(event.kind)) {
    return `Unknown payment kind: ${String(event.kind)}`;
  }
  return null;
}

export function eventToPayment(event: PaymentEvent): NewPayment {
  return {
    userId: event.userId,
    chargeId: event.chargeId,
    externalTxId: event.externalTxId ?? null,
    amount: event.amount,
    kind: event.kind,
    isRecurring: event.kind !== 'one_time',
    subscriptionExpirationHint: event.recurringExpiry ?? null,
    invoicePayload: event.invoicePayload ?? null,
  };
}

function serializeEvent(event: PaymentEvent): Record<string, unknown> {
  return {
    ...event,
    recurringExpiry: event.recurringExpiry?.toISOString() ?? null,
  };
}

/**
 * Create IngestionService instance
 */
export function createIngestionService(deps: {
  db: IngestionServiceDb;
  services: IngestionDeps;
  logger?: Logger;
}): IngestionService {
  const { db, services } = deps;
  const log = (deps.logger ?? getLogger()).child({ component: 'ingestion' });
  const inFlight = new Set<Promise<unknown>>();

  async function parkFailedPayment(
    event: PaymentEvent,
    code: string,
    message: string
  ): Promise<void> {
    log.error({ userId: event.userId, chargeId: event.chargeId, code, message }, 'payment.processing_failed');
    try {
      await db.enqueueFailedPayment({
        userId: event.userId,
        chargeId: event.chargeId,
        error: `${code}: ${message}`,
        rawEvent: serializeEvent(event),
      });
    } catch (err) {
      log.error({ err, userId: event.userId, chargeId: event.chargeId }, 'payment.failed_queue_unavailable');
    }
  }

  async function runProcess(
    actor: ActorContext,
    event: PaymentEvent
  ): Promise<Result<IngestOutcome>> {
    const user = await services.upsertUser(actor, {
      userId: event.userId,
      username: event.user?.username,
      firstName: event.user?.firstName,
      lastName: event.user?.lastName,
      languageCode: event.user?.languageCode,
    });
    if (isFailure(user)) {
      return user;
    }

    const recorded = await services.record(actor, eventToPayment(event));
    if (isFailure(recorded)) {
      return recorded;
    }

    const { outcome, payment } = recorded.data;
    if (outcome === 'already_exists' && payment.appliedAt !== null) {
      log.info({ userId: event.userId, paymentId: payment.id }, 'payment.duplicate_delivery');
      services.schedule(actor, payment.userId);
      return success({
        userId: payment.userId,
        paymentId: payment.id,
        outcome: 'duplicate',
        transition: null,
      });
    }

    const applied = await services.apply(actor, payment);
    if (isFailure(applied)) {
      return applied;
    }

    const transition = applied.data;
    if (transition.kind !== 'noop') {
      const type: NotificationType =
        payment.kind === 'recurring_renewal' ? 'subscription_renewed' : 'payment_received';
      const queued = await services.queue(actor, payment.userId, type, {
        expiresAt: transition.expiresAt.toISOString(),
        amount: payment.amount,
      });
      if (isFailure(queued)) {
        log.warn({ userId: payment.userId, error: queued.error }, 'payment.notification_failed');
      }
    }

    services.schedule(actor, payment.userId);
    return success({
      userId: payment.userId,
      paymentId: payment.id,
      outcome: transition.kind === 'noop' ? 'duplicate' : 'applied',
      transition: transition.kind === 'noop' ? null : transition,
    });
  }

  const service: IngestionService = {
    /**
     * Accept an event and process it after returning
     * Requires: 'payments:write' permission
     */
    submit(actor: ActorContext, event: PaymentEvent): Result<SubmitReceipt> {
      if (!hasPermission(actor, 'payments:write')) {
        return failure('PERMISSION_DENIED', 'Actor lacks payments:write permission');
      }
      const validationError = validateEvent(event);
      if (validationError !== null) {
        return failure('VALIDATION_ERROR', validationError);
      }

      const task = service.process(actor, event).finally(() => {
        inFlight.delete(task);
      });
      inFlight.add(task);

      return success({ accepted: true, userId: event.userId, chargeId: event.chargeId });
    },

    /**
     * Requires: 'payments:write' permission
     */
    async process(actor: ActorContext, event: PaymentEvent): Promise<Result<IngestOutcome>> {
      if (!hasPermission(actor, 'payments:write')) {
        return failure('PERMISSION_DENIED', 'Actor lacks payments:write permission');
      }
      const validationError = validateEvent(event);
      if (validationError !== null) {
        return failure('VALIDATION_ERROR', validationError);
      }

      let result: Result<IngestOutcome>;
      try {
        result = await runProcess(actor, event);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        result = failure('INTERNAL_ERROR', message);
      }

      if (isFailure(result) && result.error.code !== 'VALIDATION_ERROR') {
        await parkFailedPayment(event, result.error.code, result.error.message);
      }
      return result;
    },

    async whenIdle(): Promise<void> {
      while (inFlight.size > 0) {
        await Promise.allSettled([...inFlight]);
      }
    },
  };

  return service;
}
