/**
 * SubscriptionService Implementation (SubscriptionLedger)
 *
 * SCOPE: Per-user access window and lifecycle status
 *
 * GUARDRAILS:
 * - Only this service writes subscriptions.status
 * - At most one current row (pending, active, grace, cancelled) per user
 * - A payment extends access at most once: its applied mark and the
 *   subscription write commit together, guarded by the row version
 * - Time-driven transitions are executed by LifecycleService through
 *   enterGrace() / expire(), never by apply()
 *
 * Dependencies: AuditService, AccessPlatform (stopRecurring, optional)
 */

import type { Logger } from 'pino';

import { getLogger } from '../lib/logger.js';
import type {
  AccessPlatform,
  AccessPolicy,
  AccessStatus,
  ActorContext,
  AuditEvent,
  CancelResult,
  Payment,
  RevocationState,
  Result,
  Subscription,
  SubscriptionTransition,
  SubscriptionWindow,
} from '../types/index.js';
import {
  DAY_MS,
  DEFAULT_ACCESS_POLICY,
  HOUR_MS,
  success,
  failure,
  failureFromError,
  hasPermission,
} from '../types/index.js';

// ─────────────────────────────────────────────────────────────
// PURE LEDGER RULES
// ─────────────────────────────────────────────────────────────

function addMs(date: Date, ms: number): Date {
  return new Date(date.getTime() + ms);
}

/**
 * New access window for a payment applied on top of the current row.
 *
 * - one_time: max(now, current.expiresAt) + planDays; a recurring row stays recurring
 * - recurring: platform hint, else current.expiresAt + renewal, else now + renewal
 */
export function computeTransition(
  current: Subscription | null,
  payment: Payment,
  now: Date,
  policy: AccessPolicy = DEFAULT_ACCESS_POLICY
): SubscriptionWindow {
  const currentExpiry = current?.expiresAt ?? null;

  if (payment.kind === 'one_time') {
    const base =
      currentExpiry !== null && currentExpiry.getTime() > now.getTime()
        ? currentExpiry
        : now;
    return {
      status: 'active',
      expiresAt: addMs(base, policy.planDays * DAY_MS),
      isRecurring: current?.isRecurring ?? false,
    };
  }

  const renewalMs = policy.renewalPeriodDays * DAY_MS;
  const expiresAt =
    payment.subscriptionExpirationHint ??
    addMs(currentExpiry ?? now, renewalMs);

  return { status: 'active', expiresAt, isRecurring: true };
}

/**
 * Instant after which a row no longer grants access
 */
export function accessEndsAt(
  subscription: Subscription,
  policy: AccessPolicy = DEFAULT_ACCESS_POLICY
): Date | null {
  if (subscription.graceUntil !== null) {
    return subscription.graceUntil;
  }
  if (subscription.expiresAt === null) {
    return null;
  }
  return addMs(subscription.expiresAt, policy.graceHours * HOUR_MS);
}

/**
 * Whether a row grants access at `now`. Rows past expiry that the sweep
 * has not reached yet still count as being in their grace period.
 */
export function isAccessValid(
  subscription: Subscription | null,
  now: Date,
  policy: AccessPolicy = DEFAULT_ACCESS_POLICY
): boolean {
  if (subscription === null) {
    return false;
  }
  if (
    subscription.status !== 'active' &&
    subscription.status !== 'grace' &&
    subscription.status !== 'cancelled'
  ) {
    return false;
  }
  const endsAt = accessEndsAt(subscription, policy);
  return endsAt !== null && endsAt.getTime() > now.getTime();
}

// ─────────────────────────────────────────────────────────────
// DATABASE CONTRACT
// ─────────────────────────────────────────────────────────────

export type ApplyPaymentOutcome =
  | { status: 'applied'; subscription: Subscription }
  | { status: 'already_applied' }
  | { status: 'conflict' };

/**
 * Columns a guarded update may change
 */
export interface SubscriptionPatch {
  status?: Subscription['status'];
  graceUntil?: Date | null;
  cancelledAt?: Date | null;
  isRecurring?: boolean;
  graceNotifiedAt?: Date | null;
  reminderSentAt?: Date | null;
  revocationState?: RevocationState | null;
  revocationAttempts?: number;
}

/**
 * Row sets scanned by the lifecycle sweeps
 */
export type DueQuery =
  | { due: 'grace'; now: Date }
  | { due: 'expiry'; now: Date }
  | { due: 'grace_notification' }
  | { due: 'revocation' }
  | { due: 'reminder'; now: Date; horizon: Date; remindedBefore: Date };

/**
 * Database abstraction interface for SubscriptionService
 */
export interface SubscriptionServiceDb {
  getCurrentSubscription: (userId: number) => Promise<Subscription | null>;
  getLatestSubscription: (userId: number) => Promise<Subscription | null>;
  /** Marks the payment applied and writes the window in one transaction */
  applyPayment: (params: {
    paymentId: string;
    userId: number;
    subscriptionId: string | null;
    expectedVersion: number | null;
    window: SubscriptionWindow;
    appliedAt: Date;
  }) => Promise<ApplyPaymentOutcome>;
  /** Returns null when the user already has a current row */
  insertPendingSubscription: (userId: number, now: Date) => Promise<Subscription | null>;
  /** Returns null when the version no longer matches */
  updateSubscription: (
    subscriptionId: string,
    expectedVersion: number,
    patch: SubscriptionPatch,
    now: Date
  ) => Promise<Subscription | null>;
  listDue: (query: DueQuery, limit: number) => Promise<Subscription[]>;
  getLatestRecurringChargeId: (userId: number) => Promise<string | null>;
}

/**
 * Minimal AuditService interface
 */
export interface SubscriptionServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

/**
 * SubscriptionService interface
 */
export interface SubscriptionService {
  apply(actor: ActorContext, payment: Payment): Promise<Result<SubscriptionTransition>>;
  getStatus(actor: ActorContext, userId: number): Promise<Result<AccessStatus>>;
  hasActiveAccess(
    actor: ActorContext,
    userId: number,
    now?: Date
  ): Promise<Result<boolean>>;
  beginCheckout(actor: ActorContext, userId: number): Promise<Result<Subscription>>;
  cancel(actor: ActorContext, userId: number): Promise<Result<CancelResult>>;

  // Lifecycle writes, driven by LifecycleService
  listDue(
    actor: ActorContext,
    query: DueQuery,
    limit: number
  ): Promise<Result<Subscription[]>>;
  enterGrace(
    actor: ActorContext,
    subscription: Subscription,
    now: Date
  ): Promise<Result<Subscription | null>>;
  expire(
    actor: ActorContext,
    subscription: Subscription,
    now: Date
  ): Promise<Result<Subscription | null>>;
  markSideEffect(
    actor: ActorContext,
    subscription: Subscription,
    patch: Pick<
      SubscriptionPatch,
      'graceNotifiedAt' | 'reminderSentAt' | 'revocationState' | 'revocationAttempts'
    >
  ): Promise<Result<Subscription | null>>;
}

const MAX_APPLY_ATTEMPTS = 5;
const MAX_CANCEL_ATTEMPTS = 3;

/**
 * Create SubscriptionService instance
 */
export function createSubscriptionService(deps: {
  db: SubscriptionServiceDb;
  auditService: SubscriptionServiceAudit;
  platform?: Pick<AccessPlatform, 'stopRecurring'>;
  policy?: AccessPolicy;
  logger?: Logger;
  now?: () => Date;
}): SubscriptionService {
  const { db, auditService, platform } = deps;
  const policy = deps.policy ?? DEFAULT_ACCESS_POLICY;
  const now = deps.now ?? (() => new Date());
  const log = (deps.logger ?? getLogger()).child({ component: 'subscription-ledger' });

  // ─────────────────────────────────────────────────────────────
  // HELPER FUNCTIONS
  // ─────────────────────────────────────────────────────────────

  function toAccessStatus(
    userId: number,
    subscription: Subscription | null,
    at: Date
  ): AccessStatus {
    if (subscription === null) {
      return {
        userId,
        status: 'none',
        expiresAt: null,
        graceUntil: null,
        isRecurring: false,
        cancelledAt: null,
        hasAccess: false,
      };
    }
    return {
      userId,
      status: subscription.status,
      expiresAt: subscription.expiresAt,
      graceUntil: subscription.graceUntil,
      isRecurring: subscription.isRecurring,
      cancelledAt: subscription.cancelledAt,
      hasAccess: isAccessValid(subscription, at, policy),
    };
  }

  async function stopRecurringCharge(
    actor: ActorContext,
    userId: number
  ): Promise<boolean> {
    if (platform === undefined) {
      return false;
    }

    const chargeId = await db.getLatestRecurringChargeId(userId);
    if (chargeId === null) {
      log.warn({ userId }, 'subscription.cancel_no_recurring_charge');
      return false;
    }

    const result = await platform.stopRecurring(userId, chargeId);
    if (result.ok) {
      return true;
    }

    log.error({ userId, chargeId, error: result.error }, 'subscription.stop_recurring_failed');
    await auditService.log(actor, {
      action: 'subscription.stop_recurring_failed',
      resourceType: 'subscription',
      userId,
      details: { chargeId, error: result.error },
    });
    return false;
  }

  // ─────────────────────────────────────────────────────────────
  // SERVICE IMPLEMENTATION
  // ─────────────────────────────────────────────────────────────

  return {
    /**
     * Extend or activate the user's window for a recorded payment
     * Requires: 'payments:write' permission
     */
    async apply(
      actor: ActorContext,
      payment: Payment
    ): Promise<Result<SubscriptionTransition>> {
      if (!hasPermission(actor, 'payments:write')) {
        return failure('PERMISSION_DENIED', 'Actor lacks payments:write permission');
      }

      if (payment.appliedAt !== null) {
        return success({ kind: 'noop', userId: payment.userId, reason: 'already_applied' });
      }

      try {
        for (let attempt = 1; attempt <= MAX_APPLY_ATTEMPTS; attempt++) {
          const current = await db.getCurrentSubscription(payment.userId);
          const at = now();
          const window = computeTransition(current, payment, at, policy);

          const outcome = await db.applyPayment({
            paymentId: payment.id,
            userId: payment.userId,
            subscriptionId: current?.id ?? null,
            expectedVersion: current?.version ?? null,
            window,
            appliedAt: at,
          });

          if (outcome.status === 'already_applied') {
            return success({ kind: 'noop', userId: payment.userId, reason: 'already_applied' });
          }

          if (outcome.status === 'conflict') {
            log.debug({ userId: payment.userId, attempt }, 'subscription.apply_conflict');
            continue;
          }

          const transition: SubscriptionTransition = {
            kind: current === null || current.status === 'pending' ? 'activated' : 'extended',
            subscriptionId: outcome.subscription.id,
            userId: payment.userId,
            previousStatus: current?.status ?? null,
            previousExpiresAt: current?.expiresAt ?? null,
            expiresAt: window.expiresAt,
            isRecurring: window.isRecurring,
          };

          log.info(
            {
              userId: payment.userId,
              paymentId: payment.id,
              kind: transition.kind,
              expiresAt: window.expiresAt.toISOString(),
            },
            `subscription.${transition.kind}`
          );
          await auditService.log(actor, {
            action: `subscription.${transition.kind}`,
            resourceType: 'subscription',
            resourceId: transition.subscriptionId,
            userId: payment.userId,
            details: {
              paymentId: payment.id,
              paymentKind: payment.kind,
              previousExpiresAt: transition.previousExpiresAt?.toISOString() ?? null,
              expiresAt: window.expiresAt.toISOString(),
            },
          });

          return success(transition);
        }

        return failure(
          'CONFLICT',
          `Subscription for user ${payment.userId} kept changing during apply`
        );
      } catch (err) {
        log.error({ err, userId: payment.userId, paymentId: payment.id }, 'subscription.apply_failed');
        return failureFromError('STORAGE_UNAVAILABLE', 'Failed to apply payment', err);
      }
    },

    /**
     * Requires: 'subscriptions:read' permission
     */
    async getStatus(actor: ActorContext, userId: number): Promise<Result<AccessStatus>> {
      if (!hasPermission(actor, 'subscriptions:read')) {
        return failure('PERMISSION_DENIED', 'Actor lacks subscriptions:read permission');
      }

      try {
        const subscription =
          (await db.getCurrentSubscription(userId)) ??
          (await db.getLatestSubscription(userId));
        return success(toAccessStatus(userId, subscription, now()));
      } catch (err) {
        return failureFromError('STORAGE_UNAVAILABLE', 'Failed to read subscription', err);
      }
    },

    async hasActiveAccess(
      actor: ActorContext,
      userId: number,
      at?: Date
    ): Promise<Result<boolean>> {
      if (!hasPermission(actor, 'subscriptions:read')) {
        return failure('PERMISSION_DENIED', 'Actor lacks subscriptions:read permission');
      }

      try {
        const current = await db.getCurrentSubscription(userId);
        return success(isAccessValid(current, at ?? now(), policy));
      } catch (err) {
        return failureFromError('STORAGE_UNAVAILABLE', 'Failed to read subscription', err);
      }
    },

    /**
     * Create the pending row on a payment attempt. An existing current row
     * is returned unchanged.
     * Requires: 'subscriptions:manage' permission
     */
    async beginCheckout(actor: ActorContext, userId: number): Promise<Result<Subscription>> {
      if (!hasPermission(actor, 'subscriptions:manage')) {
        return failure('PERMISSION_DENIED', 'Actor lacks subscriptions:manage permission');
      }

      try {
        const existing = await db.getCurrentSubscription(userId);
        if (existing !== null) {
          return success(existing);
        }

        const created = await db.insertPendingSubscription(userId, now());
        if (created !== null) {
          await auditService.log(actor, {
            action: 'subscription.checkout_started',
            resourceType: 'subscription',
            resourceId: created.id,
            userId,
          });
          return success(created);
        }

        // Lost the race to a concurrent insert
        const winner = await db.getCurrentSubscription(userId);
        if (winner === null) {
          return failure('CONFLICT', `Could not create subscription for user ${userId}`);
        }
        return success(winner);
      } catch (err) {
        return failureFromError('STORAGE_UNAVAILABLE', 'Failed to begin checkout', err);
      }
    },

    /**
     * Stop renewal. Access continues until expiresAt (and grace).
     * Requires: 'subscriptions:manage' permission
     */
    async cancel(actor: ActorContext, userId: number): Promise<Result<CancelResult>> {
      if (!hasPermission(actor, 'subscriptions:manage')) {
        return failure('PERMISSION_DENIED', 'Actor lacks subscriptions:manage permission');
      }

      try {
        for (let attempt = 1; attempt <= MAX_CANCEL_ATTEMPTS; attempt++) {
          const current = await db.getCurrentSubscription(userId);
          if (current === null || current.status === 'pending') {
            return failure('NOT_FOUND', `No active subscription for user ${userId}`);
          }

          if (current.status === 'cancelled' && current.cancelledAt !== null) {
            return success({
              userId,
              cancelledAt: current.cancelledAt,
              expiresAt: current.expiresAt,
              stoppedRecurring: false,
            });
          }

          const cancelledAt = now();
          const updated = await db.updateSubscription(
            current.id,
            current.version,
            { status: 'cancelled', cancelledAt, isRecurring: false },
            cancelledAt
          );
          if (updated === null) {
            continue;
          }

          const stoppedRecurring = current.isRecurring
            ? await stopRecurringCharge(actor, userId)
            : false;

          log.info({ userId, stoppedRecurring }, 'subscription.cancelled');
          await auditService.log(actor, {
            action: 'subscription.cancelled',
            resourceType: 'subscription',
            resourceId: current.id,
            userId,
            details: {
              previousStatus: current.status,
              wasRecurring: current.isRecurring,
              stoppedRecurring,
            },
          });

          return success({
            userId,
            cancelledAt,
            expiresAt: updated.expiresAt,
            stoppedRecurring,
          });
        }

        return failure('CONFLICT', `Subscription for user ${userId} kept changing during cancel`);
      } catch (err) {
        return failureFromError('STORAGE_UNAVAILABLE', 'Failed to cancel subscription', err);
      }
    },

    /**
     * Requires: 'jobs:run' permission
     */
    async listDue(
      actor: ActorContext,
      query: DueQuery,
      limit: number
    ): Promise<Result<Subscription[]>> {
      if (!hasPermission(actor, 'jobs:run')) {
        return failure('PERMISSION_DENIED', 'Actor lacks jobs:run permission');
      }

      try {
        return success(await db.listDue(query, limit));
      } catch (err) {
        return failureFromError('STORAGE_UNAVAILABLE', `Failed to list ${query.due} rows`, err);
      }
    },

    /**
     * active|cancelled past expiresAt -> grace.
     * Returns null when the row changed since it was read.
     */
    async enterGrace(
      actor: ActorContext,
      subscription: Subscription,
      at: Date
    ): Promise<Result<Subscription | null>> {
      if (!hasPermission(actor, 'jobs:run')) {
        return failure('PERMISSION_DENIED', 'Actor lacks jobs:run permission');
      }
      if (
        (subscription.status !== 'active' && subscription.status !== 'cancelled') ||
        subscription.expiresAt === null
      ) {
        return failure(
          'VALIDATION_ERROR',
          `Subscription ${subscription.id} cannot enter grace from ${subscription.status}`
        );
      }

      const graceUntil = addMs(subscription.expiresAt, policy.graceHours * HOUR_MS);
      try {
        const updated = await db.updateSubscription(
          subscription.id,
          subscription.version,
          { status: 'grace', graceUntil, graceNotifiedAt: null },
          at
        );
        if (updated !== null) {
          await auditService.log(actor, {
            action: 'subscription.grace_started',
            resourceType: 'subscription',
            resourceId: subscription.id,
            userId: subscription.userId,
            details: { graceUntil: graceUntil.toISOString() },
          });
        }
        return success(updated);
      } catch (err) {
        return failureFromError('STORAGE_UNAVAILABLE', 'Failed to start grace period', err);
      }
    },

    /**
     * grace (or cancelled during grace) past graceUntil -> expired
     */
    async expire(
      actor: ActorContext,
      subscription: Subscription,
      at: Date
    ): Promise<Result<Subscription | null>> {
      if (!hasPermission(actor, 'jobs:run')) {
        return failure('PERMISSION_DENIED', 'Actor lacks jobs:run permission');
      }
      if (
        (subscription.status !== 'grace' && subscription.status !== 'cancelled') ||
        subscription.graceUntil === null
      ) {
        return failure(
          'VALIDATION_ERROR',
          `Subscription ${subscription.id} cannot expire from ${subscription.status}`
        );
      }

      try {
        const updated = await db.updateSubscription(
          subscription.id,
          subscription.version,
          { status: 'expired', revocationState: null, revocationAttempts: 0 },
          at
        );
        if (updated !== null) {
          await auditService.log(actor, {
            action: 'subscription.expired',
            resourceType: 'subscription',
            resourceId: subscription.id,
            userId: subscription.userId,
          });
        }
        return success(updated);
      } catch (err) {
        return failureFromError('STORAGE_UNAVAILABLE', 'Failed to expire subscription', err);
      }
    },

    /**
     * Record that a sweep side effect finished
     */
    async markSideEffect(
      actor: ActorContext,
      subscription: Subscription,
      patch: Pick<
      SubscriptionPatch,
      'graceNotifiedAt' | 'reminderSentAt' | 'revocationState' | 'revocationAttempts'
    >
    ): Promise<Result<Subscription | null>> {
      if (!hasPermission(actor, 'jobs:run')) {
        return failure('PERMISSION_DENIED', 'Actor lacks jobs:run permission');
      }

      try {
        const updated = await db.updateSubscription(
          subscription.id,
          subscription.version,
          patch,
          now()
        );
        return success(updated);
      } catch (err) {
        return failureFromError('STORAGE_UNAVAILABLE', 'Failed to mark subscription', err);
      }
    },
  };
}
