/**
 * LifecycleService Implementation (LifecycleScheduler)
 *
 * Time-driven sweeps: active|cancelled -> grace -> expired, with
 * notification and revocation side effects.
 *
 * GUARDRAILS:
 * - Transitions are written by SubscriptionService; this service only decides
 * - A failed side effect never blocks the transition
 * - Unfinished side effects are detectable (graceNotifiedAt / revocationState
 *   still null) and retried by the next sweep
 *
 * Dependencies: SubscriptionService, NotificationService, AccessPlatform, ExemptionChecker
 */

import type { Logger } from 'pino';

import { getLogger } from '../lib/logger.js';
import type {
  AccessPlatform,
  AccessPolicy,
  ActorContext,
  ExemptionChecker,
  LifecycleTransition,
  NotificationType,
  ReminderResult,
  Result,
  Subscription,
  SweepResult,
} from '../types/index.js';
import {
  DAY_MS,
  DEFAULT_ACCESS_POLICY,
  success,
  failure,
  hasPermission,
  isFailure,
} from '../types/index.js';

import type { SubscriptionService } from './subscription.service.js';

export type LifecycleLedger = Pick<
  SubscriptionService,
  'listDue' | 'enterGrace' | 'expire' | 'markSideEffect' | 'hasActiveAccess'
>;

export interface LifecycleNotifications {
  queue: (
    actor: ActorContext,
    userId: number,
    type: NotificationType,
    metadata?: Record<string, unknown>
  ) => Promise<Result<unknown>>;
}

/**
 * LifecycleService interface
 */
export interface LifecycleService {
  sweep(actor: ActorContext, now?: Date): Promise<Result<SweepResult>>;
  sendReminders(actor: ActorContext, now?: Date): Promise<Result<ReminderResult>>;
}

const SWEEP_BATCH_SIZE = 500;
const MAX_REVOCATION_ATTEMPTS = 5;

/**
 * Create LifecycleService instance
 */
export function createLifecycleService(deps: {
  subscriptionService: LifecycleLedger;
  notificationService: LifecycleNotifications;
  platform: Pick<AccessPlatform, 'revokeAccess'>;
  exemptions: ExemptionChecker;
  policy?: AccessPolicy;
  batchSize?: number;
  now?: () => Date;
  logger?: Logger;
}): LifecycleService {
  const { subscriptionService: ledger, notificationService, platform, exemptions } = deps;
  const policy = deps.policy ?? DEFAULT_ACCESS_POLICY;
  const batchSize = deps.batchSize ?? SWEEP_BATCH_SIZE;
  const clock = deps.now ?? (() => new Date());
  const log = (deps.logger ?? getLogger()).child({ component: 'lifecycle' });

  // ─────────────────────────────────────────────────────────────
  // SIDE EFFECTS
  // ─────────────────────────────────────────────────────────────

  /**
   * Queue the grace notification, then record it. Returns whether it was queued.
   */
  async function notifyGrace(
    actor: ActorContext,
    subscription: Subscription,
    now: Date
  ): Promise<boolean> {
    const queued = await notificationService.queue(
      actor,
      subscription.userId,
      'grace_period_started',
      {
        expiresAt: subscription.expiresAt?.toISOString() ?? null,
        graceUntil: subscription.graceUntil?.toISOString() ?? null,
        graceHours: policy.graceHours,
      }
    );
    if (isFailure(queued)) {
      log.warn({ userId: subscription.userId, error: queued.error }, 'lifecycle.grace_notify_failed');
      return false;
    }

    const marked = await ledger.markSideEffect(actor, subscription, { graceNotifiedAt: now });
    if (isFailure(marked)) {
      log.warn({ userId: subscription.userId, error: marked.error }, 'lifecycle.grace_mark_failed');
    }
    return true;
  }

  type RevocationOutcome = 'revoked' | 'skipped' | 'superseded' | 'error';

  async function revoke(
    actor: ActorContext,
    subscription: Subscription,
    now: Date
  ): Promise<RevocationOutcome> {
    const userId = subscription.userId;

    const access = await ledger.hasActiveAccess(actor, userId, now);
    if (isFailure(access)) {
      log.warn({ userId, error: access.error }, 'lifecycle.access_check_failed');
      return 'error';
    }
    if (access.data) {
      await ledger.markSideEffect(actor, subscription, { revocationState: 'superseded' });
      return 'superseded';
    }

    let exempt: boolean;
    try {
      exempt = await exemptions.isExempt(userId);
    } catch (err) {
      log.warn({ err, userId }, 'lifecycle.exemption_check_failed');
      return 'error';
    }

    if (exempt) {
      await ledger.markSideEffect(actor, subscription, { revocationState: 'skipped' });
      log.info({ userId }, 'lifecycle.revocation_skipped_exempt');
      return 'skipped';
    }

    const result = await platform.revokeAccess(userId);
    if (!result.ok) {
      const attempts = subscription.revocationAttempts + 1;
      if (attempts >= MAX_REVOCATION_ATTEMPTS) {
        await ledger.markSideEffect(actor, subscription, {
          revocationAttempts: attempts,
          revocationState: 'failed',
        });
        log.error({ userId, attempts, error: result.error }, 'lifecycle.revoke_abandoned');
      } else {
        await ledger.markSideEffect(actor, subscription, { revocationAttempts: attempts });
        log.warn({ userId, attempts, error: result.error }, 'lifecycle.revoke_failed');
      }
      return 'error';
    }

    await ledger.markSideEffect(actor, subscription, { revocationState: 'done' });
    log.info({ userId }, 'lifecycle.revoked');
    return 'revoked';
  }

  function countRevocation(result: SweepResult, outcome: RevocationOutcome): void {
    if (outcome === 'revoked') result.revoked++;
    if (outcome === 'skipped') result.revocationsSkipped++;
    if (outcome === 'error') result.errors++;
  }

  // ─────────────────────────────────────────────────────────────
  // SERVICE IMPLEMENTATION
  // ─────────────────────────────────────────────────────────────

  return {
    /**
     * Requires: 'jobs:run' permission
     */
    async sweep(actor: ActorContext, at?: Date): Promise<Result<SweepResult>> {
      if (!hasPermission(actor, 'jobs:run')) {
        return failure('PERMISSION_DENIED', 'Actor lacks jobs:run permission');
      }

      const now = at ?? clock();
      const result: SweepResult = {
        transitions: [],
        notificationsQueued: 0,
        revoked: 0,
        revocationsSkipped: 0,
        errors: 0,
      };
      // Rows whose side effect was already tried in this sweep
      const attempted = new Set<string>();

      // active | cancelled -> grace
      const dueForGrace = await ledger.listDue(actor, { due: 'grace', now }, batchSize);
      if (isFailure(dueForGrace)) {
        return dueForGrace;
      }
      for (const subscription of dueForGrace.data) {
        const updated = await ledger.enterGrace(actor, subscription, now);
        if (isFailure(updated)) {
          result.errors++;
          continue;
        }
        if (updated.data === null) {
          continue;
        }

        const transition: LifecycleTransition = {
          subscriptionId: subscription.id,
          userId: subscription.userId,
          from: subscription.status,
          to: 'grace',
          at: now,
        };
        if (updated.data.graceUntil !== null) {
          transition.graceUntil = updated.data.graceUntil;
        }
        result.transitions.push(transition);

        attempted.add(subscription.id);
        if (await notifyGrace(actor, updated.data, now)) {
          result.notificationsQueued++;
        } else {
          result.errors++;
        }
      }

      // grace -> expired
      const dueForExpiry = await ledger.listDue(actor, { due: 'expiry', now }, batchSize);
      if (isFailure(dueForExpiry)) {
        return dueForExpiry;
      }
      for (const subscription of dueForExpiry.data) {
        const updated = await ledger.expire(actor, subscription, now);
        if (isFailure(updated)) {
          result.errors++;
          continue;
        }
        if (updated.data === null) {
          continue;
        }

        result.transitions.push({
          subscriptionId: subscription.id,
          userId: subscription.userId,
          from: subscription.status,
          to: 'expired',
          at: now,
        });

        attempted.add(subscription.id);
        countRevocation(result, await revoke(actor, updated.data, now));

        const queued = await notificationService.queue(
          actor,
          subscription.userId,
          'subscription_expired',
          { expiredAt: now.toISOString() }
        );
        if (isFailure(queued)) {
          result.errors++;
        } else {
          result.notificationsQueued++;
        }
      }

      // Retry side effects left unfinished by earlier sweeps
      const unnotified = await ledger.listDue(actor, { due: 'grace_notification' }, batchSize);
      if (isFailure(unnotified)) {
        return unnotified;
      }
      for (const subscription of unnotified.data) {
        if (attempted.has(subscription.id)) {
          continue;
        }
        if (await notifyGrace(actor, subscription, now)) {
          result.notificationsQueued++;
        } else {
          result.errors++;
        }
      }

      const unrevoked = await ledger.listDue(actor, { due: 'revocation' }, batchSize);
      if (isFailure(unrevoked)) {
        return unrevoked;
      }
      for (const subscription of unrevoked.data) {
        if (attempted.has(subscription.id)) {
          continue;
        }
        countRevocation(result, await revoke(actor, subscription, now));
      }

      log.info(
        {
          transitions: result.transitions.length,
          notificationsQueued: result.notificationsQueued,
          revoked: result.revoked,
          revocationsSkipped: result.revocationsSkipped,
          errors: result.errors,
        },
        'lifecycle.sweep_completed'
      );
      return success(result);
    },

    /**
     * Remind non-recurring members whose access ends soon, at most once a day
     * Requires: 'jobs:run' permission
     */
    async sendReminders(actor: ActorContext, at?: Date): Promise<Result<ReminderResult>> {
      if (!hasPermission(actor, 'jobs:run')) {
        return failure('PERMISSION_DENIED', 'Actor lacks jobs:run permission');
      }

      const now = at ?? clock();
      const due = await ledger.listDue(
        actor,
        {
          due: 'reminder',
          now,
          horizon: new Date(now.getTime() + policy.reminderDaysBeforeExpiry * DAY_MS),
          remindedBefore: new Date(now.getTime() - DAY_MS),
        },
        batchSize
      );
      if (isFailure(due)) {
        return due;
      }

      const result: ReminderResult = { remindersQueued: 0, errors: 0 };
      for (const subscription of due.data) {
        if (subscription.expiresAt === null) {
          continue;
        }
        const daysLeft = Math.floor((subscription.expiresAt.getTime() - now.getTime()) / DAY_MS);
        const queued = await notificationService.queue(actor, subscription.userId, 'expiry_reminder', {
          expiresAt: subscription.expiresAt.toISOString(),
          daysLeft,
        });
        if (isFailure(queued)) {
          result.errors++;
          continue;
        }
        const marked = await ledger.markSideEffect(actor, subscription, { reminderSentAt: now });
        if (isFailure(marked)) {
          result.errors++;
          continue;
        }
        result.remindersQueued++;
      }

      if (due.data.length > 0) {
        log.info(result, 'lifecycle.reminders_completed');
      }
      return success(result);
    },
  };
}
