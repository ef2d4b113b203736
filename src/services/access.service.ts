/**
 * AccessService Implementation (AccessFinalizer)
 *
 * SCOPE: Turning valid access into a confirmed grant on the platform
 *
 * GUARDRAILS:
 * - Only retryable platform errors consume backoff attempts
 * - Fatal errors end the task with `failed` immediately
 * - Exhausted retries leave the task `pending`; enter() recovers it
 * - Backoff waits suspend only that user's task
 * - Task state is saved after every attempt so resumePending() can continue it
 *
 * Dependencies: SubscriptionService (access check), NotificationService, AuditService
 */

import type { Logger } from 'pino';

import { getLogger } from '../lib/logger.js';
import type {
  AccessPlatform,
  AccessPolicy,
  ActorContext,
  AuditEvent,
  EnterOutcome,
  FinalizationTask,
  FinalizeOutcome,
  NotificationType,
  Result,
} from '../types/index.js';
import {
  BACKOFF_SCHEDULE_MS,
  DEFAULT_ACCESS_POLICY,
  success,
  failure,
  failureFromError,
  hasPermission,
  isFailure,
} from '../types/index.js';

/**
 * Database abstraction interface for AccessService
 */
export interface AccessServiceDb {
  getTask: (userId: number) => Promise<FinalizationTask | null>;
  saveTask: (task: FinalizationTask) => Promise<void>;
  listInProgress: (limit: number) => Promise<FinalizationTask[]>;
}

/**
 * Minimal AuditService interface
 */
export interface AccessServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

export interface AccessServiceLedger {
  hasActiveAccess: (
    actor: ActorContext,
    userId: number,
    now?: Date
  ) => Promise<Result<boolean>>;
}

export interface AccessServiceNotifications {
  queue: (
    actor: ActorContext,
    userId: number,
    type: NotificationType,
    metadata?: Record<string, unknown>
  ) => Promise<Result<unknown>>;
}

/**
 * AccessService interface
 */
export interface AccessService {
  finalize(actor: ActorContext, userId: number): Promise<Result<FinalizeOutcome>>;
  /** Start finalize() in the background */
  schedule(actor: ActorContext, userId: number): void;
  /** Resolves once no finalization is running */
  whenIdle(): Promise<void>;
  resumePending(actor: ActorContext): Promise<Result<{ resumed: number }>>;
  enter(actor: ActorContext, userId: number): Promise<Result<EnterOutcome>>;
}

const RESUME_BATCH_SIZE = 200;

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Create AccessService instance
 */
export function createAccessService(deps: {
  db: AccessServiceDb;
  platform: AccessPlatform;
  subscriptionService: AccessServiceLedger;
  notificationService?: AccessServiceNotifications;
  auditService: AccessServiceAudit;
  policy?: AccessPolicy;
  backoffScheduleMs?: readonly number[];
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  logger?: Logger;
}): AccessService {
  const { db, platform, subscriptionService, notificationService, auditService } = deps;
  const policy = deps.policy ?? DEFAULT_ACCESS_POLICY;
  const schedule = deps.backoffScheduleMs ?? BACKOFF_SCHEDULE_MS;
  const sleep = deps.sleep ?? defaultSleep;
  const now = deps.now ?? (() => new Date());
  const log = (deps.logger ?? getLogger()).child({ component: 'access-finalizer' });

  const inFlight = new Map<number, Promise<Result<FinalizeOutcome>>>();

  // ─────────────────────────────────────────────────────────────
  // HELPER FUNCTIONS
  // ─────────────────────────────────────────────────────────────

  function taskAfterAttempt(
    userId: number,
    status: FinalizationTask['status'],
    attemptCount: number,
    lastError: string | null,
    nextAttemptAt: Date | null
  ): FinalizationTask {
    const at = now();
    return {
      userId,
      status,
      attemptCount,
      lastAttemptAt: at,
      nextAttemptAt,
      lastError,
      updatedAt: at,
    };
  }

  /**
   * Attempts already spent by an interrupted task, and when it may try next
   */
  async function resumePoint(
    userId: number
  ): Promise<{ spent: number; notBefore: Date | null }> {
    const task = await db.getTask(userId);
    if (task === null || task.status !== 'in_progress') {
      return { spent: 0, notBefore: null };
    }
    return { spent: task.attemptCount, notBefore: task.nextAttemptAt };
  }

  async function waitUntil(notBefore: Date | null): Promise<void> {
    if (notBefore === null) {
      return;
    }
    const remaining = notBefore.getTime() - now().getTime();
    if (remaining > 0) {
      await sleep(remaining);
    }
  }

  async function runFinalize(
    actor: ActorContext,
    userId: number
  ): Promise<Result<FinalizeOutcome>> {
    const access = await subscriptionService.hasActiveAccess(actor, userId);
    if (isFailure(access)) {
      return access;
    }
    if (!access.data) {
      // An interrupted task whose access lapsed must stop being resumed
      try {
        const task = await db.getTask(userId);
        if (task !== null && task.status === 'in_progress') {
          await db.saveTask({
            ...task,
            status: 'failed',
            nextAttemptAt: null,
            lastError: 'no valid subscription',
            updatedAt: now(),
          });
          log.warn({ userId, attempts: task.attemptCount }, 'access.task_abandoned');
        }
      } catch (err) {
        return failureFromError('STORAGE_UNAVAILABLE', 'Failed to close finalization task', err);
      }
      return failure('NO_ACTIVE_ACCESS', `User ${userId} has no valid subscription`);
    }

    try {
      const { spent, notBefore } = await resumePoint(userId);
      await waitUntil(notBefore);

      let lastError: string | null = null;
      let attempts = spent;

      while (attempts < schedule.length) {
        attempts++;
        const result = await platform.grantAccess(userId);

        if (result.ok) {
          await db.saveTask(taskAfterAttempt(userId, 'granted', attempts, null, null));
          log.info(
            { userId, attempts, alreadyMember: result.alreadyMember === true },
            'access.granted'
          );
          await auditService.log(actor, {
            action: 'access.granted',
            resourceType: 'access',
            userId,
            details: { attempts, alreadyMember: result.alreadyMember === true },
          });
          return success({ status: 'granted', userId, attempts });
        }

        lastError = result.error;

        if (!result.retryable) {
          await db.saveTask(taskAfterAttempt(userId, 'failed', attempts, result.error, null));
          log.warn({ userId, attempts, error: result.error }, 'access.grant_failed');
          await auditService.log(actor, {
            action: 'access.failed',
            resourceType: 'access',
            userId,
            details: { attempts, reason: result.error },
          });
          return success({ status: 'failed', userId, attempts, reason: result.error });
        }

        if (attempts >= schedule.length) {
          break;
        }

        const delay = Math.max(schedule[attempts - 1], result.retryAfterMs ?? 0);
        const nextAttemptAt = new Date(now().getTime() + delay);
        await db.saveTask(
          taskAfterAttempt(userId, 'in_progress', attempts, result.error, nextAttemptAt)
        );
        log.debug({ userId, attempts, delay, error: result.error }, 'access.grant_retry');
        await sleep(delay);
      }

      await db.saveTask(taskAfterAttempt(userId, 'pending', attempts, lastError, null));
      log.warn({ userId, attempts, lastError }, 'access.pending');
      await auditService.log(actor, {
        action: 'access.pending',
        resourceType: 'access',
        userId,
        details: { attempts, lastError },
      });

      if (notificationService !== undefined) {
        const queued = await notificationService.queue(actor, userId, 'access_pending', {
          attempts,
        });
        if (isFailure(queued)) {
          log.error({ userId, error: queued.error }, 'access.pending_notification_failed');
        }
      }

      return success({ status: 'pending', userId, attempts, lastError });
    } catch (err) {
      log.error({ err, userId }, 'access.finalize_error');
      return failureFromError('STORAGE_UNAVAILABLE', 'Failed to finalize access', err);
    }
  }

  // ─────────────────────────────────────────────────────────────
  // SERVICE IMPLEMENTATION
  // ─────────────────────────────────────────────────────────────

  const service: AccessService = {
    /**
     * Concurrent calls for one user share a single task
     * Requires: 'payments:write' permission
     */
    finalize(actor: ActorContext, userId: number): Promise<Result<FinalizeOutcome>> {
      if (!hasPermission(actor, 'payments:write')) {
        return Promise.resolve(
          failure('PERMISSION_DENIED', 'Actor lacks payments:write permission')
        );
      }

      const running = inFlight.get(userId);
      if (running !== undefined) {
        return running;
      }

      const task = runFinalize(actor, userId).finally(() => {
        inFlight.delete(userId);
      });
      inFlight.set(userId, task);
      return task;
    },

    schedule(actor: ActorContext, userId: number): void {
      void service.finalize(actor, userId).then(
        (result) => {
          if (isFailure(result)) {
            log.warn({ userId, error: result.error }, 'access.scheduled_finalize_failed');
          }
        },
        (err: unknown) => {
          log.error({ err, userId }, 'access.scheduled_finalize_error');
        }
      );
    },

    async whenIdle(): Promise<void> {
      while (inFlight.size > 0) {
        await Promise.allSettled([...inFlight.values()]);
      }
    },

    /**
     * Continue tasks interrupted by a restart
     * Requires: 'jobs:run' permission
     */
    async resumePending(actor: ActorContext): Promise<Result<{ resumed: number }>> {
      if (!hasPermission(actor, 'jobs:run')) {
        return failure('PERMISSION_DENIED', 'Actor lacks jobs:run permission');
      }

      try {
        const tasks = await db.listInProgress(RESUME_BATCH_SIZE);
        let resumed = 0;
        for (const task of tasks) {
          if (inFlight.has(task.userId)) {
            continue;
          }
          service.schedule(actor, task.userId);
          resumed++;
        }
        if (resumed > 0) {
          log.info({ resumed }, 'access.resumed');
        }
        return success({ resumed });
      } catch (err) {
        return failureFromError('STORAGE_UNAVAILABLE', 'Failed to list finalizations', err);
      }
    },

    /**
     * Self-service recovery: re-check validity, try the grant once,
     * otherwise mint a single-use invite link
     * Requires: 'subscriptions:manage' permission
     */
    async enter(actor: ActorContext, userId: number): Promise<Result<EnterOutcome>> {
      if (!hasPermission(actor, 'subscriptions:manage')) {
        return failure('PERMISSION_DENIED', 'Actor lacks subscriptions:manage permission');
      }

      const access = await subscriptionService.hasActiveAccess(actor, userId);
      if (isFailure(access)) {
        return access;
      }
      if (!access.data) {
        return failure('NO_ACTIVE_ACCESS', `User ${userId} has no valid subscription`);
      }

      try {
        const grant = await platform.grantAccess(userId);
        if (grant.ok) {
          const previous = await db.getTask(userId);
          await db.saveTask(
            taskAfterAttempt(userId, 'granted', (previous?.attemptCount ?? 0) + 1, null, null)
          );
          await auditService.log(actor, {
            action: 'access.granted',
            resourceType: 'access',
            userId,
            details: { via: 'enter' },
          });
          return success({ status: 'granted', userId });
        }

        const expiresAt = new Date(now().getTime() + policy.inviteTtlMinutes * 60_000);
        const inviteLink = await platform.createInviteLink(userId, expiresAt);
        log.info({ userId, expiresAt: expiresAt.toISOString() }, 'access.invite_created');
        await auditService.log(actor, {
          action: 'access.invite_created',
          resourceType: 'access',
          userId,
          details: { grantError: grant.error, expiresAt: expiresAt.toISOString() },
        });
        return success({ status: 'invite', userId, inviteLink, expiresAt });
      } catch (err) {
        log.error({ err, userId }, 'access.enter_failed');
        return failureFromError('PLATFORM_ERROR', 'Failed to recover access', err);
      }
    },
  };

  return service;
}
