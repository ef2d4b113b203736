/**
 * Job Runner
 *
 * Periodic jobs are triggered from outside (cron, scheduler) over HTTP.
 * Each job holds a named lease for its whole run; a trigger that arrives
 * while the lease is held gets JOB_IN_PROGRESS instead of a second run.
 */

import type { Logger } from 'pino';

import type { JobLease, LeaseHandle } from '../lib/redis.js';
import { getLogger } from '../lib/logger.js';
import type {
  ActorContext,
  NotificationBatchResult,
  ReconciliationRunResult,
  ReminderResult,
  Result,
  SweepResult,
} from '../types/index.js';
import {
  SYSTEM_ACTOR,
  failure,
  failureFromError,
  hasPermission,
} from '../types/index.js';

export type JobName =
  | 'reconciliation'
  | 'sweep'
  | 'reminders'
  | 'notifications'
  | 'finalizations';

export interface JobServices {
  reconciliationService: {
    run: (actor: ActorContext) => Promise<Result<ReconciliationRunResult>>;
  };
  lifecycleService: {
    sweep: (actor: ActorContext, now?: Date) => Promise<Result<SweepResult>>;
    sendReminders: (actor: ActorContext, now?: Date) => Promise<Result<ReminderResult>>;
  };
  notificationService: {
    processPending: (
      actor: ActorContext,
      limit?: number
    ) => Promise<Result<NotificationBatchResult>>;
  };
  accessService: {
    resumePending: (actor: ActorContext) => Promise<Result<{ resumed: number }>>;
  };
}

export interface JobRunner {
  runReconciliation(actor: ActorContext): Promise<Result<ReconciliationRunResult>>;
  runSweep(actor: ActorContext, now?: Date): Promise<Result<SweepResult>>;
  runReminders(actor: ActorContext, now?: Date): Promise<Result<ReminderResult>>;
  runNotifications(actor: ActorContext): Promise<Result<NotificationBatchResult>>;
  runFinalizations(actor: ActorContext): Promise<Result<{ resumed: number }>>;
}

export function createJobRunner(deps: {
  services: JobServices;
  lease: JobLease;
  leaseSeconds: number;
  logger?: Logger;
}): JobRunner {
  const { services, lease, leaseSeconds } = deps;
  const log = (deps.logger ?? getLogger()).child({ component: 'jobs' });

  async function runExclusive<T>(
    name: JobName,
    actor: ActorContext,
    job: (system: ActorContext) => Promise<Result<T>>
  ): Promise<Result<T>> {
    if (!hasPermission(actor, 'jobs:run')) {
      return failure('PERMISSION_DENIED', 'Actor lacks jobs:run permission');
    }

    let handle: LeaseHandle | null;
    try {
      handle = await lease.acquire(name, leaseSeconds);
    } catch (err) {
      log.error({ err, job: name }, 'job.lease_unavailable');
      return failureFromError('STORAGE_UNAVAILABLE', `Failed to acquire ${name} lease`, err);
    }
    if (handle === null) {
      log.info({ job: name }, 'job.skipped_in_progress');
      return failure('JOB_IN_PROGRESS', `Job ${name} is already running`);
    }
    const held: LeaseHandle = handle;

    // Jobs act as the system, traced to the triggering request
    const system: ActorContext = { ...SYSTEM_ACTOR, requestId: actor.requestId };

    const startedAt = Date.now();
    try {
      const result = await job(system);
      const durationMs = Date.now() - startedAt;
      if (result.success) {
        log.info({ job: name, durationMs }, 'job.completed');
      } else {
        log.warn({ job: name, durationMs, error: result.error }, 'job.failed');
      }
      return result;
    } catch (err) {
      log.error({ err, job: name }, 'job.crashed');
      return failureFromError('INTERNAL_ERROR', `Job ${name} crashed`, err);
    } finally {
      try {
        await lease.release(held);
      } catch (err) {
        // The lease TTL frees it eventually
        log.warn({ err, job: name }, 'job.lease_release_failed');
      }
    }
  }

  return {
    runReconciliation(actor) {
      return runExclusive('reconciliation', actor, (system) =>
        services.reconciliationService.run(system)
      );
    },
    runSweep(actor, now) {
      return runExclusive('sweep', actor, (system) => services.lifecycleService.sweep(system, now));
    },
    runReminders(actor, now) {
      return runExclusive('reminders', actor, (system) =>
        services.lifecycleService.sendReminders(system, now)
      );
    },
    runNotifications(actor) {
      return runExclusive('notifications', actor, (system) =>
        services.notificationService.processPending(system)
      );
    },
    runFinalizations(actor) {
      return runExclusive('finalizations', actor, (system) =>
        services.accessService.resumePending(system)
      );
    },
  };
}
