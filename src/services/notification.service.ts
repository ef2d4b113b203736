/**
 * NotificationService Implementation
 *
 * Outbound member messages are queued first and delivered in batches, so a
 * platform outage never blocks the state change that produced the message.
 *
 * Dependencies: Notifier
 */

import type { Logger } from 'pino';

import { getLogger } from '../lib/logger.js';
import type {
  ActorContext,
  Notification,
  NotificationBatchResult,
  NotificationType,
  Notifier,
  Result,
} from '../types/index.js';
import {
  success,
  failure,
  failureFromError,
  hasPermission,
  NotificationUndeliverableError,
} from '../types/index.js';

/**
 * Database abstraction interface for NotificationService
 */
export interface NotificationServiceDb {
  insertNotification: (params: {
    userId: number;
    type: NotificationType;
    metadata: Record<string, unknown>;
  }) => Promise<Notification>;
  listUnsent: (limit: number) => Promise<Notification[]>;
  markSent: (notificationId: string, sentAt: Date) => Promise<void>;
  recordFailure: (
    notificationId: string,
    failure: { attempts: number; error: string; abandonedAt: Date | null }
  ) => Promise<void>;
}

/**
 * NotificationService interface
 */
export interface NotificationService {
  queue(
    actor: ActorContext,
    userId: number,
    type: NotificationType,
    metadata?: Record<string, unknown>
  ): Promise<Result<Notification>>;
  processPending(
    actor: ActorContext,
    limit?: number
  ): Promise<Result<NotificationBatchResult>>;
}

const DEFAULT_BATCH_SIZE = 50;
const MAX_SEND_ATTEMPTS = 5;

/**
 * Create NotificationService instance
 */
export function createNotificationService(deps: {
  db: NotificationServiceDb;
  notifier: Notifier;
  logger?: Logger;
  now?: () => Date;
}): NotificationService {
  const { db, notifier } = deps;
  const now = deps.now ?? (() => new Date());
  const log = (deps.logger ?? getLogger()).child({ component: 'notifications' });

  async function recordFailure(notification: Notification, err: unknown): Promise<void> {
    const attempts = notification.attempts + 1;
    const abandon =
      err instanceof NotificationUndeliverableError || attempts >= MAX_SEND_ATTEMPTS;
    const error = err instanceof Error ? err.message : String(err);

    await db.recordFailure(notification.id, {
      attempts,
      error,
      abandonedAt: abandon ? now() : null,
    });
    log.warn(
      { err, notificationId: notification.id, userId: notification.userId, attempts },
      abandon ? 'notification.abandoned' : 'notification.send_failed'
    );
  }

  return {
    async queue(
      _actor: ActorContext,
      userId: number,
      type: NotificationType,
      metadata: Record<string, unknown> = {}
    ): Promise<Result<Notification>> {
      try {
        const notification = await db.insertNotification({ userId, type, metadata });
        log.debug({ userId, type, notificationId: notification.id }, 'notification.queued');
        return success(notification);
      } catch (err) {
        return failureFromError('STORAGE_UNAVAILABLE', 'Failed to queue notification', err);
      }
    },

    /**
     * Deliver one batch of unsent notifications, oldest first.
     * Failed sends stay queued for the next batch until they run out of
     * attempts or the member turns out to be unreachable.
     * Requires: 'jobs:run' permission
     */
    async processPending(
      actor: ActorContext,
      limit: number = DEFAULT_BATCH_SIZE
    ): Promise<Result<NotificationBatchResult>> {
      if (!hasPermission(actor, 'jobs:run')) {
        return failure('PERMISSION_DENIED', 'Actor lacks jobs:run permission');
      }

      let pending: Notification[];
      try {
        pending = await db.listUnsent(limit);
      } catch (err) {
        return failureFromError('STORAGE_UNAVAILABLE', 'Failed to read notification queue', err);
      }

      const result: NotificationBatchResult = { processed: pending.length, sent: 0, errors: 0 };

      try {
        for (const notification of pending) {
          try {
            await notifier.send(notification.userId, notification.type, notification.metadata);
          } catch (err) {
            result.errors++;
            await recordFailure(notification, err);
            continue;
          }
          await db.markSent(notification.id, now());
          result.sent++;
        }
      } catch (err) {
        return failureFromError('STORAGE_UNAVAILABLE', 'Failed to update notification queue', err);
      }

      if (pending.length > 0) {
        log.info(result, 'notification_batch.completed');
      }
      return success(result);
    },
  };
}
