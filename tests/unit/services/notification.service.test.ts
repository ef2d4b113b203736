/**
 * NotificationService Unit Tests
 *
 * SCOPE: Outbound queue and batch delivery
 */

import { describe, it, expect, beforeEach } from 'vitest';

import type { NotificationService } from '@/services/notification.service.js';
import { createNotificationService } from '@/services/notification.service.js';

import {
  TEST_OTHER_USER_ID,
  TEST_USER_ID,
  operatorActor,
  serviceActor,
  systemActor,
} from '../../fixtures/index.js';
import {
  createFakeNotifier,
  createMemoryDatabase,
  type FakeNotifier,
  type MemoryDatabase,
} from '../../mocks/index.js';
import { createTestClock, silentLogger } from '../../helpers/test-utils.js';

describe('NotificationService', () => {
  let db: MemoryDatabase;
  let notifier: FakeNotifier;
  let service: NotificationService;

  beforeEach(() => {
    const clock = createTestClock('2025-01-10T12:00:00Z');
    db = createMemoryDatabase(clock.now);
    notifier = createFakeNotifier();
    service = createNotificationService({
      db: db.notificationDb,
      notifier,
      logger: silentLogger(),
      now: clock.now,
    });
  });

  it('should queue without sending', async () => {
    const result = await service.queue(serviceActor, TEST_USER_ID, 'payment_received', {
      amount: 500,
    });

    expect(result.success && result.data).toMatchObject({
      userId: TEST_USER_ID,
      type: 'payment_received',
      metadata: { amount: 500 },
      sent: false,
    });
    expect(notifier.sent).toEqual([]);
  });

  it('should deliver queued messages and mark them sent', async () => {
    await service.queue(serviceActor, TEST_USER_ID, 'payment_received', { amount: 500 });
    await service.queue(serviceActor, TEST_OTHER_USER_ID, 'access_pending');

    const result = await service.processPending(systemActor);

    expect(result).toEqual({ success: true, data: { processed: 2, sent: 2, errors: 0 } });
    expect(notifier.sent.map((n) => n.type)).toEqual(['payment_received', 'access_pending']);
    expect(db.tables.notifications.every((n) => n.sent)).toBe(true);
    expect(db.tables.notifications[0]?.sentAt).toEqual(new Date('2025-01-10T12:00:00Z'));
  });

  it('should keep failed sends queued for the next batch', async () => {
    notifier.failing.add(TEST_USER_ID);
    await service.queue(serviceActor, TEST_USER_ID, 'subscription_expired');
    await service.queue(serviceActor, TEST_OTHER_USER_ID, 'subscription_expired');

    const first = await service.processPending(systemActor);
    notifier.failing.clear();
    const second = await service.processPending(systemActor);

    expect(first).toEqual({ success: true, data: { processed: 2, sent: 1, errors: 1 } });
    expect(second).toEqual({ success: true, data: { processed: 1, sent: 1, errors: 0 } });
    expect(db.tables.notifications[0]).toMatchObject({
      sent: true,
      attempts: 1,
      lastError: 'Bad Gateway',
      abandonedAt: null,
    });
  });

  it('should stop retrying members who blocked the bot', async () => {
    for (const userId of [TEST_USER_ID, TEST_USER_ID + 1, TEST_USER_ID + 2]) {
      notifier.blocked.add(userId);
      await service.queue(serviceActor, userId, 'grace_period_started');
    }
    await service.queue(serviceActor, 99, 'subscription_expired');

    const first = await service.processPending(systemActor, 3);
    const second = await service.processPending(systemActor, 3);

    expect(first).toEqual({ success: true, data: { processed: 3, sent: 0, errors: 3 } });
    expect(second).toEqual({ success: true, data: { processed: 1, sent: 1, errors: 0 } });
    expect(notifier.sent.map((n) => n.userId)).toEqual([99]);
    expect(db.tables.notifications[0]).toMatchObject({
      sent: false,
      attempts: 1,
      lastError: 'Forbidden: bot was blocked by the user',
      abandonedAt: new Date('2025-01-10T12:00:00Z'),
    });
  });

  it('should give up after five transient failures', async () => {
    notifier.failing.add(TEST_USER_ID);
    await service.queue(serviceActor, TEST_USER_ID, 'expiry_reminder');

    for (let i = 0; i < 5; i++) {
      await service.processPending(systemActor);
    }
    const after = await service.processPending(systemActor);

    expect(after).toEqual({ success: true, data: { processed: 0, sent: 0, errors: 0 } });
    expect(db.tables.notifications[0]).toMatchObject({
      attempts: 5,
      abandonedAt: new Date('2025-01-10T12:00:00Z'),
    });
  });

  it('should fail the batch when a failure cannot be recorded', async () => {
    notifier.failing.add(TEST_USER_ID);
    await service.queue(serviceActor, TEST_USER_ID, 'expiry_reminder');
    const broken = createNotificationService({
      db: {
        ...db.notificationDb,
        recordFailure: () => Promise.reject(new Error('connection reset')),
      },
      notifier,
      logger: silentLogger(),
    });

    const result = await broken.processPending(systemActor);

    expect(result).toEqual({
      success: false,
      error: {
        code: 'STORAGE_UNAVAILABLE',
        message: 'Failed to update notification queue: connection reset',
      },
    });
  });

  it('should honour the batch limit', async () => {
    for (let i = 0; i < 3; i++) {
      await service.queue(serviceActor, TEST_USER_ID + i, 'expiry_reminder');
    }

    const result = await service.processPending(systemActor, 2);

    expect(result.success && result.data.processed).toBe(2);
  });

  it('should require jobs:run to deliver', async () => {
    const result = await service.processPending(serviceActor);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('PERMISSION_DENIED');
  });

  it('should allow operators to deliver', async () => {
    const result = await service.processPending(operatorActor);

    expect(result).toEqual({ success: true, data: { processed: 0, sent: 0, errors: 0 } });
  });
});
