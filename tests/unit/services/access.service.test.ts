/**
 * AccessService Unit Tests
 *
 * SCOPE: Grant retries with backoff, dedupe, restart resume, self-service entry
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import type { AccessService } from '@/services/access.service.js';
import { createAccessService } from '@/services/access.service.js';
import { createAuditService } from '@/services/audit.service.js';
import { createNotificationService } from '@/services/notification.service.js';
import { createSubscriptionService } from '@/services/subscription.service.js';
import type { GrantResult } from '@/types/index.js';

import {
  TEST_OTHER_USER_ID,
  TEST_USER_ID,
  operatorActor,
  serviceActor,
  systemActor,
} from '../../fixtures/index.js';
import {
  createFakeNotifier,
  createFakePlatform,
  createMemoryDatabase,
  type FakePlatform,
  type MemoryDatabase,
} from '../../mocks/index.js';
import {
  createTestClock,
  recordingSleep,
  silentLogger,
  type TestClock,
} from '../../helpers/test-utils.js';

const FLOOD: GrantResult = {
  ok: false,
  retryable: true,
  error: 'Too Many Requests: retry after 5',
  retryAfterMs: 5000,
};
const TRANSIENT: GrantResult = { ok: false, retryable: true, error: 'Bad Gateway' };
const FATAL: GrantResult = { ok: false, retryable: false, error: 'Forbidden: bot is not an admin' };

describe('AccessService', () => {
  let clock: TestClock;
  let db: MemoryDatabase;
  let platform: FakePlatform;
  let delays: number[];
  let service: AccessService;

  function build(sleep: (ms: number) => Promise<void>): AccessService {
    const auditService = createAuditService({ db: db.auditDb });
    return createAccessService({
      db: db.accessDb,
      platform,
      subscriptionService: createSubscriptionService({
        db: db.subscriptionDb,
        auditService,
        logger: silentLogger(),
        now: clock.now,
      }),
      notificationService: createNotificationService({
        db: db.notificationDb,
        notifier: createFakeNotifier(),
        logger: silentLogger(),
        now: clock.now,
      }),
      auditService,
      sleep,
      now: clock.now,
      logger: silentLogger(),
    });
  }

  beforeEach(() => {
    clock = createTestClock('2025-01-10T12:00:00Z');
    db = createMemoryDatabase(clock.now);
    platform = createFakePlatform();
    const recorder = recordingSleep(clock);
    delays = recorder.delays;
    service = build(recorder.sleep);

    db.seedSubscription({
      userId: TEST_USER_ID,
      status: 'active',
      expiresAt: new Date('2025-02-09T12:00:00Z'),
    });
  });

  describe('finalize()', () => {
    it('should refuse users without valid access', async () => {
      const result = await service.finalize(serviceActor, 9999);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('NO_ACTIVE_ACCESS');
      expect(platform.grantCalls).toEqual([]);
    });

    it('should grant on the first attempt', async () => {
      const result = await service.finalize(serviceActor, TEST_USER_ID);

      expect(result).toEqual({
        success: true,
        data: { status: 'granted', userId: TEST_USER_ID, attempts: 1 },
      });
      expect(db.tables.finalizations.get(TEST_USER_ID)).toMatchObject({
        status: 'granted',
        attemptCount: 1,
        lastError: null,
      });
    });

    it('should back off between retryable failures', async () => {
      platform.grantFailures = [TRANSIENT, TRANSIENT];

      const result = await service.finalize(serviceActor, TEST_USER_ID);

      expect(result.success && result.data).toEqual({
        status: 'granted',
        userId: TEST_USER_ID,
        attempts: 3,
      });
      expect(delays).toEqual([500, 1000]);
    });

    it('should wait at least as long as the platform asks', async () => {
      platform.grantFailures = [FLOOD];

      await service.finalize(serviceActor, TEST_USER_ID);

      expect(delays).toEqual([5000]);
    });

    it('should leave the task pending and notify after the last attempt', async () => {
      platform.grantFailures = Array.from({ length: 8 }, () => TRANSIENT);

      const result = await service.finalize(serviceActor, TEST_USER_ID);

      expect(result).toEqual({
        success: true,
        data: { status: 'pending', userId: TEST_USER_ID, attempts: 8, lastError: 'Bad Gateway' },
      });
      expect(platform.grantCalls).toHaveLength(8);
      expect(delays).toEqual([500, 1000, 2000, 4000, 8000, 16000, 32000]);
      expect(db.tables.finalizations.get(TEST_USER_ID)?.status).toBe('pending');
      expect(db.tables.notifications.map((n) => n.type)).toEqual(['access_pending']);
    });

    it('should stop on a non-retryable failure', async () => {
      platform.grantFailures = [FATAL];

      const result = await service.finalize(serviceActor, TEST_USER_ID);

      expect(result.success && result.data).toEqual({
        status: 'failed',
        userId: TEST_USER_ID,
        attempts: 1,
        reason: 'Forbidden: bot is not an admin',
      });
      expect(platform.grantCalls).toHaveLength(1);
      expect(db.tables.finalizations.get(TEST_USER_ID)?.status).toBe('failed');
    });

    it('should share one task between concurrent calls for a user', async () => {
      const [first, second] = await Promise.all([
        service.finalize(serviceActor, TEST_USER_ID),
        service.finalize(serviceActor, TEST_USER_ID),
      ]);

      expect(first).toEqual(second);
      expect(platform.grantCalls).toEqual([TEST_USER_ID]);
    });

    it('should continue an interrupted task from its saved attempt count', async () => {
      await db.accessDb.saveTask({
        userId: TEST_USER_ID,
        status: 'in_progress',
        attemptCount: 6,
        lastAttemptAt: clock.now(),
        nextAttemptAt: new Date('2025-01-10T12:00:10Z'),
        lastError: 'Bad Gateway',
        updatedAt: clock.now(),
      });
      platform.grantFailures = [TRANSIENT, TRANSIENT];

      const result = await service.finalize(serviceActor, TEST_USER_ID);

      expect(result.success && result.data).toMatchObject({ status: 'pending', attempts: 8 });
      expect(platform.grantCalls).toHaveLength(2);
      expect(delays).toEqual([10_000, 32000]);
    });

    it('should require payments:write', async () => {
      const result = await service.finalize(operatorActor, TEST_USER_ID);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('PERMISSION_DENIED');
    });
  });

  describe('schedule() and resumePending()', () => {
    it('should run finalization in the background', async () => {
      service.schedule(serviceActor, TEST_USER_ID);
      await service.whenIdle();

      expect(platform.members.has(TEST_USER_ID)).toBe(true);
    });

    it('should resume in-progress tasks', async () => {
      await db.accessDb.saveTask({
        userId: TEST_USER_ID,
        status: 'in_progress',
        attemptCount: 2,
        lastAttemptAt: clock.now(),
        nextAttemptAt: null,
        lastError: 'Bad Gateway',
        updatedAt: clock.now(),
      });

      const result = await service.resumePending(systemActor);
      await service.whenIdle();

      expect(result).toEqual({ success: true, data: { resumed: 1 } });
      expect(db.tables.finalizations.get(TEST_USER_ID)).toMatchObject({
        status: 'granted',
        attemptCount: 3,
      });
    });

    it('should close an interrupted task once access has lapsed', async () => {
      db.seedUser(TEST_OTHER_USER_ID);
      await db.accessDb.saveTask({
        userId: TEST_OTHER_USER_ID,
        status: 'in_progress',
        attemptCount: 3,
        lastAttemptAt: clock.now(),
        nextAttemptAt: null,
        lastError: 'Bad Gateway',
        updatedAt: clock.now(),
      });

      const first = await service.resumePending(systemActor);
      await service.whenIdle();
      const second = await service.resumePending(systemActor);

      expect(first).toEqual({ success: true, data: { resumed: 1 } });
      expect(second).toEqual({ success: true, data: { resumed: 0 } });
      expect(db.tables.finalizations.get(TEST_OTHER_USER_ID)).toMatchObject({
        status: 'failed',
        attemptCount: 3,
        lastError: 'no valid subscription',
      });
      expect(platform.grantCalls).toEqual([]);
    });

    it('should require jobs:run to resume', async () => {
      const result = await service.resumePending(serviceActor);

      expect(result.success).toBe(false);
    });
  });

  describe('enter()', () => {
    it('should grant directly when possible', async () => {
      const result = await service.enter(serviceActor, TEST_USER_ID);

      expect(result).toEqual({ success: true, data: { status: 'granted', userId: TEST_USER_ID } });
    });

    it('should hand out a short-lived invite link when the grant fails', async () => {
      platform.grantFailures = [{ ok: false, retryable: false, error: 'HIDE_REQUESTER_MISSING' }];

      const result = await service.enter(serviceActor, TEST_USER_ID);

      expect(result.success).toBe(true);
      if (!result.success || result.data.status !== 'invite') return;
      expect(result.data.expiresAt).toEqual(new Date('2025-01-10T12:05:00Z'));
      expect(result.data.inviteLink).toBe(
        `https://t.me/+invite-${TEST_USER_ID}-${new Date('2025-01-10T12:05:00Z').getTime()}`
      );
    });

    it('should refuse users without valid access', async () => {
      const result = await service.enter(serviceActor, 9999);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('NO_ACTIVE_ACCESS');
    });

    it('should report platform errors', async () => {
      platform.grantFailures = [TRANSIENT];
      vi.spyOn(platform, 'createInviteLink').mockRejectedValue(new Error('chat not found'));

      const result = await service.enter(serviceActor, TEST_USER_ID);

      expect(result).toEqual({
        success: false,
        error: { code: 'PLATFORM_ERROR', message: 'Failed to recover access: chat not found' },
      });
    });
  });
});
