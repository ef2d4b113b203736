/**
 * AuditService Unit Tests
 *
 * SCOPE: Append-only log writes and per-member history
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import type { AuditService, AuditServiceDb } from '@/services/audit.service.js';
import { createAuditService } from '@/services/audit.service.js';

import {
  TEST_OTHER_USER_ID,
  TEST_REQUEST_ID,
  TEST_USER_ID,
  anonymousActor,
  operatorActor,
  serviceActor,
  systemActor,
} from '../../fixtures/index.js';
import { createMemoryDatabase, type MemoryDatabase } from '../../mocks/index.js';

describe('AuditService', () => {
  let db: MemoryDatabase;
  let service: AuditService;

  beforeEach(() => {
    db = createMemoryDatabase(() => new Date('2025-01-10T12:00:00Z'));
    service = createAuditService({ db: db.auditDb });
  });

  describe('log()', () => {
    it('should record the actor and request', async () => {
      const result = await service.log(serviceActor, {
        action: 'payment.recorded',
        resourceType: 'payment',
        resourceId: 'pay_1',
        userId: TEST_USER_ID,
      });

      expect(result).toEqual({ success: true, data: undefined });
      expect(db.tables.auditLogs).toEqual([
        {
          id: 'aud_1',
          timestamp: new Date('2025-01-10T12:00:00Z'),
          actorId: 'tok_service',
          actorType: 'service',
          action: 'payment.recorded',
          resourceType: 'payment',
          resourceId: 'pay_1',
          userId: TEST_USER_ID,
          details: {},
          requestId: TEST_REQUEST_ID,
        },
      ]);
    });

    it('should accept events from any actor', async () => {
      const result = await service.log(anonymousActor, {
        action: 'access.requested',
        resourceType: 'subscription',
      });

      expect(result.success).toBe(true);
      expect(db.tables.auditLogs[0]).toMatchObject({
        actorId: null,
        actorType: 'anonymous',
        resourceId: null,
        userId: null,
      });
    });

    it('should report storage failures as a result', async () => {
      const failingDb: AuditServiceDb = {
        ...db.auditDb,
        insertLog: vi.fn().mockRejectedValue(new Error('disk full')),
      };

      const result = await createAuditService({ db: failingDb }).log(systemActor, {
        action: 'subscription.expired',
        resourceType: 'subscription',
      });

      expect(result).toEqual({
        success: false,
        error: { code: 'INTERNAL_ERROR', message: 'Failed to write audit log' },
      });
    });
  });

  describe('getUserHistory()', () => {
    it('should return one member\'s events newest first', async () => {
      for (const action of ['payment.recorded', 'subscription.activated', 'access.granted']) {
        await service.log(serviceActor, { action, resourceType: 'subscription', userId: TEST_USER_ID });
      }
      await service.log(serviceActor, {
        action: 'payment.recorded',
        resourceType: 'payment',
        userId: TEST_OTHER_USER_ID,
      });

      const result = await service.getUserHistory(operatorActor, TEST_USER_ID, 2);

      expect(result.success && result.data.map((log) => log.action)).toEqual([
        'access.granted',
        'subscription.activated',
      ]);
    });

    it('should require subscriptions:read', async () => {
      const result = await service.getUserHistory(anonymousActor, TEST_USER_ID);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('PERMISSION_DENIED');
    });
  });
});
