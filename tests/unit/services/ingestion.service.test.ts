/**
 * IngestionService Unit Tests
 *
 * SCOPE: Live payment path from event to access
 *
 * GUARDRAILS:
 * - Redelivered events never extend access twice
 * - Events that fail for non-validation reasons are parked, not lost
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import { createIngestionService, eventToPayment } from '@/services/ingestion.service.js';

import {
  TEST_USER_ID,
  operatorActor,
  paymentEvent,
  serviceActor,
} from '../../fixtures/index.js';
import { createMemoryDatabase } from '../../mocks/index.js';
import { createTestSystem, type TestSystem } from '../../helpers/e2e-utils.js';
import { silentLogger } from '../../helpers/test-utils.js';

describe('eventToPayment', () => {
  it('should mark every non one-time kind as recurring', () => {
    const payment = eventToPayment(
      paymentEvent({
        kind: 'recurring_initial',
        recurringExpiry: new Date('2025-02-10T00:00:00Z'),
      })
    );

    expect(payment).toEqual({
      userId: TEST_USER_ID,
      chargeId: 'charge_1',
      externalTxId: null,
      amount: 500,
      kind: 'recurring_initial',
      isRecurring: true,
      subscriptionExpirationHint: new Date('2025-02-10T00:00:00Z'),
      invoicePayload: null,
    });
  });
});

describe('IngestionService', () => {
  let system: TestSystem;

  beforeEach(() => {
    system = createTestSystem({ start: '2025-01-10T12:00:00Z' });
  });

  describe('process()', () => {
    it('should record, apply, notify and grant access', async () => {
      const result = await system.ingestionService.process(
        serviceActor,
        paymentEvent({ user: { username: 'member_one', firstName: 'Ada' } })
      );
      await system.settle();

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.outcome).toBe('applied');
      expect(result.data.transition).toMatchObject({
        kind: 'activated',
        expiresAt: new Date('2025-02-09T12:00:00Z'),
      });
      expect(system.db.tables.users.get(TEST_USER_ID)).toMatchObject({
        username: 'member_one',
        firstName: 'Ada',
      });
      expect(system.db.tables.notifications.map((n) => n.type)).toEqual(['payment_received']);
      expect(system.platform.members.has(TEST_USER_ID)).toBe(true);
    });

    it('should treat a redelivered event as a duplicate', async () => {
      await system.ingestionService.process(serviceActor, paymentEvent());
      const again = await system.ingestionService.process(serviceActor, paymentEvent());
      await system.settle();

      expect(again.success && again.data).toMatchObject({ outcome: 'duplicate', transition: null });
      const current = await system.db.subscriptionDb.getCurrentSubscription(TEST_USER_ID);
      expect(current?.expiresAt).toEqual(new Date('2025-02-09T12:00:00Z'));
      expect(system.db.tables.notifications).toHaveLength(1);
      expect(system.platform.members.has(TEST_USER_ID)).toBe(true);
    });

    it('should send a renewal notice for recurring renewals', async () => {
      await system.ingestionService.process(
        serviceActor,
        paymentEvent({ kind: 'recurring_renewal' })
      );

      expect(system.db.tables.notifications.map((n) => n.type)).toEqual(['subscription_renewed']);
    });

    it('should reject invalid events without parking them', async () => {
      const result = await system.ingestionService.process(
        serviceActor,
        paymentEvent({ chargeId: '  ' })
      );

      expect(result).toEqual({
        success: false,
        error: { code: 'VALIDATION_ERROR', message: 'chargeId is required' },
      });
      expect(system.db.tables.failedPayments).toEqual([]);
    });

    it('should park events that fail in storage', async () => {
      const db = createMemoryDatabase();
      const service = createIngestionService({
        db: db.ingestionDb,
        services: {
          upsertUser: system.userService.upsertUser,
          record: vi.fn().mockResolvedValue({
            success: false,
            error: { code: 'STORAGE_UNAVAILABLE', message: 'Failed to record payment: timeout' },
          }),
          apply: system.subscriptionService.apply,
          schedule: vi.fn(),
          queue: system.notificationService.queue,
        },
        logger: silentLogger(),
      });

      const result = await service.process(serviceActor, paymentEvent());

      expect(result.success).toBe(false);
      expect(db.tables.failedPayments).toEqual([
        {
          userId: TEST_USER_ID,
          chargeId: 'charge_1',
          error: 'STORAGE_UNAVAILABLE: Failed to record payment: timeout',
          rawEvent: {
            userId: TEST_USER_ID,
            chargeId: 'charge_1',
            amount: 500,
            kind: 'one_time',
            recurringExpiry: null,
          },
        },
      ]);
    });
  });

  describe('submit()', () => {
    it('should accept immediately and finish in the background', async () => {
      const receipt = system.ingestionService.submit(serviceActor, paymentEvent());

      expect(receipt).toEqual({
        success: true,
        data: { accepted: true, userId: TEST_USER_ID, chargeId: 'charge_1' },
      });

      await system.settle();
      expect(system.db.tables.payments.size).toBe(1);
      expect(system.platform.members.has(TEST_USER_ID)).toBe(true);
    });

    it('should require payments:write', () => {
      const result = system.ingestionService.submit(operatorActor, paymentEvent());

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('PERMISSION_DENIED');
    });
  });
});
