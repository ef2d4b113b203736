/**
 * Payment to Access E2E Tests
 *
 * Drives the HTTP app through a member's whole life: payment, redelivery,
 * grace, expiry, revocation, and a payment recovered from the ledger.
 */

import { describe, it, expect, beforeEach } from 'vitest';

import {
  INGEST_TOKEN,
  OPERATOR_TOKEN,
  TEST_OTHER_USER_ID,
  TEST_USER_ID,
  ledgerTransaction,
} from '../fixtures/index.js';
import { createTestSystem, type TestSystem } from '../helpers/e2e-utils.js';

function submitPayment(system: TestSystem, chargeId: string, userId: number = TEST_USER_ID) {
  return system.app.request('/api/v1/payments', {
    method: 'POST',
    headers: { Authorization: `Bearer ${INGEST_TOKEN}`, 'Content-Type': 'application/json' },
    body: JSON.stringify({ userId, chargeId, amount: 500, kind: 'one_time' }),
  });
}

function runJob(system: TestSystem, job: string) {
  return system.app.request(`/api/v1/jobs/${job}`, {
    method: 'POST',
    headers: { Authorization: `Bearer ${OPERATOR_TOKEN}` },
  });
}

function getStatus(system: TestSystem, userId: number = TEST_USER_ID) {
  return system.app.request(`/api/v1/subscriptions/${userId}`, {
    headers: { Authorization: `Bearer ${OPERATOR_TOKEN}` },
  });
}

describe('E2E: payment to access', () => {
  let system: TestSystem;

  beforeEach(() => {
    system = createTestSystem({ start: '2025-01-10T12:00:00Z' });
  });

  it('should carry a member from payment through grace to revocation', async () => {
    // Payment arrives and is redelivered
    expect((await submitPayment(system, 'charge_1')).status).toBe(202);
    await system.settle();
    expect((await submitPayment(system, 'charge_1')).status).toBe(202);
    await system.settle();

    expect(system.db.tables.payments.size).toBe(1);
    expect(system.platform.members.has(TEST_USER_ID)).toBe(true);
    expect(await (await getStatus(system)).json()).toMatchObject({
      data: { status: 'active', expiresAt: '2025-02-09T12:00:00.000Z', hasAccess: true },
    });

    // Confirmation goes out once
    expect(await (await runJob(system, 'notifications')).json()).toMatchObject({
      data: { processed: 1, sent: 1, errors: 0 },
    });
    expect(system.notifier.sent.map((n) => n.type)).toEqual(['payment_received']);

    // Expiry passes: grace keeps access
    system.clock.set('2025-02-10T12:00:00Z');
    expect(await (await runJob(system, 'sweep')).json()).toMatchObject({
      data: {
        transitions: [{ from: 'active', to: 'grace', graceUntil: '2025-02-11T12:00:00.000Z' }],
        revoked: 0,
      },
    });
    expect(await (await getStatus(system)).json()).toMatchObject({
      data: { status: 'grace', hasAccess: true },
    });
    expect(system.platform.members.has(TEST_USER_ID)).toBe(true);

    // Grace ends: access is removed
    system.clock.set('2025-02-11T13:00:00Z');
    expect(await (await runJob(system, 'sweep')).json()).toMatchObject({
      data: { transitions: [{ from: 'grace', to: 'expired' }], revoked: 1 },
    });
    expect(system.platform.members.has(TEST_USER_ID)).toBe(false);
    expect(await (await getStatus(system)).json()).toMatchObject({
      data: { status: 'expired', hasAccess: false },
    });

    await runJob(system, 'notifications');
    expect(system.notifier.sent.map((n) => n.type)).toEqual([
      'payment_received',
      'grace_period_started',
      'subscription_expired',
    ]);
  });

  it('should restore a member who pays during grace', async () => {
    await submitPayment(system, 'charge_1');
    await system.settle();
    system.clock.set('2025-02-10T12:00:00Z');
    await runJob(system, 'sweep');

    await submitPayment(system, 'charge_2');
    await system.settle();

    expect(await (await getStatus(system)).json()).toMatchObject({
      data: {
        status: 'active',
        expiresAt: '2025-03-12T12:00:00.000Z',
        graceUntil: null,
        hasAccess: true,
      },
    });

    system.clock.set('2025-02-11T13:00:00Z');
    expect(await (await runJob(system, 'sweep')).json()).toMatchObject({
      data: { transitions: [], revoked: 0 },
    });
    expect(system.platform.members.has(TEST_USER_ID)).toBe(true);
  });

  it('should recover a payment the webhook never delivered', async () => {
    system.ledger.transactions = [
      ledgerTransaction({
        id: 'charge_9',
        chargeId: 'charge_9',
        userId: TEST_OTHER_USER_ID,
        date: new Date('2025-01-10T11:00:00Z'),
      }),
    ];

    expect(await (await runJob(system, 'reconciliation')).json()).toMatchObject({
      data: { paymentsFound: 1, cursorAdvancedTo: '2025-01-10T11:00:00.000Z' },
    });
    await system.settle();

    expect(system.platform.members.has(TEST_OTHER_USER_ID)).toBe(true);
    expect(await (await getStatus(system, TEST_OTHER_USER_ID)).json()).toMatchObject({
      data: { status: 'active', expiresAt: '2025-02-09T12:00:00.000Z' },
    });

    // The late webhook for the same charge changes nothing
    await submitPayment(system, 'charge_9', TEST_OTHER_USER_ID);
    await system.settle();
    expect(system.db.tables.payments.size).toBe(1);
  });
});
