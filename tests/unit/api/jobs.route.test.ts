/**
 * Job Route Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';

import {
  INGEST_TOKEN,
  OPERATOR_TOKEN,
  TEST_USER_ID,
  ledgerTransaction,
  serviceActor,
} from '../../fixtures/index.js';
import { createTestSystem, type TestSystem } from '../../helpers/e2e-utils.js';

function trigger(system: TestSystem, job: string, token: string = OPERATOR_TOKEN) {
  return system.app.request(`/api/v1/jobs/${job}`, {
    method: 'POST',
    headers: { Authorization: `Bearer ${token}` },
  });
}

describe('Job Routes', () => {
  let system: TestSystem;

  beforeEach(() => {
    system = createTestSystem({ start: '2025-01-02T00:00:00Z' });
  });

  it('should run the sweep and serialize transitions', async () => {
    const row = system.db.seedSubscription({
      userId: TEST_USER_ID,
      status: 'active',
      expiresAt: new Date('2025-01-01T00:00:00Z'),
    });

    const res = await trigger(system, 'sweep');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: {
        transitions: [
          {
            subscriptionId: row.id,
            userId: TEST_USER_ID,
            from: 'active',
            to: 'grace',
            at: '2025-01-02T00:00:00.000Z',
            graceUntil: '2025-01-03T00:00:00.000Z',
          },
        ],
        notificationsQueued: 1,
        revoked: 0,
        revocationsSkipped: 0,
        errors: 0,
      },
      meta: { requestId: expect.any(String) },
    });
  });

  it('should run reconciliation and expose the cursor', async () => {
    system.ledger.transactions = [
      ledgerTransaction({ date: new Date('2025-01-01T18:00:00Z') }),
    ];

    const run = await trigger(system, 'reconciliation');
    const cursor = await system.app.request('/api/v1/jobs/reconciliation/cursor', {
      headers: { Authorization: `Bearer ${OPERATOR_TOKEN}` },
    });

    expect(await run.json()).toMatchObject({
      data: {
        paymentsFound: 1,
        transactionsScanned: 1,
        repaired: 0,
        windowStart: '2024-12-30T00:00:00.000Z',
        cursorAdvancedTo: '2025-01-01T18:00:00.000Z',
      },
    });
    expect(await cursor.json()).toMatchObject({
      data: { lastSeenAt: '2025-01-01T18:00:00.000Z', lastSeenTxId: 'charge_1' },
    });
  });

  it('should deliver queued notifications', async () => {
    await system.notificationService.queue(serviceActor, TEST_USER_ID, 'payment_received');

    const res = await trigger(system, 'notifications');

    expect(await res.json()).toMatchObject({ data: { processed: 1, sent: 1, errors: 0 } });
    expect(system.notifier.sent).toHaveLength(1);
  });

  it('should run reminders and finalizations', async () => {
    const reminders = await trigger(system, 'reminders');
    const finalizations = await trigger(system, 'finalizations');

    expect(await reminders.json()).toMatchObject({ data: { remindersQueued: 0, errors: 0 } });
    expect(await finalizations.json()).toMatchObject({ data: { resumed: 0 } });
  });

  it('should refuse ingest tokens', async () => {
    const res = await trigger(system, 'sweep', INGEST_TOKEN);

    expect(res.status).toBe(403);
    expect(await res.json()).toMatchObject({ error: { code: 'PERMISSION_DENIED' } });
  });
});
