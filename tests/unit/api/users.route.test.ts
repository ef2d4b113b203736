/**
 * User Route Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';

import {
  INGEST_TOKEN,
  OPERATOR_TOKEN,
  TEST_USER_ID,
  serviceActor,
} from '../../fixtures/index.js';
import { createTestSystem, type TestSystem } from '../../helpers/e2e-utils.js';

describe('User Routes', () => {
  let system: TestSystem;

  beforeEach(() => {
    system = createTestSystem({ start: '2025-01-10T12:00:00Z' });
  });

  describe('POST /users', () => {
    it('should upsert and return the formatted member', async () => {
      const res = await system.app.request('/api/v1/users', {
        method: 'POST',
        headers: { Authorization: `Bearer ${INGEST_TOKEN}`, 'Content-Type': 'application/json' },
        body: JSON.stringify({ userId: TEST_USER_ID, firstName: 'Ada', languageCode: 'fr' }),
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        data: {
          userId: TEST_USER_ID,
          username: null,
          firstName: 'Ada',
          lastName: null,
          languageCode: 'fr',
          status: 'active',
          lastSeenAt: '2025-01-10T12:00:00.000Z',
          createdAt: '2025-01-10T12:00:00.000Z',
          updatedAt: '2025-01-10T12:00:00.000Z',
        },
        meta: { requestId: expect.any(String) },
      });
    });

    it('should reject a missing userId', async () => {
      const res = await system.app.request('/api/v1/users', {
        method: 'POST',
        headers: { Authorization: `Bearer ${INGEST_TOKEN}`, 'Content-Type': 'application/json' },
        body: JSON.stringify({ firstName: 'Ada' }),
      });

      expect(res.status).toBe(400);
    });
  });

  describe('GET /users/:userId', () => {
    it('should return 404 for unknown members', async () => {
      const res = await system.app.request(`/api/v1/users/${TEST_USER_ID}`, {
        headers: { Authorization: `Bearer ${OPERATOR_TOKEN}` },
      });

      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({ error: { code: 'NOT_FOUND' } });
    });

    it('should reject a non-numeric id', async () => {
      const res = await system.app.request('/api/v1/users/abc', {
        headers: { Authorization: `Bearer ${OPERATOR_TOKEN}` },
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: 'VALIDATION_ERROR', message: 'userId must be a number' },
      });
    });
  });

  describe('GET /users/:userId/events', () => {
    it('should return the newest events up to the limit', async () => {
      await system.auditService.log(serviceActor, {
        action: 'payment.recorded',
        resourceType: 'payment',
        userId: TEST_USER_ID,
      });
      await system.auditService.log(serviceActor, {
        action: 'access.granted',
        resourceType: 'subscription',
        userId: TEST_USER_ID,
      });

      const res = await system.app.request(`/api/v1/users/${TEST_USER_ID}/events?limit=1`, {
        headers: { Authorization: `Bearer ${OPERATOR_TOKEN}` },
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: [
          {
            id: 'aud_2',
            timestamp: '2025-01-10T12:00:00.000Z',
            action: 'access.granted',
            actorType: 'service',
            resourceType: 'subscription',
            resourceId: null,
            details: {},
          },
        ],
      });
    });
  });
});
