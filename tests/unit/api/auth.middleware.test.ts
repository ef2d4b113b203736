/**
 * Auth Middleware Unit Tests
 *
 * SCOPE: Bearer token to ActorContext
 */

import { Hono } from 'hono';
import { describe, it, expect } from 'vitest';

import { createAuthMiddleware, tokenFingerprint } from '@/api/middleware/auth.js';
import { OPERATOR_PERMISSIONS, SERVICE_PERMISSIONS } from '@/types/index.js';

import { INGEST_TOKEN, OPERATOR_TOKEN } from '../../fixtures/index.js';
import { createTestSystem } from '../../helpers/e2e-utils.js';

function createWhoAmIApp(): Hono {
  const app = new Hono();
  app.use('*', createAuthMiddleware({ ingestTokens: [INGEST_TOKEN], operatorTokens: [OPERATOR_TOKEN] }));
  app.get('/whoami', (c) => c.json(c.get('actor')));
  return app;
}

describe('Auth Middleware', () => {
  it('should map ingest tokens to the service actor', async () => {
    const res = await createWhoAmIApp().request('/whoami', {
      headers: { Authorization: `Bearer ${INGEST_TOKEN}`, 'user-agent': 'webhook/1.0' },
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      type: 'service',
      tokenId: tokenFingerprint(INGEST_TOKEN),
      requestId: expect.any(String),
      permissions: SERVICE_PERMISSIONS,
      userAgent: 'webhook/1.0',
    });
  });

  it('should map operator tokens to the operator actor', async () => {
    const res = await createWhoAmIApp().request('/whoami', {
      headers: { Authorization: `Bearer ${OPERATOR_TOKEN}` },
    });

    expect(await res.json()).toMatchObject({
      type: 'operator',
      permissions: OPERATOR_PERMISSIONS,
    });
  });

  it('should reject a missing header', async () => {
    const res = await createWhoAmIApp().request('/whoami');

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: {
        code: 'UNAUTHORIZED',
        message: 'Missing or invalid authorization header',
        requestId: expect.any(String),
      },
    });
  });

  it('should reject a non-bearer scheme', async () => {
    const res = await createWhoAmIApp().request('/whoami', {
      headers: { Authorization: `Basic ${INGEST_TOKEN}` },
    });

    expect(res.status).toBe(401);
  });

  it('should reject unknown tokens', async () => {
    const res = await createWhoAmIApp().request('/whoami', {
      headers: { Authorization: 'Bearer test-unknown-token' },
    });

    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({ error: { message: 'Invalid token' } });
  });

  it('should never expose the token as its fingerprint', () => {
    const fingerprint = tokenFingerprint(INGEST_TOKEN);

    expect(fingerprint).toHaveLength(12);
    expect(fingerprint).not.toContain(INGEST_TOKEN);
    expect(tokenFingerprint(INGEST_TOKEN)).toBe(fingerprint);
  });

  it('should guard every protected route of the app', async () => {
    const system = createTestSystem();

    for (const path of ['/api/v1/payments', '/api/v1/users', '/api/v1/jobs/sweep']) {
      const res = await system.app.request(path, { method: 'POST' });
      expect(res.status).toBe(401);
    }
    const read = await system.app.request('/api/v1/subscriptions/1001');
    expect(read.status).toBe(401);
  });
});
