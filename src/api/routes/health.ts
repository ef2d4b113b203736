/**
 * Health Route
 * Public endpoint for load balancers and uptime checks
 */

import { Hono } from 'hono';

export const SERVICE_NAME = 'paid-access-core';

/**
 * A dependency the service cannot work without. Resolves when reachable.
 */
export interface HealthCheck {
  name: string;
  check: () => Promise<void>;
}

type CheckStatus = 'ok' | 'unreachable';

/**
 * Create health check routes
 */
export function createHealthRoutes(checks: HealthCheck[] = []): Hono {
  const app = new Hono();

  /**
   * GET /health
   * 200 when every dependency answers, 503 otherwise. No authentication.
   */
  app.get('/health', async (c) => {
    const outcomes = await Promise.allSettled(checks.map((entry) => entry.check()));

    const results: Record<string, CheckStatus> = {};
    checks.forEach((entry, index) => {
      results[entry.name] = outcomes[index]?.status === 'fulfilled' ? 'ok' : 'unreachable';
    });
    const healthy = Object.values(results).every((status) => status === 'ok');

    return c.json(
      {
        status: healthy ? 'ok' : 'degraded',
        service: SERVICE_NAME,
        timestamp: new Date().toISOString(),
        checks: results,
      },
      healthy ? 200 : 503
    );
  });

  return app;
}
