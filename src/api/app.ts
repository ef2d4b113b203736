/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import type { Logger } from 'pino';

import { getLogger } from '../lib/logger.js';

import {
  createAuthMiddleware,
  createPublicMiddleware,
} from './middleware/auth.js';
import { createHealthRoutes, type HealthCheck } from './routes/health.js';
import { createJobRoutes } from './routes/jobs.js';
import { createPaymentRoutes } from './routes/payments.js';
import { createSubscriptionRoutes } from './routes/subscriptions.js';
import { createUserRoutes } from './routes/users.js';
import type { ApiServices } from './types.js';

/**
 * App configuration
 */
interface AppConfig {
  services: ApiServices;
  ingestTokens: string[];
  operatorTokens: string[];
  allowedOrigins?: string[];
  healthChecks?: HealthCheck[];
  logger?: Logger;
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { services, ingestTokens, operatorTokens, allowedOrigins } = config;
  const log = (config.logger ?? getLogger()).child({ component: 'http' });
  const app = new Hono();

  // Global middleware
  app.use('*', logger((message) => log.debug(message)));
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? [],
    })
  );

  // Public routes (no auth)
  const publicMiddleware = createPublicMiddleware();
  app.use('/api/v1/health', publicMiddleware);
  app.route('/api/v1', createHealthRoutes(config.healthChecks));

  // Auth middleware for protected routes
  const authMiddleware = createAuthMiddleware({ ingestTokens, operatorTokens });

  // Payment ingestion
  app.use('/api/v1/payments', authMiddleware);
  app.use('/api/v1/payments/*', authMiddleware);
  app.route(
    '/api/v1',
    createPaymentRoutes({ ingestionService: services.ingestionService })
  );

  // User routes
  app.use('/api/v1/users', authMiddleware);
  app.use('/api/v1/users/*', authMiddleware);
  app.route(
    '/api/v1',
    createUserRoutes({
      userService: services.userService,
      auditService: services.auditService,
    })
  );

  // Subscription routes
  app.use('/api/v1/subscriptions/*', authMiddleware);
  app.route(
    '/api/v1',
    createSubscriptionRoutes({
      subscriptionService: services.subscriptionService,
      accessService: services.accessService,
      paymentService: services.paymentService,
    })
  );

  // Scheduler-triggered jobs
  app.use('/api/v1/jobs/*', authMiddleware);
  app.route(
    '/api/v1',
    createJobRoutes({
      jobRunner: services.jobRunner,
      reconciliationService: services.reconciliationService,
    })
  );

  // 404 handler
  app.notFound((c) => {
    const requestId = c.get('requestId') ?? 'unknown';

    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId,
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    const requestId = c.get('requestId') ?? 'unknown';
    log.error({ err, requestId }, 'http.unhandled_error');

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId,
        },
      },
      500
    );
  });

  return app;
}
