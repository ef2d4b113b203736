/**
 * Application Entry Point
 *
 * Wires together all services and starts the Hono application.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp, type HealthCheck } from './api/index.js';
import {
  createLogger,
  createMemoryLease,
  createRedisClient,
  createRedisLease,
  createSupabaseAdmin,
  loadConfig,
} from './lib/index.js';
import {
  createTelegramAccessPlatform,
  createTelegramApi,
  createTelegramLedger,
  createTelegramNotifier,
} from './platform/telegram.js';
import {
  createAccessService,
  createAccessServiceDb,
  createAuditService,
  createAuditServiceDb,
  createIngestionService,
  createIngestionServiceDb,
  createLifecycleService,
  createNotificationService,
  createNotificationServiceDb,
  createPaymentService,
  createPaymentServiceDb,
  createReconciliationService,
  createReconciliationServiceDb,
  createSubscriptionService,
  createSubscriptionServiceDb,
  createUserService,
  createUserServiceDb,
  createWhitelistExemptionChecker,
} from './services/index.js';
import { SYSTEM_ACTOR } from './types/index.js';
import { createJobRunner } from './workers/index.js';

const config = loadConfig();
const logger = createLogger(config.logLevel);

// Create Supabase client
const supabase = createSupabaseAdmin(config.supabase.url, config.supabase.serviceKey);

// Platform adapters
const api = createTelegramApi(config.telegram.botToken);
const platform = createTelegramAccessPlatform(api, {
  groupChatId: config.telegram.groupChatId,
  logger,
});
const ledger = createTelegramLedger(api);
const notifier = createTelegramNotifier(api);

// Wire all services
const auditService = createAuditService({ db: createAuditServiceDb(supabase) });

const userService = createUserService({
  db: createUserServiceDb(supabase),
  auditService,
});

const paymentService = createPaymentService({
  db: createPaymentServiceDb(supabase),
  auditService,
  logger,
});

const subscriptionService = createSubscriptionService({
  db: createSubscriptionServiceDb(supabase),
  auditService,
  platform,
  policy: config.policy,
  logger,
});

const notificationService = createNotificationService({
  db: createNotificationServiceDb(supabase),
  notifier,
  logger,
});

const accessService = createAccessService({
  db: createAccessServiceDb(supabase),
  platform,
  subscriptionService,
  notificationService,
  auditService,
  policy: config.policy,
  logger,
});

const reconciliationDb = createReconciliationServiceDb(supabase);
const reconciliationService = createReconciliationService({
  db: reconciliationDb,
  ledger,
  userService,
  paymentService,
  subscriptionService,
  accessService,
  auditService,
  policy: config.policy,
  logger,
});

const lifecycleService = createLifecycleService({
  subscriptionService,
  notificationService,
  platform,
  exemptions: createWhitelistExemptionChecker(supabase),
  policy: config.policy,
  logger,
});

const ingestionService = createIngestionService({
  db: createIngestionServiceDb(supabase),
  services: {
    upsertUser: userService.upsertUser,
    record: paymentService.record,
    apply: subscriptionService.apply,
    schedule: accessService.schedule,
    queue: notificationService.queue,
  },
  logger,
});

const redis = config.redis ? createRedisClient(config.redis.url, config.redis.token) : null;
const lease = redis ? createRedisLease(redis) : createMemoryLease();
if (!redis) {
  logger.warn('Redis not configured; job leases are process-local');
}

const healthChecks: HealthCheck[] = [
  {
    name: 'storage',
    check: async () => {
      await reconciliationDb.getCursor();
    },
  },
];
if (redis) {
  healthChecks.push({
    name: 'lease',
    check: async () => {
      await redis.ping();
    },
  });
}

const jobRunner = createJobRunner({
  services: {
    reconciliationService,
    lifecycleService,
    notificationService,
    accessService,
  },
  lease,
  leaseSeconds: config.jobLeaseSeconds,
  logger,
});

// Create the API application
const app = createApp({
  services: {
    auditService,
    userService,
    paymentService,
    subscriptionService,
    accessService,
    ingestionService,
    reconciliationService,
    jobRunner,
  },
  ingestTokens: config.ingestTokens,
  operatorTokens: config.operatorTokens,
  healthChecks,
  logger,
});

serve(
  {
    fetch: app.fetch,
    port: config.port,
  },
  (info) => {
    logger.info({ port: info.port }, 'Server started');
  }
);

// Finalizations interrupted by the last shutdown continue from their saved attempt count
accessService
  .resumePending({ ...SYSTEM_ACTOR, requestId: 'startup' })
  .then((result) => {
    if (result.success) {
      logger.info({ resumed: result.data.resumed }, 'access.resume_on_startup');
    } else {
      logger.error({ error: result.error }, 'access.resume_on_startup_failed');
    }
  })
  .catch((err: unknown) => {
    logger.error({ err }, 'access.resume_on_startup_failed');
  });

export { app };
