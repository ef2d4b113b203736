/**
 * Job Routes
 * Invoked by the external scheduler; this service owns no clock
 */

import type { Context } from 'hono';
import { Hono } from 'hono';

import type { ReconciliationService } from '../../services/reconciliation.service.js';
import type { Result } from '../../types/index.js';
import type { JobRunner } from '../../workers/job-runner.js';
import {
  errorResponse,
  formatOptionalDate,
  getActor,
  getRequestId,
  successResponse,
} from '../utils/response.js';

interface JobRoutesDeps {
  jobRunner: JobRunner;
  reconciliationService: Pick<ReconciliationService, 'getCursor'>;
}

function respond<T, R>(
  c: Context,
  result: Result<T>,
  format: (data: T) => R
): Response {
  const requestId = getRequestId(c);
  if (!result.success) {
    return errorResponse(c, result.error, requestId);
  }
  return successResponse(c, format(result.data), requestId);
}

/**
 * Create job routes
 */
export function createJobRoutes(deps: JobRoutesDeps): Hono {
  const { jobRunner, reconciliationService } = deps;
  const app = new Hono();

  /**
   * POST /jobs/reconciliation
   * RunReconciliation
   */
  app.post('/jobs/reconciliation', async (c) => {
    const result = await jobRunner.runReconciliation(getActor(c));
    return respond(c, result, (run) => ({
      paymentsFound: run.paymentsFound,
      transactionsScanned: run.transactionsScanned,
      repaired: run.repaired,
      windowStart: run.windowStart.toISOString(),
      cursorAdvancedTo: formatOptionalDate(run.cursorAdvancedTo),
    }));
  });

  /**
   * GET /jobs/reconciliation/cursor
   */
  app.get('/jobs/reconciliation/cursor', async (c) => {
    const result = await reconciliationService.getCursor(getActor(c));
    return respond(c, result, (cursor) => ({
      lastSeenAt: formatOptionalDate(cursor.lastSeenAt),
      lastSeenTxId: cursor.lastSeenTxId,
      updatedAt: formatOptionalDate(cursor.updatedAt),
    }));
  });

  /**
   * POST /jobs/sweep
   * RunSweep
   */
  app.post('/jobs/sweep', async (c) => {
    const result = await jobRunner.runSweep(getActor(c));
    return respond(c, result, (sweep) => ({
      transitions: sweep.transitions.map((t) => ({
        subscriptionId: t.subscriptionId,
        userId: t.userId,
        from: t.from,
        to: t.to,
        at: t.at.toISOString(),
        graceUntil: t.graceUntil?.toISOString() ?? null,
      })),
      notificationsQueued: sweep.notificationsQueued,
      revoked: sweep.revoked,
      revocationsSkipped: sweep.revocationsSkipped,
      errors: sweep.errors,
    }));
  });

  /**
   * POST /jobs/reminders
   */
  app.post('/jobs/reminders', async (c) => {
    const result = await jobRunner.runReminders(getActor(c));
    return respond(c, result, (reminders) => reminders);
  });

  /**
   * POST /jobs/notifications
   */
  app.post('/jobs/notifications', async (c) => {
    const result = await jobRunner.runNotifications(getActor(c));
    return respond(c, result, (batch) => batch);
  });

  /**
   * POST /jobs/finalizations
   * Resume access finalizations interrupted by a restart
   */
  app.post('/jobs/finalizations', async (c) => {
    const result = await jobRunner.runFinalizations(getActor(c));
    return respond(c, result, (resume) => resume);
  });

  return app;
}
