/**
 * Subscription Routes
 * Status reads, checkout, cancellation and self-service entry
 */

import type { Context } from 'hono';
import { Hono } from 'hono';

import type { AccessService } from '../../services/access.service.js';
import type { PaymentService } from '../../services/payment.service.js';
import type { SubscriptionService } from '../../services/subscription.service.js';
import type { AccessStatus, Payment, Subscription } from '../../types/index.js';
import {
  errorResponse,
  formatOptionalDate,
  getActor,
  getRequestId,
  successResponse,
  validationErrorResponse,
} from '../utils/response.js';

import { userIdParamSchema } from './users.js';

interface SubscriptionRoutesDeps {
  subscriptionService: Pick<SubscriptionService, 'getStatus' | 'beginCheckout' | 'cancel'>;
  accessService: Pick<AccessService, 'enter'>;
  paymentService: Pick<PaymentService, 'listUserPayments'>;
}

function formatStatus(status: AccessStatus) {
  return {
    userId: status.userId,
    status: status.status,
    expiresAt: formatOptionalDate(status.expiresAt),
    graceUntil: formatOptionalDate(status.graceUntil),
    isRecurring: status.isRecurring,
    cancelledAt: formatOptionalDate(status.cancelledAt),
    hasAccess: status.hasAccess,
  };
}

function formatSubscription(subscription: Subscription) {
  return {
    id: subscription.id,
    userId: subscription.userId,
    status: subscription.status,
    expiresAt: formatOptionalDate(subscription.expiresAt),
    isRecurring: subscription.isRecurring,
    createdAt: subscription.createdAt.toISOString(),
  };
}

function formatPayment(payment: Payment) {
  return {
    id: payment.id,
    chargeId: payment.chargeId,
    externalTxId: payment.externalTxId,
    amount: payment.amount,
    currency: payment.currency,
    kind: payment.kind,
    isRecurring: payment.isRecurring,
    appliedAt: formatOptionalDate(payment.appliedAt),
    createdAt: payment.createdAt.toISOString(),
  };
}

/**
 * Parse the :userId path param, or produce the 400 response
 */
function parseUserId(c: Context): { userId: number } | { response: Response } {
  const parsed = userIdParamSchema.safeParse(c.req.param('userId'));
  if (!parsed.success) {
    return {
      response: validationErrorResponse(
        c,
        parsed.error.issues[0]?.message ?? 'Invalid userId',
        getRequestId(c)
      ),
    };
  }
  return { userId: parsed.data };
}

/**
 * Create subscription routes
 */
export function createSubscriptionRoutes(deps: SubscriptionRoutesDeps): Hono {
  const { subscriptionService, accessService, paymentService } = deps;
  const app = new Hono();

  /**
   * GET /subscriptions/:userId
   * GetStatus
   */
  app.get('/subscriptions/:userId', async (c) => {
    const parsed = parseUserId(c);
    if ('response' in parsed) {
      return parsed.response;
    }
    const requestId = getRequestId(c);

    const result = await subscriptionService.getStatus(getActor(c), parsed.userId);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, formatStatus(result.data), requestId);
  });

  /**
   * GET /subscriptions/:userId/payments
   */
  app.get('/subscriptions/:userId/payments', async (c) => {
    const parsed = parseUserId(c);
    if ('response' in parsed) {
      return parsed.response;
    }
    const requestId = getRequestId(c);

    const result = await paymentService.listUserPayments(getActor(c), parsed.userId);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data.map(formatPayment), requestId);
  });

  /**
   * POST /subscriptions/:userId/checkout
   * Pending row on a payment attempt
   */
  app.post('/subscriptions/:userId/checkout', async (c) => {
    const parsed = parseUserId(c);
    if ('response' in parsed) {
      return parsed.response;
    }
    const requestId = getRequestId(c);

    const result = await subscriptionService.beginCheckout(getActor(c), parsed.userId);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, formatSubscription(result.data), requestId);
  });

  /**
   * POST /subscriptions/:userId/cancel
   * Cancel -> ok | not_found
   */
  app.post('/subscriptions/:userId/cancel', async (c) => {
    const parsed = parseUserId(c);
    if ('response' in parsed) {
      return parsed.response;
    }
    const requestId = getRequestId(c);

    const result = await subscriptionService.cancel(getActor(c), parsed.userId);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      {
        userId: result.data.userId,
        cancelledAt: result.data.cancelledAt.toISOString(),
        expiresAt: formatOptionalDate(result.data.expiresAt),
        stoppedRecurring: result.data.stoppedRecurring,
      },
      requestId
    );
  });

  /**
   * POST /subscriptions/:userId/enter
   * Self-service access recovery
   */
  app.post('/subscriptions/:userId/enter', async (c) => {
    const parsed = parseUserId(c);
    if ('response' in parsed) {
      return parsed.response;
    }
    const requestId = getRequestId(c);

    const result = await accessService.enter(getActor(c), parsed.userId);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    const outcome = result.data;
    return successResponse(
      c,
      outcome.status === 'invite'
        ? {
            status: outcome.status,
            userId: outcome.userId,
            inviteLink: outcome.inviteLink,
            expiresAt: outcome.expiresAt.toISOString(),
          }
        : { status: outcome.status, userId: outcome.userId },
      requestId
    );
  });

  return app;
}
