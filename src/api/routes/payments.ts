/**
 * Payment Routes
 * Entry point for the webhook handler after it has verified the update
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { IngestionService } from '../../services/ingestion.service.js';
import type { PaymentEvent } from '../../types/index.js';
import {
  errorResponse,
  getActor,
  getRequestId,
  readJsonBody,
  successResponse,
  validationErrorResponse,
} from '../utils/response.js';

interface PaymentRoutesDeps {
  ingestionService: Pick<IngestionService, 'submit'>;
}

// Zod Schemas
const paymentEventSchema = z.object({
  userId: z.number().int().positive(),
  chargeId: z.string().min(1).max(255),
  externalTxId: z.string().min(1).max(255).nullable().optional(),
  amount: z.number().int().nonnegative(),
  kind: z.enum(['one_time', 'recurring_initial', 'recurring_renewal']),
  recurringExpiry: z.string().datetime({ offset: true }).nullable().optional(),
  invoicePayload: z.string().max(1024).nullable().optional(),
  user: z
    .object({
      username: z.string().max(255).nullable().optional(),
      firstName: z.string().max(255).nullable().optional(),
      lastName: z.string().max(255).nullable().optional(),
      languageCode: z.string().max(16).nullable().optional(),
    })
    .optional(),
});

/**
 * Create payment routes
 */
export function createPaymentRoutes(deps: PaymentRoutesDeps): Hono {
  const { ingestionService } = deps;
  const app = new Hono();

  /**
   * POST /payments
   * SubmitPayment: accepted immediately, processed after the response
   */
  app.post('/payments', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const validation = paymentEventSchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(
        c,
        validation.error.issues[0]?.message ?? 'Invalid payment event',
        requestId
      );
    }

    const body = validation.data;
    const event: PaymentEvent = {
      userId: body.userId,
      chargeId: body.chargeId,
      externalTxId: body.externalTxId ?? null,
      amount: body.amount,
      kind: body.kind,
      recurringExpiry:
        body.recurringExpiry !== undefined && body.recurringExpiry !== null
          ? new Date(body.recurringExpiry)
          : null,
      invoicePayload: body.invoicePayload ?? null,
      ...(body.user !== undefined && { user: body.user }),
    };

    const result = ingestionService.submit(actor, event);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId, 202);
  });

  return app;
}
