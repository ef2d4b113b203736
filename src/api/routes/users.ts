/**
 * User Routes
 * Member upsert on first interaction and funnel history
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { AuditService } from '../../services/audit.service.js';
import type { UserService } from '../../services/user.service.js';
import type { User } from '../../types/index.js';
import {
  errorResponse,
  formatOptionalDate,
  getActor,
  getRequestId,
  readJsonBody,
  successResponse,
  validationErrorResponse,
} from '../utils/response.js';

interface UserRoutesDeps {
  userService: Pick<UserService, 'upsertUser' | 'getUser'>;
  auditService: Pick<AuditService, 'getUserHistory'>;
}

const MAX_LIMIT = 500;
const DEFAULT_LIMIT = 50;

// Zod Schemas
const upsertUserSchema = z.object({
  userId: z.number().int().positive(),
  username: z.string().max(255).nullable().optional(),
  firstName: z.string().max(255).nullable().optional(),
  lastName: z.string().max(255).nullable().optional(),
  languageCode: z.string().max(16).nullable().optional(),
});

export const userIdParamSchema = z.coerce
  .number({ invalid_type_error: 'userId must be a number' })
  .int('userId must be an integer')
  .positive('userId must be positive');

function formatUser(user: User) {
  return {
    userId: user.userId,
    username: user.username,
    firstName: user.firstName,
    lastName: user.lastName,
    languageCode: user.languageCode,
    status: user.status,
    lastSeenAt: formatOptionalDate(user.lastSeenAt),
    createdAt: user.createdAt.toISOString(),
    updatedAt: user.updatedAt.toISOString(),
  };
}

function parseLimit(value: string | undefined): number {
  if (!value) {
    return DEFAULT_LIMIT;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    return DEFAULT_LIMIT;
  }
  return Math.min(parsed, MAX_LIMIT);
}

/**
 * Create user routes
 */
export function createUserRoutes(deps: UserRoutesDeps): Hono {
  const { userService, auditService } = deps;
  const app = new Hono();

  /**
   * POST /users
   * Create or refresh a member
   */
  app.post('/users', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const validation = upsertUserSchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(
        c,
        validation.error.issues[0]?.message ?? 'Invalid user data',
        requestId
      );
    }

    const result = await userService.upsertUser(actor, validation.data);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, formatUser(result.data), requestId);
  });

  /**
   * GET /users/:userId
   */
  app.get('/users/:userId', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const userId = userIdParamSchema.safeParse(c.req.param('userId'));
    if (!userId.success) {
      return validationErrorResponse(
        c,
        userId.error.issues[0]?.message ?? 'Invalid userId',
        requestId
      );
    }

    const result = await userService.getUser(actor, userId.data);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, formatUser(result.data), requestId);
  });

  /**
   * GET /users/:userId/events
   * Funnel and audit events for one member, newest first
   */
  app.get('/users/:userId/events', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const userId = userIdParamSchema.safeParse(c.req.param('userId'));
    if (!userId.success) {
      return validationErrorResponse(
        c,
        userId.error.issues[0]?.message ?? 'Invalid userId',
        requestId
      );
    }

    const result = await auditService.getUserHistory(
      actor,
      userId.data,
      parseLimit(c.req.query('limit'))
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      result.data.map((log) => ({
        id: log.id,
        timestamp: log.timestamp.toISOString(),
        action: log.action,
        actorType: log.actorType,
        resourceType: log.resourceType,
        resourceId: log.resourceId,
        details: log.details,
      })),
      requestId
    );
  });

  return app;
}
