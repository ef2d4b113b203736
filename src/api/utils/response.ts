/**
 * API Response Helpers
 * Standardized response formatting
 */

import type { Context } from 'hono';

import type { ActorContext, ErrorCode } from '../../types/index.js';
import { getErrorStatus } from '../types.js';

/**
 * Service error shape (matches Result pattern)
 */
interface ServiceError {
  code: ErrorCode;
  message: string;
  details?: unknown;
}

/**
 * Create error response from service error
 */
export function errorResponse(
  c: Context,
  error: ServiceError,
  requestId: string
): Response {
  return c.json(
    {
      error: {
        code: error.code,
        message: error.message,
        details: error.details,
        requestId,
      },
    },
    getErrorStatus(error.code)
  );
}

/**
 * Create validation error response from the first zod issue
 */
export function validationErrorResponse(
  c: Context,
  message: string,
  requestId: string
): Response {
  return c.json(
    {
      error: {
        code: 'VALIDATION_ERROR',
        message,
        requestId,
      },
    },
    400
  );
}

/**
 * Create success response with data
 */
export function successResponse<T>(
  c: Context,
  data: T,
  requestId: string,
  status: 200 | 201 | 202 = 200
): Response {
  return c.json(
    {
      data,
      meta: { requestId },
    },
    status
  );
}

/**
 * Helper to get actor from context
 */
export function getActor(c: Context): ActorContext {
  return c.get('actor');
}

/**
 * Helper to get request ID from context
 */
export function getRequestId(c: Context): string {
  return c.get('requestId') || getActor(c).requestId;
}

/**
 * Format optional date
 */
export function formatOptionalDate(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

/**
 * Read a JSON body, treating a missing or malformed body as empty
 */
export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return {};
  }
}
