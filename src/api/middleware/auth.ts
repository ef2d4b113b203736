/**
 * Auth Middleware
 * Constructs ActorContext from a bearer service token
 *
 * Two token sets: ingest tokens for the transport layer (webhook handler,
 * bot) and operator tokens for the external scheduler.
 */

import { createHash, timingSafeEqual } from 'node:crypto';

import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';

import type { ActorContext, Permission } from '../../types/index.js';
import { OPERATOR_PERMISSIONS, SERVICE_PERMISSIONS } from '../../types/index.js';

/**
 * Auth middleware dependencies
 */
interface AuthMiddlewareDeps {
  ingestTokens: string[];
  operatorTokens: string[];
}

/**
 * Generate a unique request ID
 */
function generateRequestId(): string {
  return nanoid();
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/**
 * Constant-time membership test; digests keep lengths equal
 */
function matchesAny(token: string, candidates: Buffer[]): boolean {
  const presented = digest(token);
  let matched = false;
  for (const candidate of candidates) {
    if (timingSafeEqual(presented, candidate)) {
      matched = true;
    }
  }
  return matched;
}

/**
 * Short stable identifier for audit logs; never the token itself
 */
export function tokenFingerprint(token: string): string {
  return digest(token).toString('hex').slice(0, 12);
}

function unauthorized(c: Context, requestId: string, message: string): Response {
  return c.json(
    {
      error: {
        code: 'UNAUTHORIZED',
        message,
        requestId,
      },
    },
    401
  );
}

/**
 * Create auth middleware for protected routes
 */
export function createAuthMiddleware(deps: AuthMiddlewareDeps) {
  const ingest = deps.ingestTokens.map(digest);
  const operator = deps.operatorTokens.map(digest);

  return async function authMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    // 1. Extract token from Authorization header
    const authHeader = c.req.header('Authorization');
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      return unauthorized(c, requestId, 'Missing or invalid authorization header');
    }

    const token = authHeader.slice(7).trim();
    if (!token) {
      return unauthorized(c, requestId, 'Missing or invalid authorization header');
    }

    // 2. Resolve the token to an actor type
    let type: ActorContext['type'];
    let permissions: Permission[];
    if (matchesAny(token, ingest)) {
      type = 'service';
      permissions = [...SERVICE_PERMISSIONS];
    } else if (matchesAny(token, operator)) {
      type = 'operator';
      permissions = [...OPERATOR_PERMISSIONS];
    } else {
      return unauthorized(c, requestId, 'Invalid token');
    }

    // 3. Construct ActorContext
    const ip = c.req.header('x-forwarded-for') ?? c.req.header('x-real-ip');
    const userAgent = c.req.header('user-agent');

    const actor: ActorContext = {
      type,
      tokenId: tokenFingerprint(token),
      requestId,
      permissions,
      ...(ip !== undefined && { ip }),
      ...(userAgent !== undefined && { userAgent }),
    };

    // 4. Attach to context
    c.set('actor', actor);
    c.set('requestId', requestId);

    return next();
  };
}

/**
 * Public middleware - sets anonymous actor
 */
export function createPublicMiddleware() {
  return async function publicMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    const actor: ActorContext = {
      type: 'anonymous',
      requestId,
      permissions: [],
    };

    c.set('actor', actor);
    c.set('requestId', requestId);

    return next();
  };
}
