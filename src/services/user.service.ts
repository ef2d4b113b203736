/**
 * UserService Implementation
 *
 * SCOPE: Member identity and display metadata, account status
 * NOT IN SCOPE: Payments, subscriptions, platform access
 *
 * Users are created on first interaction and never deleted, only deactivated.
 *
 * Dependencies: AuditService (for logging)
 */

import type {
  ActorContext,
  AuditEvent,
  Result,
  UpsertUserParams,
  User,
} from '../types/index.js';
import {
  success,
  failure,
  failureFromError,
  hasPermission,
} from '../types/index.js';

/**
 * Database abstraction interface for UserService
 */
export interface UserServiceDb {
  upsertUser: (params: UpsertUserParams, seenAt: Date) => Promise<User>;
  getUser: (userId: number) => Promise<User | null>;
  updateUserStatus: (userId: number, status: User['status']) => Promise<User>;
}

/**
 * Minimal AuditService interface (subset needed by UserService)
 */
export interface UserServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

/**
 * UserService interface
 */
export interface UserService {
  upsertUser(actor: ActorContext, params: UpsertUserParams): Promise<Result<User>>;
  getUser(actor: ActorContext, userId: number): Promise<Result<User>>;
  deactivateUser(actor: ActorContext, userId: number): Promise<Result<User>>;
}

const MAX_NAME_LENGTH = 255;

function isValidUserId(userId: number): boolean {
  return Number.isSafeInteger(userId) && userId > 0;
}

function validateUpsert(params: UpsertUserParams): string | null {
  if (!isValidUserId(params.userId)) {
    return 'userId must be a positive integer';
  }
  for (const field of ['username', 'firstName', 'lastName'] as const) {
    const value = params[field];
    if (typeof value === 'string' && value.length > MAX_NAME_LENGTH) {
      return `${field} must be ${MAX_NAME_LENGTH} characters or less`;
    }
  }
  return null;
}

/**
 * Create UserService instance
 */
export function createUserService(deps: {
  db: UserServiceDb;
  auditService: UserServiceAudit;
  now?: () => Date;
}): UserService {
  const { db, auditService } = deps;
  const now = deps.now ?? (() => new Date());

  return {
    /**
     * Create the member on first interaction, refresh display data afterwards
     * Requires: 'users:write' permission
     */
    async upsertUser(
      actor: ActorContext,
      params: UpsertUserParams
    ): Promise<Result<User>> {
      if (!hasPermission(actor, 'users:write')) {
        return failure('PERMISSION_DENIED', 'Actor lacks users:write permission');
      }

      const validationError = validateUpsert(params);
      if (validationError !== null) {
        return failure('VALIDATION_ERROR', validationError);
      }

      try {
        const user = await db.upsertUser(params, now());
        return success(user);
      } catch (err) {
        return failureFromError('STORAGE_UNAVAILABLE', 'Failed to upsert user', err);
      }
    },

    async getUser(actor: ActorContext, userId: number): Promise<Result<User>> {
      if (!hasPermission(actor, 'subscriptions:read')) {
        return failure(
          'PERMISSION_DENIED',
          'Actor lacks subscriptions:read permission'
        );
      }

      try {
        const user = await db.getUser(userId);
        if (user === null) {
          return failure('NOT_FOUND', `User not found: ${userId}`);
        }
        return success(user);
      } catch (err) {
        return failureFromError('STORAGE_UNAVAILABLE', 'Failed to read user', err);
      }
    },

    /**
     * Requires: 'users:write' permission
     */
    async deactivateUser(
      actor: ActorContext,
      userId: number
    ): Promise<Result<User>> {
      if (!hasPermission(actor, 'users:write')) {
        return failure('PERMISSION_DENIED', 'Actor lacks users:write permission');
      }

      try {
        const existing = await db.getUser(userId);
        if (existing === null) {
          return failure('NOT_FOUND', `User not found: ${userId}`);
        }
        if (existing.status === 'inactive') {
          return success(existing);
        }

        const user = await db.updateUserStatus(userId, 'inactive');
        await auditService.log(actor, {
          action: 'user.deactivated',
          resourceType: 'user',
          resourceId: String(userId),
          userId,
          details: { previousStatus: existing.status },
        });
        return success(user);
      } catch (err) {
        return failureFromError(
          'STORAGE_UNAVAILABLE',
          'Failed to deactivate user',
          err
        );
      }
    },
  };
}
