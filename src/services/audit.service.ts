/**
 * AuditService Implementation
 *
 * Purpose: Append-only funnel and audit log.
 * Owns: audit_logs
 * Dependencies: None (lowest level service)
 */

import type {
  ActorContext,
  AuditEvent,
  AuditLog,
  Result,
} from '../types/index.js';
import { success, failure, hasPermission } from '../types/index.js';

export interface AuditLogEntry {
  actorId: string | null;
  actorType: string;
  action: string;
  resourceType: string;
  resourceId: string | null;
  userId: number | null;
  details: Record<string, unknown>;
  requestId: string | null;
}

/**
 * Database abstraction interface for AuditService
 * Allows mocking in tests
 */
export interface AuditServiceDb {
  insertLog: (entry: AuditLogEntry) => Promise<{ id: string }>;
  getLogsByUser: (userId: number, limit: number) => Promise<AuditLog[]>;
}

/**
 * AuditService interface
 */
export interface AuditService {
  log(actor: ActorContext, event: AuditEvent): Promise<Result<void>>;
  getUserHistory(
    actor: ActorContext,
    userId: number,
    limit?: number
  ): Promise<Result<AuditLog[]>>;
}

const DEFAULT_HISTORY_LIMIT = 50;
const MAX_HISTORY_LIMIT = 500;

function buildLogEntry(actor: ActorContext, event: AuditEvent): AuditLogEntry {
  return {
    actorId: actor.tokenId ?? null,
    actorType: actor.type,
    action: event.action,
    resourceType: event.resourceType,
    resourceId: event.resourceId ?? null,
    userId: event.userId ?? null,
    details: event.details ?? {},
    requestId: actor.requestId,
  };
}

/**
 * Create AuditService instance
 */
export function createAuditService(deps: { db: AuditServiceDb }): AuditService {
  const { db } = deps;

  return {
    /**
     * Log an audit event
     * No permission check - all services can log
     */
    async log(actor: ActorContext, event: AuditEvent): Promise<Result<void>> {
      try {
        await db.insertLog(buildLogEntry(actor, event));
        return success(undefined);
      } catch {
        return failure('INTERNAL_ERROR', 'Failed to write audit log');
      }
    },

    /**
     * Funnel history of one member, newest first
     * Requires: 'subscriptions:read' permission
     */
    async getUserHistory(
      actor: ActorContext,
      userId: number,
      limit: number = DEFAULT_HISTORY_LIMIT
    ): Promise<Result<AuditLog[]>> {
      if (!hasPermission(actor, 'subscriptions:read')) {
        return failure(
          'PERMISSION_DENIED',
          'Actor lacks subscriptions:read permission'
        );
      }

      const boundedLimit = Math.min(Math.max(1, limit), MAX_HISTORY_LIMIT);
      try {
        const logs = await db.getLogsByUser(userId, boundedLimit);
        return success(logs);
      } catch {
        return failure('STORAGE_UNAVAILABLE', 'Failed to read audit history');
      }
    },
  };
}
