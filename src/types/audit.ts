/**
 * Audit Types
 * Funnel and audit events written by every service
 */

/**
 * Actor types for audit logging
 */
export type AuditActorType = 'service' | 'operator' | 'system' | 'anonymous';

/**
 * Event to be logged to the audit system
 * Used as input to AuditService.log()
 */
export interface AuditEvent {
  action: string; // e.g., 'payment.recorded', 'access.granted'
  resourceType: string; // e.g., 'payment', 'subscription'
  resourceId?: string;
  userId?: number; // member the event is about, if any
  details?: Record<string, unknown>;
}

/**
 * Full audit log record (from database)
 */
export interface AuditLog {
  id: string;
  timestamp: Date;
  actorId: string | null;
  actorType: AuditActorType;
  action: string;
  resourceType: string;
  resourceId: string | null;
  userId: number | null;
  details: Record<string, unknown>;
  requestId: string | null;
}
