/**
 * Actor Types
 * Every service method that acts on behalf of a caller receives an actor
 */

/**
 * Actor Context - Who is performing the action
 *
 * - `service`: the transport layer (webhook handler, bot) holding an ingest token
 * - `operator`: the external scheduler or an operator holding an operator token
 * - `system`: background work started inside this process
 */
export interface ActorContext {
  type: 'service' | 'operator' | 'system' | 'anonymous';
  tokenId?: string;
  requestId: string;
  permissions: Permission[];
  ip?: string;
  userAgent?: string;
}

export type Permission =
  | '*'
  | 'payments:write'
  | 'users:write'
  | 'subscriptions:read'
  | 'subscriptions:manage'
  | 'jobs:run';

/**
 * System actor for background jobs
 * Has all permissions - use with caution
 */
export const SYSTEM_ACTOR: ActorContext = {
  type: 'system',
  requestId: 'system',
  permissions: ['*'],
};

/**
 * Permissions granted to holders of an ingest token
 */
export const SERVICE_PERMISSIONS: Permission[] = [
  'payments:write',
  'users:write',
  'subscriptions:read',
  'subscriptions:manage',
];

/**
 * Permissions granted to holders of an operator token
 */
export const OPERATOR_PERMISSIONS: Permission[] = [
  'jobs:run',
  'subscriptions:read',
];

export function hasPermission(
  actor: ActorContext,
  permission: Permission
): boolean {
  return (
    actor.permissions.includes('*') || actor.permissions.includes(permission)
  );
}
