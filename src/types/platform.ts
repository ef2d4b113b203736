/**
 * External Platform Interfaces
 *
 * Everything the core consumes from the hosting platform and the
 * access-control layer. Shipped adapters live in src/platform/.
 */

import type { LedgerPage } from './reconciliation.js';
import type { NotificationType } from './notification.js';

export type GrantResult =
  | { ok: true; alreadyMember?: boolean }
  | { ok: false; retryable: true; error: string; retryAfterMs?: number }
  | { ok: false; retryable: false; error: string };

export type RevokeResult = { ok: true } | { ok: false; error: string };

export interface AccessPlatform {
  grantAccess(userId: number): Promise<GrantResult>;
  revokeAccess(userId: number): Promise<RevokeResult>;
  createInviteLink(userId: number, expiresAt: Date): Promise<string>;
  stopRecurring(userId: number, chargeId: string): Promise<RevokeResult>;
}

export interface TransactionLedger {
  fetchPage(since: Date, offset: number, limit: number): Promise<LedgerPage>;
}

export interface ExemptionChecker {
  isExempt(userId: number): Promise<boolean>;
}

export interface Notifier {
  send(
    userId: number,
    type: NotificationType,
    metadata: Record<string, unknown>
  ): Promise<void>;
}
