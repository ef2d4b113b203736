/**
 * ReconciliationService Implementation (ReconciliationEngine)
 *
 * Re-derives payments from the platform's transaction ledger over an
 * overlapping window and feeds them through the same idempotent path as
 * live events.
 *
 * GUARDRAILS:
 * - Owns the cursor; it only moves forward, after every page succeeded
 * - A failed fetch or storage error aborts the run with the cursor unchanged
 * - Proposes payments through PaymentService.record like any other caller
 *
 * Dependencies: PaymentService, SubscriptionService, AccessService, AuditService
 */

import type { Logger } from 'pino';

import { getLogger } from '../lib/logger.js';
import type {
  AccessPolicy,
  ActorContext,
  AuditEvent,
  ExternalTransaction,
  LedgerPage,
  NewPayment,
  Payment,
  RecordOutcome,
  ReconciliationCursor,
  ReconciliationRunResult,
  Result,
  SubscriptionTransition,
  TransactionLedger,
  UpsertUserParams,
  User,
} from '../types/index.js';
import {
  DAY_MS,
  DEFAULT_ACCESS_POLICY,
  success,
  failure,
  failureFromError,
  hasPermission,
  isFailure,
} from '../types/index.js';

/**
 * Database abstraction interface for ReconciliationService
 */
export interface ReconciliationServiceDb {
  getCursor: () => Promise<ReconciliationCursor>;
  /** Moves the cursor to `at` only if that is later than the stored value */
  advanceCursor: (at: Date, txId: string) => Promise<ReconciliationCursor>;
}

export interface ReconciliationServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

export interface ReconciliationUsers {
  upsertUser: (actor: ActorContext, params: UpsertUserParams) => Promise<Result<User>>;
}

export interface ReconciliationPayments {
  record: (actor: ActorContext, payment: NewPayment) => Promise<Result<RecordOutcome>>;
}

export interface ReconciliationLedger {
  apply: (actor: ActorContext, payment: Payment) => Promise<Result<SubscriptionTransition>>;
}

export interface ReconciliationAccess {
  schedule: (actor: ActorContext, userId: number) => void;
}

/**
 * ReconciliationService interface
 */
export interface ReconciliationService {
  run(actor: ActorContext): Promise<Result<ReconciliationRunResult>>;
  getCursor(actor: ActorContext): Promise<Result<ReconciliationCursor>>;
}

/**
 * Map a ledger transaction to a payment proposal. Transactions the ledger
 * cannot classify are treated as recurring renewals.
 */
export function transactionToPayment(tx: ExternalTransaction, userId: number): NewPayment {
  const isRecurring = tx.isRecurring !== false;
  return {
    userId,
    chargeId: tx.chargeId,
    externalTxId: tx.id,
    amount: tx.amount,
    kind: isRecurring ? 'recurring_renewal' : 'one_time',
    isRecurring,
    subscriptionExpirationHint: tx.subscriptionExpiresAt,
    invoicePayload: tx.invoicePayload,
    createdAt: tx.date,
  };
}

/**
 * Start of the scan window: an overlap behind the cursor, or one window
 * back from now on the first run
 */
export function computeWindowStart(
  cursor: ReconciliationCursor,
  now: Date,
  policy: AccessPolicy = DEFAULT_ACCESS_POLICY
): Date {
  const windowMs = policy.reconcileWindowDays * DAY_MS;
  if (cursor.lastSeenAt === null) {
    return new Date(now.getTime() - windowMs);
  }
  return new Date(
    cursor.lastSeenAt.getTime() - windowMs * policy.reconcileLookbackMultiplier
  );
}

/**
 * Create ReconciliationService instance
 */
export function createReconciliationService(deps: {
  db: ReconciliationServiceDb;
  ledger: TransactionLedger;
  userService: ReconciliationUsers;
  paymentService: ReconciliationPayments;
  subscriptionService: ReconciliationLedger;
  accessService: ReconciliationAccess;
  auditService: ReconciliationServiceAudit;
  policy?: AccessPolicy;
  now?: () => Date;
  logger?: Logger;
}): ReconciliationService {
  const {
    db,
    ledger,
    userService,
    paymentService,
    subscriptionService,
    accessService,
    auditService,
  } = deps;
  const policy = deps.policy ?? DEFAULT_ACCESS_POLICY;
  const now = deps.now ?? (() => new Date());
  const log = (deps.logger ?? getLogger()).child({ component: 'reconciliation' });

  return {
    /**
     * One reconciliation pass
     * Requires: 'jobs:run' permission
     */
    async run(actor: ActorContext): Promise<Result<ReconciliationRunResult>> {
      if (!hasPermission(actor, 'jobs:run')) {
        return failure('PERMISSION_DENIED', 'Actor lacks jobs:run permission');
      }

      let cursor: ReconciliationCursor;
      try {
        cursor = await db.getCursor();
      } catch (err) {
        return failureFromError('STORAGE_UNAVAILABLE', 'Failed to read reconciliation cursor', err);
      }

      const windowEnd = now();
      const windowStart = computeWindowStart(cursor, windowEnd, policy);
      log.info(
        { windowStart: windowStart.toISOString(), windowEnd: windowEnd.toISOString() },
        'reconciliation.started'
      );

      let offset = 0;
      let scanned = 0;
      let found = 0;
      let repaired = 0;
      let newest: { at: Date; txId: string } | null = null;

      for (;;) {
        let page: LedgerPage;
        try {
          page = await ledger.fetchPage(windowStart, offset, policy.reconcilePageSize);
        } catch (err) {
          log.error({ err, offset }, 'reconciliation.fetch_failed');
          return failureFromError(
            'LEDGER_UNAVAILABLE',
            `Failed to fetch ledger page at offset ${offset}`,
            err
          );
        }

        for (const tx of page.transactions) {
          scanned++;
          const time = tx.date.getTime();
          if (time < windowStart.getTime() || time > windowEnd.getTime()) {
            continue;
          }
          if (newest === null || time > newest.at.getTime()) {
            newest = { at: tx.date, txId: tx.id };
          }
          if (tx.userId === null) {
            continue;
          }

          // Ledger payers may never have talked to the bot
          const member = await userService.upsertUser(actor, { userId: tx.userId });
          if (isFailure(member)) {
            if (member.error.code === 'VALIDATION_ERROR') {
              log.warn({ txId: tx.id, error: member.error }, 'reconciliation.tx_skipped');
              continue;
            }
            log.error({ txId: tx.id, error: member.error }, 'reconciliation.user_failed');
            return member;
          }

          const recorded = await paymentService.record(actor, transactionToPayment(tx, tx.userId));
          if (isFailure(recorded)) {
            if (recorded.error.code === 'VALIDATION_ERROR') {
              log.warn({ txId: tx.id, error: recorded.error }, 'reconciliation.tx_skipped');
              continue;
            }
            log.error({ txId: tx.id, error: recorded.error }, 'reconciliation.record_failed');
            return recorded;
          }

          const { outcome, payment } = recorded.data;
          if (outcome === 'already_exists' && payment.appliedAt !== null) {
            continue;
          }

          const applied = await subscriptionService.apply(actor, payment);
          if (isFailure(applied)) {
            log.error({ paymentId: payment.id, error: applied.error }, 'reconciliation.apply_failed');
            return applied;
          }

          if (outcome === 'inserted') {
            found++;
          } else {
            repaired++;
          }
          if (applied.data.kind !== 'noop') {
            accessService.schedule(actor, payment.userId);
          }
        }

        offset += page.transactions.length;
        if (!page.hasMore || page.transactions.length === 0) {
          break;
        }
      }

      let cursorAdvancedTo: Date | null = null;
      if (
        newest !== null &&
        (cursor.lastSeenAt === null || newest.at.getTime() > cursor.lastSeenAt.getTime())
      ) {
        try {
          const advanced = await db.advanceCursor(newest.at, newest.txId);
          cursorAdvancedTo = advanced.lastSeenAt;
        } catch (err) {
          log.error({ err }, 'reconciliation.cursor_failed');
          return failureFromError('STORAGE_UNAVAILABLE', 'Failed to advance reconciliation cursor', err);
        }
      }

      const result: ReconciliationRunResult = {
        paymentsFound: found,
        transactionsScanned: scanned,
        repaired,
        windowStart,
        cursorAdvancedTo,
      };

      log.info(
        {
          paymentsFound: found,
          transactionsScanned: scanned,
          repaired,
          cursorAdvancedTo: cursorAdvancedTo?.toISOString() ?? null,
        },
        'reconciliation.completed'
      );
      await auditService.log(actor, {
        action: 'reconciliation.completed',
        resourceType: 'reconciliation',
        details: {
          paymentsFound: found,
          transactionsScanned: scanned,
          repaired,
          windowStart: windowStart.toISOString(),
          windowEnd: windowEnd.toISOString(),
        },
      });

      return success(result);
    },

    async getCursor(actor: ActorContext): Promise<Result<ReconciliationCursor>> {
      if (!hasPermission(actor, 'jobs:run')) {
        return failure('PERMISSION_DENIED', 'Actor lacks jobs:run permission');
      }
      try {
        return success(await db.getCursor());
      } catch (err) {
        return failureFromError('STORAGE_UNAVAILABLE', 'Failed to read reconciliation cursor', err);
      }
    },
  };
}
