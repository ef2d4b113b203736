/**
 * Telegram platform adapter
 *
 * AccessPlatform, TransactionLedger and Notifier over the Bot API via
 * grammy's Api client. Access is membership of one supergroup; members
 * join through join requests that the bot approves.
 */

import { Api, GrammyError, HttpError } from 'grammy';
import type { Logger } from 'pino';

import { getLogger } from '../lib/logger.js';
import type {
  AccessPlatform,
  ExternalTransaction,
  GrantResult,
  LedgerPage,
  NotificationType,
  Notifier,
  RevokeResult,
  TransactionLedger,
} from '../types/index.js';
import { NotificationUndeliverableError } from '../types/index.js';

const ALREADY_PARTICIPANT = 'USER_ALREADY_PARTICIPANT';

export interface TelegramPlatformConfig {
  groupChatId: number;
  logger?: Logger;
}

/**
 * Classify a Bot API failure. Rate limits, network errors and 5xx are
 * retryable; any other 4xx is final.
 */
export function classifyGrantError(err: unknown): GrantResult {
  if (err instanceof GrammyError) {
    if (err.description.includes(ALREADY_PARTICIPANT)) {
      return { ok: true, alreadyMember: true };
    }
    if (err.error_code === 429) {
      const retryAfter = err.parameters.retry_after;
      return retryAfter !== undefined
        ? { ok: false, retryable: true, error: err.description, retryAfterMs: retryAfter * 1000 }
        : { ok: false, retryable: true, error: err.description };
    }
    if (err.error_code >= 500) {
      return { ok: false, retryable: true, error: err.description };
    }
    return { ok: false, retryable: false, error: err.description };
  }
  if (err instanceof HttpError) {
    return { ok: false, retryable: true, error: err.message };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { ok: false, retryable: true, error: message };
}

function errorMessage(err: unknown): string {
  if (err instanceof GrammyError) {
    return err.description;
  }
  return err instanceof Error ? err.message : String(err);
}

function unixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

// ─────────────────────────────────────────────────────────────
// ACCESS
// ─────────────────────────────────────────────────────────────

export function createTelegramAccessPlatform(
  api: Api,
  config: TelegramPlatformConfig
): AccessPlatform {
  const chatId = config.groupChatId;
  const log = (config.logger ?? getLogger()).child({ component: 'telegram' });

  return {
    async grantAccess(userId: number): Promise<GrantResult> {
      try {
        // Lift an earlier revocation so the join request can be approved
        await api.unbanChatMember(chatId, userId, { only_if_banned: true });
        await api.approveChatJoinRequest(chatId, userId);
        return { ok: true };
      } catch (err) {
        const result = classifyGrantError(err);
        if (result.ok) {
          log.info({ userId }, 'telegram.user_already_member');
        }
        return result;
      }
    },

    async revokeAccess(userId: number): Promise<RevokeResult> {
      try {
        await api.banChatMember(chatId, userId);
        return { ok: true };
      } catch (err) {
        return { ok: false, error: errorMessage(err) };
      }
    },

    async createInviteLink(userId: number, expiresAt: Date): Promise<string> {
      const link = await api.createChatInviteLink(chatId, {
        name: `member-${userId}`,
        member_limit: 1,
        expire_date: unixSeconds(expiresAt),
      });
      return link.invite_link;
    },

    async stopRecurring(userId: number, chargeId: string): Promise<RevokeResult> {
      try {
        await api.editUserStarSubscription(userId, chargeId, true);
        return { ok: true };
      } catch (err) {
        return { ok: false, error: errorMessage(err) };
      }
    },
  };
}

// ─────────────────────────────────────────────────────────────
// LEDGER
// ─────────────────────────────────────────────────────────────

type StarTransaction = Awaited<ReturnType<Api['getStarTransactions']>>['transactions'][number];

/**
 * Incoming user payments carry the charge id as their transaction id, so
 * both natural keys are set from it.
 */
export function mapStarTransaction(tx: StarTransaction): ExternalTransaction {
  const source = tx.source;
  const fromUser = source !== undefined && source.type === 'user';

  return {
    id: tx.id,
    userId: fromUser ? source.user.id : null,
    amount: tx.amount,
    date: new Date(tx.date * 1000),
    chargeId: fromUser ? tx.id : null,
    isRecurring: fromUser ? source.subscription_period !== undefined : null,
    subscriptionExpiresAt: null,
    invoicePayload: fromUser ? (source.invoice_payload ?? null) : null,
  };
}

export function createTelegramLedger(api: Api): TransactionLedger {
  return {
    // The Bot API has no date filter; the caller drops rows outside its window
    async fetchPage(_since: Date, offset: number, limit: number): Promise<LedgerPage> {
      const page = await api.getStarTransactions({ offset, limit });
      return {
        transactions: page.transactions.map(mapStarTransaction),
        hasMore: page.transactions.length >= limit,
      };
    },
  };
}

// ─────────────────────────────────────────────────────────────
// NOTIFICATIONS
// ─────────────────────────────────────────────────────────────

function stringField(metadata: Record<string, unknown>, key: string): string {
  const value = metadata[key];
  return typeof value === 'string' || typeof value === 'number' ? String(value) : '';
}

function formatDate(value: string): string {
  if (value === '') {
    return '';
  }
  return `${value.slice(0, 16).replace('T', ' ')} UTC`;
}

export function renderNotification(
  type: NotificationType,
  metadata: Record<string, unknown>
): string {
  switch (type) {
    case 'payment_received':
      return `✅ Payment received! Your access is active until ${formatDate(stringField(metadata, 'expiresAt'))}.`;
    case 'subscription_renewed':
      return `✅ Subscription renewed! Your access continues until ${formatDate(stringField(metadata, 'expiresAt'))}.`;
    case 'grace_period_started':
      return `⏰ Your subscription expired. You keep access for a ${stringField(metadata, 'graceHours')} hour grace period. Renew to stay in the group.`;
    case 'subscription_expired':
      return '❌ Your subscription has ended and your access was removed. Pay again at any time to rejoin.';
    case 'expiry_reminder':
      return `⏰ Your access expires in ${stringField(metadata, 'daysLeft')} days (${formatDate(stringField(metadata, 'expiresAt'))}). Renew now to avoid interruption.`;
    case 'access_pending':
      return '⚠️ Your payment is confirmed but we could not add you to the group yet. Use /enter to get your personal invite link.';
  }
}

export function createTelegramNotifier(api: Api): Notifier {
  return {
    async send(
      userId: number,
      type: NotificationType,
      metadata: Record<string, unknown>
    ): Promise<void> {
      try {
        await api.sendMessage(userId, renderNotification(type, metadata));
      } catch (err) {
        // 403: the member blocked the bot or deleted their account
        if (err instanceof GrammyError && err.error_code === 403) {
          throw new NotificationUndeliverableError(err.description);
        }
        throw err;
      }
    },
  };
}

/**
 * Bot API client shared by the adapters
 */
export function createTelegramApi(botToken: string): Api {
  return new Api(botToken);
}
