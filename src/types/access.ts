/**
 * Access Finalization Types
 */

/**
 * Delay after each failed retryable attempt, in milliseconds.
 * The number of entries is the attempt budget.
 */
export const BACKOFF_SCHEDULE_MS: readonly number[] = [
  500, 1000, 2000, 4000, 8000, 16000, 32000, 64000,
] as const;

export type FinalizationStatus = 'in_progress' | 'granted' | 'pending' | 'failed';

/**
 * Persisted per-user task context so an interrupted finalization can resume
 */
export interface FinalizationTask {
  userId: number;
  status: FinalizationStatus;
  attemptCount: number;
  lastAttemptAt: Date | null;
  nextAttemptAt: Date | null;
  lastError: string | null;
  updatedAt: Date;
}

export type FinalizeOutcome =
  | { status: 'granted'; userId: number; attempts: number }
  | { status: 'pending'; userId: number; attempts: number; lastError: string | null }
  | { status: 'failed'; userId: number; attempts: number; reason: string };

/**
 * Result of the self-service entry path
 */
export type EnterOutcome =
  | { status: 'granted'; userId: number }
  | { status: 'invite'; userId: number; inviteLink: string; expiresAt: Date };
