/**
 * Access Policy
 * Durations that drive the ledger, reconciliation and lifecycle sweeps
 */

export interface AccessPolicy {
  planDays: number;
  renewalPeriodDays: number;
  graceHours: number;
  reconcileWindowDays: number;
  reconcileLookbackMultiplier: number;
  reconcilePageSize: number;
  reminderDaysBeforeExpiry: number;
  inviteTtlMinutes: number;
}

export const DEFAULT_ACCESS_POLICY: AccessPolicy = {
  planDays: 30,
  renewalPeriodDays: 30,
  graceHours: 48,
  reconcileWindowDays: 3,
  reconcileLookbackMultiplier: 2,
  reconcilePageSize: 100,
  reminderDaysBeforeExpiry: 3,
  inviteTtlMinutes: 5,
};

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;
