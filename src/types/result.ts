/**
 * Result Pattern
 *
 * Service methods return Result<T> and never throw for expected outcomes.
 * Database adapters may throw; services turn those into failures.
 */

/**
 * Error codes shared by services and the HTTP layer
 */
export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNAUTHORIZED'
  | 'PERMISSION_DENIED'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'NO_ACTIVE_ACCESS'
  | 'JOB_IN_PROGRESS'
  | 'LEDGER_UNAVAILABLE'
  | 'STORAGE_UNAVAILABLE'
  | 'PLATFORM_ERROR'
  | 'INTERNAL_ERROR';

export interface Success<T> {
  success: true;
  data: T;
}

export interface Failure {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

export type Result<T> = Success<T> | Failure;

/**
 * Helper function to create a success result
 */
export function success<T>(data: T): Success<T> {
  return { success: true, data };
}

/**
 * Helper function to create a failure result
 */
export function failure(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): Failure {
  const error: Failure['error'] = { code, message };
  if (details !== undefined) {
    error.details = details;
  }
  return {
    success: false,
    error,
  };
}

/**
 * Wrap an unknown thrown value into a failure
 */
export function failureFromError(
  code: ErrorCode,
  context: string,
  err: unknown
): Failure {
  const message = err instanceof Error ? err.message : String(err);
  return failure(code, `${context}: ${message}`);
}

/**
 * Type guard to check if result is success
 */
export function isSuccess<T>(result: Result<T>): result is Success<T> {
  return result.success === true;
}

/**
 * Type guard to check if result is failure
 */
export function isFailure<T>(result: Result<T>): result is Failure {
  return result.success === false;
}
