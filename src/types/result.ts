/**
 * Result Pattern Implementation
 *
 * All service methods return Result<T> - never throw exceptions
 */

/**
 * Error codes surfaced by the service layer
 */
export type ErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_WINDOW'
  | 'NOT_ACTIVE'
  | 'INSUFFICIENT_BALANCE'
  | 'INSUFFICIENT_AVAILABLE'
  | 'DUPLICATE_OPERATION'
  | 'ALREADY_COMMITTED'
  | 'ALREADY_RELEASED'
  | 'NOT_SPONSORED'
  | 'STILL_ACTIVE'
  | 'DUPLICATE_MESSAGE'
  | 'CHANNEL_UNAVAILABLE'
  | 'WRONG_CHAIN'
  | 'PERMISSION_DENIED'
  | 'VALIDATION_ERROR'
  | 'UNAUTHORIZED'
  | 'RATE_LIMITED'
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
