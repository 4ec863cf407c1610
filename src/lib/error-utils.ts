/**
 * Error handling utilities for consistent error message extraction
 */

/**
 * Any object carrying a string `message`. Node core errors raised in another
 * realm (a vm context, a worker) fail `instanceof Error` but still match.
 */
export function isErrorLike(error: unknown): error is { message: string } {
  return typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string';
}

/**
 * Safely extracts error message from unknown error types.
 * Invariant: Always returns a string message
 */
export function extractErrorMessage(error: unknown): string {
  return isErrorLike(error) ? error.message : String(error);
}

/**
 * Node system error code (ENOENT, ETIMEDOUT, ...) if the value carries one
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
