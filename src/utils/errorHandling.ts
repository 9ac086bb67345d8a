/**
 * Error Handling Utilities
 *
 * Type-safe helpers for narrowing the `unknown` value of a catch clause.
 */

/**
 * Type guard to check if value is an Error object
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

/**
 * Type guard to check if error has a message property
 */
export function hasMessage(error: unknown): error is { message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

/**
 * Safely extract error message from unknown error
 * Handles Error objects, objects with message, strings, and unknown values
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }

  if (hasMessage(error)) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'An unknown error occurred';
}

/**
 * Safely extract error stack trace from unknown error
 */
export function getErrorStack(error: unknown): string | undefined {
  return isError(error) ? error.stack : undefined;
}

/**
 * Convert unknown error to Error object
 * Useful when you need to wrap or rethrow a proper Error
 */
export function toError(error: unknown): Error {
  if (isError(error)) {
    return error;
  }

  return new Error(getErrorMessage(error));
}

/**
 * Create standardized error log context from unknown error
 */
export function createErrorLogContext(
  error: unknown,
  additionalContext?: Record<string, unknown>
): { message: string; stack?: string; [key: string]: unknown } {
  const stack = getErrorStack(error);

  return {
    message: getErrorMessage(error),
    ...(stack && { stack }),
    ...additionalContext,
  };
}
