/**
 * Error handling utilities.
 *
 * Pure helpers for pulling messages and errno codes out of unknown errors.
 */

/**
 * Extract error message from unknown error type.
 *
 * @param error - Error of unknown type
 * @returns `error.message` for Error instances, `String(error)` otherwise
 *
 * @example
 * ```typescript
 * try {
 *   await client.invoke('status');
 * } catch (error) {
 *   console.error(`Failed: ${getErrorMessage(error)}`);
 * }
 * ```
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Extract the errno-style code (`ECONNREFUSED`, `EPIPE`, ...) from a Node.js
 * system error, if there is one.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
