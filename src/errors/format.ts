/**
 * Transport Error Formatting
 *
 * Turns raw socket errors into the structured error classes.
 */

import { getErrorCode, getErrorMessage } from '@/utils/errors.js';

import { ConnectionClosedError, ConnectionFailedError, RpcError } from './RpcError.js';

/**
 * Error codes that mean the connection is gone rather than that something is broken locally.
 */
export const CLOSED_SOCKET_CODES: ReadonlySet<string> = new Set([
  'ECONNRESET',
  'EPIPE',
  'ECONNABORTED',
  'ERR_STREAM_DESTROYED',
  'ERR_STREAM_WRITE_AFTER_END',
]);

export function formatConnectionError(host: string, port: number, error: Error): ConnectionFailedError {
  const code = getErrorCode(error);
  const message = [
    `Connection to ${host}:${port} failed`,
    ...(code ? [`Code: ${code}`] : []),
    `Details: ${error.message}`,
  ].join(' | ');
  return new ConnectionFailedError(message, host, port, code);
}

/**
 * Map an error raised on an established socket.
 *
 * Reset-class errors become {@link ConnectionClosedError} naming the method;
 * other structured errors pass through; anything else is wrapped with its message.
 */
export function formatSocketError(error: unknown, method?: string): RpcError {
  if (error instanceof ConnectionClosedError && error.method === undefined && method !== undefined) {
    return new ConnectionClosedError(method);
  }
  if (error instanceof RpcError) {
    return error;
  }
  const code = getErrorCode(error);
  if (code !== undefined && CLOSED_SOCKET_CODES.has(code)) {
    return new ConnectionClosedError(method);
  }
  return new RpcError(`Socket error${code ? ` (${code})` : ''}: ${getErrorMessage(error)}`);
}
