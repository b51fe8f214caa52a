/**
 * Structured RPC error classes.
 *
 * Provides type-safe error handling for transport, framing and envelope failures.
 */

import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Base class for all wirecall errors.
 *
 * Extends Error to include exit codes for consistent CLI behavior.
 */
export class RpcError extends Error {
  public readonly exitCode: number;

  constructor(message: string, exitCode: number = EXIT_CODES.SOFTWARE_ERROR) {
    super(message);
    this.name = 'RpcError';
    this.exitCode = exitCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RpcError);
    }
  }
}

/**
 * Error thrown when the socket connect or TLS handshake fails.
 *
 * @example
 * ```typescript
 * throw new ConnectionFailedError('connect ECONNREFUSED 127.0.0.1:8545', '127.0.0.1', 8545, 'ECONNREFUSED');
 * ```
 */
export class ConnectionFailedError extends RpcError {
  public override readonly name = 'ConnectionFailedError';
  public readonly host: string;
  public readonly port: number;
  public readonly code?: string;

  constructor(message: string, host: string, port: number, code?: string) {
    super(message, EXIT_CODES.CONNECTION_FAILURE);
    this.host = host;
    this.port = port;
    if (code !== undefined) {
      this.code = code;
    }
  }
}

/**
 * Error thrown when the peer closes the connection before a response frame
 * starts, or when writing to a socket the peer already closed.
 */
export class ConnectionClosedError extends RpcError {
  public override readonly name = 'ConnectionClosedError';
  public readonly method?: string;

  constructor(method?: string) {
    super(
      method === undefined
        ? 'Connection closed by peer'
        : `Connection closed before ${method} response received`,
      EXIT_CODES.CONNECTION_CLOSED
    );
    if (method !== undefined) {
      this.method = method;
    }
  }
}

/**
 * Error thrown when the stream ends after part of a frame was received.
 *
 * @example
 * ```typescript
 * throw new IncompleteFrameError(17);
 * ```
 */
export class IncompleteFrameError extends RpcError {
  public override readonly name = 'IncompleteFrameError';
  public readonly receivedBytes: number;

  constructor(receivedBytes: number) {
    super(`Stream ended after ${receivedBytes} bytes of an incomplete frame`, EXIT_CODES.FRAME_ERROR);
    this.receivedBytes = receivedBytes;
  }
}

/**
 * Error thrown when a frame cannot be parsed: unterminated or oversized header
 * block, missing or invalid Content-Length, or a frame above the size limit.
 */
export class MalformedFrameError extends RpcError {
  public override readonly name = 'MalformedFrameError';

  constructor(message: string) {
    super(`Malformed frame: ${message}`, EXIT_CODES.FRAME_ERROR);
  }
}

/**
 * Error thrown when a frame body is not a well-formed response envelope.
 */
export class MalformedEnvelopeError extends RpcError {
  public override readonly name = 'MalformedEnvelopeError';
  public override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(`Malformed envelope: ${message}`, EXIT_CODES.ENVELOPE_ERROR);
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * Error raised when a decoded response carries an `error` member.
 *
 * The server's payload is kept untouched on `error`.
 *
 * @example
 * ```typescript
 * throw new RemoteError({ code: -32601, message: 'Method not found' });
 * ```
 */
export class RemoteError extends RpcError {
  public override readonly name = 'RemoteError';
  public readonly error: unknown;

  constructor(error: unknown) {
    super(`Remote error: ${describeRemoteError(error)}`, EXIT_CODES.REMOTE_ERROR);
    this.error = error;
  }
}

/**
 * Error thrown when the socket stays idle longer than the configured timeout.
 */
export class RequestTimeoutError extends RpcError {
  public override readonly name = 'RequestTimeoutError';
  public readonly operation: string;
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, EXIT_CODES.TIMEOUT);
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Error thrown when client options fail validation.
 */
export class InvalidConfigError extends RpcError {
  public override readonly name = 'InvalidConfigError';
  public readonly option: string;

  constructor(option: string, message: string) {
    super(`Invalid option '${option}': ${message}`, EXIT_CODES.INVALID_ARGUMENTS);
    this.option = option;
  }
}

function describeRemoteError(error: unknown): string {
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string') {
      return message;
    }
  }
  return JSON.stringify(error) ?? String(error);
}
