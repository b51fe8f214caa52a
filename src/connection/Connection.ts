/**
 * Connection
 *
 * One open socket, plain or TLS, with its incoming byte queue and the state
 * the liveness probe reads.
 */

import { TLSSocket } from 'node:tls';

import type { Socket } from 'node:net';

import {
  CLOSED_SOCKET_CODES,
  RequestTimeoutError,
  formatSocketError,
} from '@/errors/index.js';
import { SocketSource } from '@/framing/index.js';
import type { ByteSource } from '@/framing/index.js';
import { getErrorCode } from '@/utils/errors.js';

export class Connection {
  readonly id: number;
  readonly source: SocketSource;
  private readonly socket: Socket;
  private readonly timeoutMs: number;
  private closeEmitted = false;

  constructor(id: number, socket: Socket, timeoutMs: number) {
    this.id = id;
    this.socket = socket;
    this.timeoutMs = timeoutMs;
    this.source = new SocketSource(socket);
    socket.once('close', () => {
      this.closeEmitted = true;
    });
  }

  /** Whether the socket is TLS-wrapped. */
  get encrypted(): boolean {
    return this.socket instanceof TLSSocket;
  }

  /** Whether the TLS handshake resumed an earlier session. Always false for plain sockets. */
  get sessionReused(): boolean {
    return this.socket instanceof TLSSocket && this.socket.isSessionReused();
  }

  /**
   * Liveness check from already-delivered socket state. Never reads application data.
   *
   * Closed when the socket is destroyed, the peer sent FIN, or a reset-class
   * error was recorded. Bytes waiting in the queue do not make it closed.
   *
   * @throws RpcError for any other recorded socket error
   */
  isClosed(): boolean {
    const failure = this.source.getFailure();
    if (failure) {
      const code = getErrorCode(failure);
      if (failure instanceof RequestTimeoutError || (code !== undefined && CLOSED_SOCKET_CODES.has(code))) {
        return true;
      }
      throw formatSocketError(failure);
    }
    return this.socket.destroyed || this.socket.readableEnded || this.source.isEnded();
  }

  /**
   * Write a frame and read the reply with `read`, under the inactivity timeout.
   *
   * The socket is the caller's for the whole exchange; there is no multiplexing.
   */
  async exchange<T>(
    operation: string,
    frame: Uint8Array,
    read: (source: ByteSource) => Promise<T>
  ): Promise<T> {
    const onTimeout = (): void => {
      this.source.fail(new RequestTimeoutError(operation, this.timeoutMs));
      this.socket.destroy();
    };

    if (this.timeoutMs > 0) {
      this.socket.setTimeout(this.timeoutMs);
      this.socket.once('timeout', onTimeout);
    }
    try {
      await this.write(frame);
      return await read(this.source);
    } finally {
      if (this.timeoutMs > 0) {
        this.socket.off('timeout', onTimeout);
        this.socket.setTimeout(0);
      }
    }
  }

  /**
   * Destroy the socket and wait for it to close.
   */
  close(): Promise<void> {
    if (this.closeEmitted) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.socket.once('close', () => resolve());
      this.socket.destroy();
    });
  }

  private write(frame: Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.write(frame, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}
