/**
 * Byte Sources
 *
 * Pull-style reading over a push-style socket, so the frame readers can be
 * written as plain loops and tested without a socket.
 */

import type { Duplex } from 'node:stream';

/**
 * A stream of byte chunks.
 */
export interface ByteSource {
  /**
   * Resolve with the next chunk, or `null` once the peer has closed the stream.
   * Rejects with the stream's error if it failed.
   */
  read(): Promise<Buffer | null>;

  /**
   * Push bytes back so the next `read()` returns them first.
   */
  unread(chunk: Buffer): void;
}

/**
 * Byte source fed by a socket's `data`, `end`, `close` and `error` events.
 *
 * Chunks that arrive while nobody is reading are queued, not dropped, and are
 * handed to the next reader.
 */
export class SocketSource implements ByteSource {
  private readonly chunks: Buffer[] = [];
  private ended = false;
  private failure: Error | null = null;
  private waiter: (() => void) | null = null;

  constructor(stream: Duplex) {
    stream.on('data', (chunk: Buffer) => {
      this.chunks.push(chunk);
      this.wake();
    });
    stream.once('end', () => {
      this.ended = true;
      this.wake();
    });
    stream.once('close', () => {
      this.ended = true;
      this.wake();
    });
    stream.on('error', (error: Error) => {
      this.failure ??= error;
      this.wake();
    });
  }

  async read(): Promise<Buffer | null> {
    for (;;) {
      const chunk = this.chunks.shift();
      if (chunk) {
        return chunk;
      }
      if (this.failure) {
        throw this.failure;
      }
      if (this.ended) {
        return null;
      }
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }

  unread(chunk: Buffer): void {
    if (chunk.length > 0) {
      this.chunks.unshift(chunk);
    }
  }

  /**
   * Inject a failure, waking a pending reader. Used for timeouts.
   */
  fail(error: Error): void {
    this.failure ??= error;
    this.wake();
  }

  /** True once the peer has half-closed or the socket closed. */
  isEnded(): boolean {
    return this.ended;
  }

  /** The first error the stream reported, if any. */
  getFailure(): Error | null {
    return this.failure;
  }

  /** Number of received bytes not yet handed to a reader. */
  getBufferedBytes(): number {
    return this.chunks.reduce((total, chunk) => total + chunk.length, 0);
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}
