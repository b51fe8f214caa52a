/**
 * RPC Client
 *
 * Public API for calling a JSON-RPC server over HTTP-framed or raw-framed
 * sockets, with or without TLS.
 */

import { resolveClientConfig } from '@/config.js';
import type { ClientConfig, ClientOptions } from '@/config.js';
import { ConnectionManager } from '@/connection/index.js';
import type { Connection } from '@/connection/index.js';
import { createRequest, decodeResponse, encodeRequest } from '@/envelope/index.js';
import type { Params } from '@/envelope/index.js';
import { formatSocketError } from '@/errors/index.js';
import { FrameWriter, readFrame } from '@/framing/index.js';
import { createLogger } from '@/ui/logging/index.js';
import { SerialQueue } from '@/utils/concurrency.js';

import { generateRequestId } from './requestId.js';
import { RpcResponse } from './response.js';

const log = createLogger('client');

export class RpcClient {
  readonly config: ClientConfig;
  private readonly connections: ConnectionManager;
  private readonly writer: FrameWriter;
  private readonly queue = new SerialQueue();

  /**
   * @throws InvalidConfigError if an option is out of range
   *
   * @example
   * ```typescript
   * const client = new RpcClient({ host: '127.0.0.1', port: 8545, mode: 'raw' });
   * ```
   */
  constructor(options: ClientOptions = {}) {
    this.config = resolveClientConfig(options);
    this.connections = new ConnectionManager(this.config);
    this.writer = new FrameWriter(this.config);
  }

  /** The connection the next call will try to reuse, if any. */
  get connection(): Connection | null {
    return this.connections.current;
  }

  /** The TLS session that will be offered on the next handshake. */
  get tlsSession(): Buffer | null {
    return this.connections.tlsSession;
  }

  /**
   * Call a remote method.
   *
   * Calls on one client run strictly one after another. Nothing is retried: a
   * transport failure rejects this call and drops the connection, and the next
   * call opens a new one.
   *
   * @param method - Remote method name
   * @param params - Positional or named arguments; `Uint8Array` values are sent as base64
   * @returns The decoded response; a server-side error is only raised by `json`/`raiseForStatus`
   * @throws ConnectionFailedError if connecting fails
   * @throws ConnectionClosedError if the peer closes before the response
   * @throws IncompleteFrameError / MalformedFrameError on framing failures
   * @throws MalformedEnvelopeError if the response is not a valid envelope
   * @throws RequestTimeoutError if the socket idles past `timeoutMs`
   *
   * @example
   * ```typescript
   * const response = await client.invoke('echo', [42]);
   * response.json; // 42
   *
   * await client.invoke('resize', { image: pngBytes, width: 64 });
   * ```
   */
  invoke(method: string, params: Params = []): Promise<RpcResponse> {
    return this.queue.run(() => this.roundTrip(method, params));
  }

  /**
   * Open a connection now instead of on the first call, or return the live one.
   *
   * @throws ConnectionFailedError if connecting fails
   */
  connect(): Promise<Connection> {
    return this.queue.run(() => this.connections.ensureConnected());
  }

  /**
   * Close the connection but keep the TLS session, so the next connection can resume it.
   */
  disconnect(): Promise<void> {
    return this.queue.run(() => this.connections.discard());
  }

  /**
   * Close the connection and forget the TLS session.
   */
  close(): Promise<void> {
    return this.queue.run(() => this.connections.close());
  }

  private async roundTrip(method: string, params: Params): Promise<RpcResponse> {
    const request = createRequest(method, params, generateRequestId());
    const connection = await this.connections.ensureConnected();
    const frame = this.writer.frame(encodeRequest(request));

    let body: Buffer;
    try {
      body = await connection.exchange(method, frame, (source) =>
        readFrame(source, this.config.mode, { maxFrameBytes: this.config.maxFrameBytes })
      );
    } catch (error) {
      void this.connections.discard();
      throw formatSocketError(error, method);
    }

    log.debug(`${method} #${request.id}: sent ${frame.length} bytes, received ${body.length}`);
    return new RpcResponse(decodeResponse(body), request.id);
  }
}
