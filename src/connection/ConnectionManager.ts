/**
 * Connection Manager
 *
 * Guarantees that every call goes out on a live socket: reuses the current
 * connection while the liveness probe passes, replaces it otherwise, and
 * carries the TLS session from one connection to the next.
 */

import { setImmediate as nextTurn, setTimeout as sleep } from 'node:timers/promises';

import type { Socket } from 'node:net';

import type { ClientConfig } from '@/config.js';
import { ConnectionFailedError } from '@/errors/index.js';
import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

import { Connection } from './Connection.js';
import { openSocket } from './socket.js';

const log = createLogger('connection');
const tlsLog = createLogger('tls');

/**
 * Failures that say nothing about the offered session; a full handshake would fail the same way.
 */
const FAIL_FAST_CODES: ReadonlySet<string> = new Set([
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
]);

export class ConnectionManager {
  private readonly config: ClientConfig;
  private connection: Connection | null = null;
  private session: Buffer | null = null;
  private nextId = 1;

  constructor(config: ClientConfig) {
    this.config = config;
  }

  /** The connection the next call would try first, if any. */
  get current(): Connection | null {
    return this.connection;
  }

  /** The TLS session that will be offered on the next handshake. */
  get tlsSession(): Buffer | null {
    return this.session;
  }

  /**
   * Liveness probe.
   *
   * Waits for a timer and then an immediate, which guarantees at least one
   * full poll phase: any FIN, TLS close_notify or reset the OS already holds is
   * dispatched to the socket before its state is inspected. Same semantics for
   * plain and TLS sockets.
   *
   * @throws RpcError if the socket recorded an error that is not a close signal
   */
  async isClosed(): Promise<boolean> {
    if (!this.connection) {
      return true;
    }
    await sleep(0);
    await nextTurn();
    return this.connection?.isClosed() ?? true;
  }

  /**
   * Return a live connection, opening a new one when there is none or the
   * current one was closed by the peer.
   *
   * @throws ConnectionFailedError if connecting or the TLS handshake fails
   */
  async ensureConnected(): Promise<Connection> {
    let closed: boolean;
    try {
      closed = await this.isClosed();
    } catch (error) {
      log.debug(`Dropping connection after socket fault: ${getErrorMessage(error)}`);
      void this.discard();
      throw error;
    }

    const existing = this.connection;
    if (existing && !closed) {
      log.debug(`Reusing connection #${existing.id}`);
      return existing;
    }
    if (existing) {
      log.debug(`Connection #${existing.id} closed by peer, reconnecting`);
      void this.discard();
    }

    const socket = await this.open();
    const connection = new Connection(this.nextId++, socket, this.config.timeoutMs);
    this.connection = connection;
    if (connection.encrypted) {
      tlsLog.debug(
        `Connection #${connection.id} ${connection.sessionReused ? 'resumed a TLS session' : 'completed a full handshake'}`
      );
    }
    return connection;
  }

  /**
   * Destroy the current connection, keeping the TLS session for the next one.
   *
   * The connection is detached at once; the returned promise settles when its
   * socket has closed.
   */
  discard(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    return connection ? connection.close() : Promise.resolve();
  }

  /**
   * Close the current connection and forget the TLS session.
   */
  async close(): Promise<void> {
    this.session = null;
    await this.discard();
  }

  private async open(): Promise<Socket> {
    const resumption = this.config.tls?.sessionResumption ?? false;
    const offered = resumption ? this.session : null;
    const onSession = resumption
      ? (session: Buffer): void => {
          this.session = session;
        }
      : undefined;

    try {
      return await openSocket(this.config, { session: offered, ...(onSession && { onSession }) });
    } catch (error) {
      if (offered === null || !(error instanceof ConnectionFailedError) || isFailFast(error)) {
        throw error;
      }
      tlsLog.info(`Handshake with cached session failed, retrying with a full handshake: ${error.message}`);
      this.session = null;
      return openSocket(this.config, { session: null, ...(onSession && { onSession }) });
    }
  }
}

function isFailFast(error: ConnectionFailedError): boolean {
  return error.code !== undefined && FAIL_FAST_CODES.has(error.code);
}
