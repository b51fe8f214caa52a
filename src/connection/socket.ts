/**
 * Socket Opening
 *
 * Opens a plain TCP or TLS socket and settles once it is ready for writes.
 */

import { connect as connectTcp } from 'node:net';
import { connect as connectTls } from 'node:tls';

import type { Socket } from 'node:net';

import type { ClientConfig } from '@/config.js';
import { RequestTimeoutError, formatConnectionError } from '@/errors/index.js';
import { createLogger } from '@/ui/logging/index.js';

import { buildTlsOptions } from './tls.js';

const log = createLogger('connection');

export interface OpenSocketOptions {
  /** TLS session to offer for resumption. */
  session: Buffer | null;
  /** Receives every TLS session ticket the server issues. */
  onSession?: (session: Buffer) => void;
}

/**
 * Open a socket to the configured server.
 *
 * Resolves on `connect` (plain) or `secureConnect` (TLS). Connect and handshake
 * failures reject with ConnectionFailedError; no retries are made here.
 *
 * @throws ConnectionFailedError if the connection or TLS handshake fails
 * @throws RequestTimeoutError if the socket stays idle past `timeoutMs` while connecting
 */
export function openSocket(config: ClientConfig, options: OpenSocketOptions): Promise<Socket> {
  const { host, port, tls, timeoutMs } = config;

  return new Promise((resolve, reject) => {
    let socket: Socket;
    try {
      socket = tls
        ? connectTls({ ...buildTlsOptions(tls, host, options.session), host, port })
        : connectTcp({ host, port });
    } catch (error) {
      reject(formatConnectionError(host, port, error instanceof Error ? error : new Error(String(error))));
      return;
    }

    const readyEvent = tls ? 'secureConnect' : 'connect';

    const cleanup = (): void => {
      socket.off(readyEvent, onReady);
      socket.off('error', onError);
      socket.off('timeout', onTimeout);
      socket.setTimeout(0);
    };

    const onReady = (): void => {
      cleanup();
      socket.setNoDelay(true);
      log.debug(`Connected to ${host}:${port}${tls ? ' (TLS)' : ''}`);
      resolve(socket);
    };

    const onError = (error: Error): void => {
      cleanup();
      socket.destroy();
      reject(formatConnectionError(host, port, error));
    };

    const onTimeout = (): void => {
      cleanup();
      socket.destroy();
      reject(new RequestTimeoutError(`connect to ${host}:${port}`, timeoutMs));
    };

    if (options.onSession) {
      socket.on('session', options.onSession);
    }
    if (timeoutMs > 0) {
      socket.setTimeout(timeoutMs);
    }
    socket.once(readyEvent, onReady);
    socket.once('error', onError);
    socket.once('timeout', onTimeout);
  });
}
