/**
 * Client configuration.
 *
 * Options are validated and frozen once, when a client is created, and the
 * resulting value is shared by the connection manager and the frame writer.
 */

import {
  DEFAULT_HOST,
  DEFAULT_MAX_FRAME_BYTES,
  DEFAULT_PORT,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
} from '@/constants.js';
import { InvalidConfigError } from '@/errors/index.js';

/**
 * How envelopes are framed on the wire.
 *
 * - 'http': HTTP/1.1 POST request with Content-Length
 * - 'raw': envelope bytes followed by a single NUL byte
 */
export type TransportMode = 'http' | 'raw';

/** PEM material accepted by Node's TLS layer. */
export type PemInput = string | Buffer | Array<string | Buffer>;

export interface TlsSettings {
  /** Trusted CA certificates; Node's bundled roots are used when omitted. */
  ca?: PemInput;
  /** Client certificate chain for mutual TLS. */
  cert?: PemInput;
  /** Client private key for mutual TLS. */
  key?: PemInput;
  /** SNI / hostname to verify against; defaults to `host` unless it is an IP address. */
  servername?: string;
  /** Accept self-signed certificates: disables certificate and hostname verification. */
  allowSelfSigned: boolean;
  /** Reuse TLS sessions across reconnects. */
  sessionResumption: boolean;
}

export interface ClientOptions {
  host?: string;
  port?: number;
  mode?: TransportMode;
  userAgent?: string;
  /** `true` for TLS with defaults, or TLS settings. */
  tls?: boolean | Partial<TlsSettings>;
  /** Socket inactivity timeout in milliseconds; 0 disables it. */
  timeoutMs?: number;
  /** Largest response frame accepted, in bytes. */
  maxFrameBytes?: number;
}

export interface ClientConfig {
  readonly host: string;
  readonly port: number;
  readonly mode: TransportMode;
  readonly userAgent: string;
  readonly tls: Readonly<TlsSettings> | null;
  readonly timeoutMs: number;
  readonly maxFrameBytes: number;
}

const TRANSPORT_MODES: readonly TransportMode[] = ['http', 'raw'];

/**
 * Validate options and build the immutable client configuration.
 *
 * @throws InvalidConfigError if any option is out of range
 *
 * @example
 * ```typescript
 * const config = resolveClientConfig({ port: 8545, mode: 'raw' });
 * ```
 */
export function resolveClientConfig(options: ClientOptions = {}): ClientConfig {
  const host = options.host ?? DEFAULT_HOST;
  if (host.trim() === '') {
    throw new InvalidConfigError('host', 'must not be empty');
  }
  checkHeaderValue('host', host);

  const port = options.port ?? DEFAULT_PORT;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidConfigError('port', `expected an integer in 1..65535, got ${port}`);
  }

  const mode = options.mode ?? 'http';
  if (!TRANSPORT_MODES.includes(mode)) {
    throw new InvalidConfigError('mode', `expected one of ${TRANSPORT_MODES.join(', ')}`);
  }

  const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  checkHeaderValue('userAgent', userAgent);

  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
    throw new InvalidConfigError('timeoutMs', 'must be a non-negative number');
  }

  const maxFrameBytes = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
  if (!Number.isInteger(maxFrameBytes) || maxFrameBytes < 1) {
    throw new InvalidConfigError('maxFrameBytes', 'must be a positive integer');
  }

  return Object.freeze({
    host,
    port,
    mode,
    userAgent,
    tls: resolveTlsSettings(options.tls),
    timeoutMs,
    maxFrameBytes,
  });
}

/**
 * Values written into the HTTP header block, which is encoded as Latin-1.
 */
function checkHeaderValue(option: string, value: string): void {
  if (/[\r\n]/.test(value)) {
    throw new InvalidConfigError(option, 'must not contain line breaks');
  }
  if (/[^\u0000-\u00ff]/.test(value)) {
    throw new InvalidConfigError(option, 'must contain only Latin-1 characters');
  }
}

function resolveTlsSettings(tls: ClientOptions['tls']): Readonly<TlsSettings> | null {
  if (tls === undefined || tls === false) {
    return null;
  }
  const settings: Partial<TlsSettings> = tls === true ? {} : tls;
  return Object.freeze({
    ...settings,
    allowSelfSigned: settings.allowSelfSigned ?? false,
    sessionResumption: settings.sessionResumption ?? true,
  });
}
