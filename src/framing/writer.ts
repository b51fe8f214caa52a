/**
 * Frame Writer
 *
 * Wraps encoded envelopes in the transport-specific frame. Pure: produces
 * bytes and never touches a socket.
 */

import type { ClientConfig, TransportMode } from '@/config.js';
import { HTTP_HEADER_SEPARATOR, RAW_FRAME_TERMINATOR } from '@/constants.js';

const RAW_TERMINATOR_BYTES = Buffer.from([RAW_FRAME_TERMINATOR]);

/**
 * Build the fixed part of the HTTP request header, up to (not including) the
 * Content-Length line.
 */
export function buildHttpHeaderPrefix(host: string, port: number, userAgent: string): string {
  return [
    'POST / HTTP/1.1',
    `Host: ${host}:${port}`,
    `User-Agent: ${userAgent}`,
    'Accept: */*',
    'Connection: keep-alive',
  ].join('\r\n');
}

/**
 * Frame a body as an HTTP POST. Content-Length is the body's byte length.
 */
export function frameHttp(headerPrefix: string, body: Uint8Array): Buffer {
  const header =
    `${headerPrefix}\r\n` +
    `Content-Length: ${body.byteLength}\r\n` +
    `Content-Type: application/json${HTTP_HEADER_SEPARATOR}`;
  return Buffer.concat([Buffer.from(header, 'latin1'), body]);
}

/**
 * Frame a body for raw mode: the bytes followed by one NUL.
 *
 * A body that itself contains a NUL byte cannot be framed unambiguously; it is
 * written as-is.
 */
export function frameRaw(body: Uint8Array): Buffer {
  return Buffer.concat([body, RAW_TERMINATOR_BYTES]);
}

/**
 * Frames bodies for one client's transport mode.
 *
 * @example
 * ```typescript
 * const writer = new FrameWriter(resolveClientConfig({ mode: 'raw' }));
 * writer.frame(Buffer.from('{}')); // → <7b 7d 00>
 * ```
 */
export class FrameWriter {
  readonly mode: TransportMode;
  private readonly headerPrefix: string;

  constructor(config: Pick<ClientConfig, 'host' | 'port' | 'userAgent' | 'mode'>) {
    this.mode = config.mode;
    this.headerPrefix = buildHttpHeaderPrefix(config.host, config.port, config.userAgent);
  }

  frame(body: Uint8Array): Buffer {
    return this.mode === 'http' ? frameHttp(this.headerPrefix, body) : frameRaw(body);
  }
}
