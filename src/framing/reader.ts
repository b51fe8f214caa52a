/**
 * Frame Reader
 *
 * Reads exactly one frame body from a {@link ByteSource} for either transport
 * mode. Bytes read past the end of the frame are pushed back to the source.
 */

import type { TransportMode } from '@/config.js';
import { HTTP_HEADER_SEPARATOR, MAX_HEADER_BYTES, RAW_FRAME_TERMINATOR } from '@/constants.js';
import { ConnectionClosedError, IncompleteFrameError, MalformedFrameError } from '@/errors/index.js';
import { createLogger } from '@/ui/logging/index.js';

import type { ByteSource } from './source.js';

const log = createLogger('framing');

const SEPARATOR_BYTES = Buffer.from(HTTP_HEADER_SEPARATOR, 'latin1');
const CONTENT_LENGTH_PATTERN = /^content-length:(.*)$/i;

export interface ReadLimits {
  /** Largest body accepted, in bytes. */
  maxFrameBytes: number;
  /** Largest HTTP header block accepted, in bytes. */
  maxHeaderBytes?: number;
}

/**
 * Called when the source ends before a frame is complete.
 */
function endOfStream(receivedBytes: number): Error {
  return receivedBytes === 0 ? new ConnectionClosedError() : new IncompleteFrameError(receivedBytes);
}

/**
 * Extract Content-Length from an HTTP header block.
 *
 * The header name is matched case-insensitively at the start of a line; the
 * value may be surrounded by whitespace but must be a plain decimal integer.
 *
 * @throws MalformedFrameError if the header is missing or its value is invalid
 */
export function parseContentLength(headerBlock: string): number {
  for (const line of headerBlock.split('\r\n')) {
    const match = CONTENT_LENGTH_PATTERN.exec(line);
    if (!match) {
      continue;
    }
    const value = (match[1] ?? '').trim();
    if (!/^\d+$/.test(value)) {
      throw new MalformedFrameError(`invalid Content-Length value '${value}'`);
    }
    return Number.parseInt(value, 10);
  }
  throw new MalformedFrameError('response has no Content-Length header');
}

/**
 * Read one HTTP-framed response and return its body.
 *
 * @throws ConnectionClosedError if the stream ends before any byte arrives
 * @throws IncompleteFrameError if the stream ends mid-frame
 * @throws MalformedFrameError on an oversized header block or body, or a bad Content-Length
 */
export async function readHttpFrame(source: ByteSource, limits: ReadLimits): Promise<Buffer> {
  const maxHeaderBytes = limits.maxHeaderBytes ?? MAX_HEADER_BYTES;
  let head = Buffer.alloc(0);
  let separatorAt = -1;

  while (separatorAt === -1) {
    const chunk = await source.read();
    if (chunk === null) {
      throw endOfStream(head.length);
    }
    // The separator may straddle the previous chunk boundary.
    const searchFrom = Math.max(0, head.length - (SEPARATOR_BYTES.length - 1));
    head = Buffer.concat([head, chunk]);
    separatorAt = head.indexOf(SEPARATOR_BYTES, searchFrom);
    if (separatorAt === -1 && head.length > maxHeaderBytes) {
      throw new MalformedFrameError(`header block exceeds ${maxHeaderBytes} bytes`);
    }
  }

  const headerBlock = head.subarray(0, separatorAt).toString('latin1');
  const contentLength = parseContentLength(headerBlock);
  if (contentLength > limits.maxFrameBytes) {
    throw new MalformedFrameError(
      `Content-Length ${contentLength} exceeds limit of ${limits.maxFrameBytes} bytes`
    );
  }

  const headerLength = separatorAt + SEPARATOR_BYTES.length;
  const parts: Buffer[] = [head.subarray(headerLength)];
  let received = parts[0]?.length ?? 0;

  while (received < contentLength) {
    const chunk = await source.read();
    if (chunk === null) {
      throw endOfStream(headerLength + received);
    }
    parts.push(chunk);
    received += chunk.length;
  }

  const body = Buffer.concat(parts, received);
  source.unread(body.subarray(contentLength));
  log.debug(`HTTP frame read: ${headerLength} header bytes, ${contentLength} body bytes`);
  return body.subarray(0, contentLength);
}

/**
 * Read one NUL-terminated response and return the bytes before the terminator.
 *
 * @throws ConnectionClosedError if the stream ends before any byte arrives
 * @throws IncompleteFrameError if the stream ends before the terminator
 * @throws MalformedFrameError if no terminator appears within the size limit
 */
export async function readRawFrame(source: ByteSource, limits: ReadLimits): Promise<Buffer> {
  const parts: Buffer[] = [];
  let received = 0;

  for (;;) {
    const chunk = await source.read();
    if (chunk === null) {
      throw endOfStream(received);
    }
    const terminatorAt = chunk.indexOf(RAW_FRAME_TERMINATOR);
    const bodyBytes = terminatorAt === -1 ? chunk.length : terminatorAt;
    if (received + bodyBytes > limits.maxFrameBytes) {
      throw new MalformedFrameError(`raw frame exceeds limit of ${limits.maxFrameBytes} bytes`);
    }
    if (terminatorAt !== -1) {
      parts.push(chunk.subarray(0, terminatorAt));
      source.unread(chunk.subarray(terminatorAt + 1));
      received += terminatorAt;
      break;
    }
    parts.push(chunk);
    received += chunk.length;
  }

  log.debug(`Raw frame read: ${received} body bytes`);
  return Buffer.concat(parts, received);
}

/**
 * Read one frame for the given transport mode.
 */
export function readFrame(source: ByteSource, mode: TransportMode, limits: ReadLimits): Promise<Buffer> {
  return mode === 'http' ? readHttpFrame(source, limits) : readRawFrame(source, limits);
}
