/**
 * Framing Module
 *
 * Transport-specific framing of encoded envelopes: HTTP/1.1 with
 * Content-Length, or raw bytes terminated by a NUL.
 */

export { FrameWriter, buildHttpHeaderPrefix, frameHttp, frameRaw } from './writer.js';
export {
  parseContentLength,
  readFrame,
  readHttpFrame,
  readRawFrame,
  type ReadLimits,
} from './reader.js';
export { SocketSource, type ByteSource } from './source.js';
