/**
 * wirecall
 *
 * Client transport for JSON-RPC over HTTP-framed or NUL-terminated raw
 * sockets, with optional TLS and session resumption.
 *
 * @example
 * ```typescript
 * import { RpcClient } from 'wirecall';
 *
 * const client = new RpcClient({ port: 8545, mode: 'raw' });
 * const response = await client.invoke('echo', [42]);
 * console.log(response.json); // 42
 * await client.close();
 * ```
 */

export { RpcClient, RpcResponse, generateRequestId, type ResultDecoder } from './client/index.js';
export {
  resolveClientConfig,
  type ClientConfig,
  type ClientOptions,
  type PemInput,
  type TlsSettings,
  type TransportMode,
} from './config.js';
export { Connection, ConnectionManager } from './connection/index.js';
export {
  createRequest,
  decodeResponse,
  encodeRequest,
  isErrorEnvelope,
  packParams,
} from './envelope/index.js';
export type * from './envelope/types.js';
export * from './errors/index.js';
export {
  FrameWriter,
  SocketSource,
  frameHttp,
  frameRaw,
  readFrame,
  readHttpFrame,
  readRawFrame,
  type ByteSource,
  type ReadLimits,
} from './framing/index.js';
export { enableDebugLogging } from './ui/logging/index.js';
