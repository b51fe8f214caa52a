/**
 * Error taxonomy for wirecall.
 */

export {
  ConnectionClosedError,
  ConnectionFailedError,
  IncompleteFrameError,
  InvalidConfigError,
  MalformedEnvelopeError,
  MalformedFrameError,
  RemoteError,
  RequestTimeoutError,
  RpcError,
} from './RpcError.js';
export { CLOSED_SOCKET_CODES, formatConnectionError, formatSocketError } from './format.js';
