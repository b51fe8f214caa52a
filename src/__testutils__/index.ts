/**
 * Test utilities - Re-export all test helpers
 *
 * ```ts
 * import { StubRpcServer, ChunkSource, getTestCertificate } from '@/__testutils__/index.js';
 * ```
 */

export { assertEventually } from './assertions.js';
export { ChunkSource, splitIntoChunks } from './ChunkSource.js';
export {
  StubRpcServer,
  echoFirstParam,
  echoThenClose,
  type ReceivedRequest,
  type StubFraming,
  type StubHandler,
  type StubReply,
  type StubServerOptions,
} from './StubRpcServer.js';
export { getTestCertificate, type TestCertificate } from './tlsFixtures.js';
