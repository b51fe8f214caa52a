/**
 * Envelope Module
 *
 * JSON-RPC envelope types and the codec that turns them into bytes and back.
 */

export { createRequest, decodeResponse, encodeRequest, isErrorEnvelope, packParams } from './codec.js';
export type * from './types.js';
