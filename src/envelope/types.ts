/**
 * Envelope Types
 *
 * JSON-RPC 2.0 request and response envelopes, independent of framing.
 */

import type { JSONRPC_VERSION } from '@/constants.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/**
 * A single call argument. Binary blobs are sent as base64 text.
 */
export type ParamValue = JsonValue | Uint8Array;

/**
 * Positional or named call arguments.
 */
export type Params = ParamValue[] | { [key: string]: ParamValue };

/**
 * Arguments after binary blobs were packed into text.
 */
export type PackedParams = JsonValue[] | { [key: string]: JsonValue };

export interface RequestEnvelope {
  method: string;
  params: PackedParams;
  id: number;
  jsonrpc: typeof JSONRPC_VERSION;
}

interface ResponseBase {
  id?: unknown;
  jsonrpc?: unknown;
  [key: string]: unknown;
}

export interface ResultEnvelope extends ResponseBase {
  result: unknown;
}

export interface ErrorEnvelope extends ResponseBase {
  error: unknown;
}

export type ResponseEnvelope = ResultEnvelope | ErrorEnvelope;
