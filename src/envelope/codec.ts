/**
 * Message Envelope Codec
 *
 * Serializes request envelopes to UTF-8 JSON and parses response envelopes.
 * Transport-agnostic: framing happens in the framing layer.
 */

import { JSONRPC_VERSION } from '@/constants.js';
import { MalformedEnvelopeError } from '@/errors/index.js';
import { getErrorMessage } from '@/utils/errors.js';

import type {
  ErrorEnvelope,
  JsonValue,
  PackedParams,
  ParamValue,
  Params,
  RequestEnvelope,
  ResponseEnvelope,
} from './types.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

function packValue(value: ParamValue): JsonValue {
  if (value instanceof Uint8Array) {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('base64');
  }
  return value;
}

/**
 * Replace top-level binary arguments with their base64 text.
 */
export function packParams(params: Params): PackedParams {
  if (Array.isArray(params)) {
    return params.map(packValue);
  }
  const packed: { [key: string]: JsonValue } = {};
  for (const [key, value] of Object.entries(params)) {
    packed[key] = packValue(value);
  }
  return packed;
}

/**
 * Build a request envelope.
 *
 * @example
 * ```typescript
 * createRequest('echo', [42], 7);
 * // → { method: 'echo', params: [42], id: 7, jsonrpc: '2.0' }
 * ```
 */
export function createRequest(method: string, params: Params, id: number): RequestEnvelope {
  return { method, params: packParams(params), id, jsonrpc: JSONRPC_VERSION };
}

/**
 * Serialize a request envelope with keys in canonical order.
 */
export function encodeRequest(envelope: RequestEnvelope): Buffer {
  const { method, params, id, jsonrpc } = envelope;
  return Buffer.from(JSON.stringify({ method, params, id, jsonrpc }), 'utf8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isResponseEnvelope(value: Record<string, unknown>): value is ResponseEnvelope {
  return 'result' in value || 'error' in value;
}

/**
 * Parse a response body.
 *
 * @throws MalformedEnvelopeError if the bytes are not UTF-8 JSON, not an object, or
 * carry neither `result` nor `error`
 */
export function decodeResponse(bytes: Uint8Array): ResponseEnvelope {
  let text: string;
  try {
    text = utf8.decode(bytes);
  } catch (error) {
    throw new MalformedEnvelopeError(
      'body is not valid UTF-8',
      error instanceof Error ? error : undefined
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new MalformedEnvelopeError(
      getErrorMessage(error),
      error instanceof Error ? error : undefined
    );
  }

  if (!isRecord(parsed)) {
    throw new MalformedEnvelopeError(`expected a JSON object, got ${describeJsonType(parsed)}`);
  }
  if (!isResponseEnvelope(parsed)) {
    throw new MalformedEnvelopeError('response has neither "result" nor "error"');
  }
  return parsed;
}

/**
 * Whether a decoded response carries an error.
 */
export function isErrorEnvelope(envelope: ResponseEnvelope): envelope is ErrorEnvelope {
  return 'error' in envelope;
}

function describeJsonType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
