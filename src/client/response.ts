/**
 * RPC Response
 *
 * Wraps a decoded response envelope with accessors for the result.
 */

import { isErrorEnvelope } from '@/envelope/index.js';
import type { ResponseEnvelope } from '@/envelope/index.js';
import { MalformedEnvelopeError, RemoteError } from '@/errors/index.js';

/**
 * Turns the raw bytes of a base64 result into a richer value (an array, an
 * image, ...). Decoders live outside this package.
 */
export type ResultDecoder<T> = (bytes: Buffer) => T;

export class RpcResponse {
  /** The parsed envelope, untouched. */
  readonly data: ResponseEnvelope;
  /** The id sent with the request. */
  readonly requestId: number;

  constructor(data: ResponseEnvelope, requestId: number) {
    this.data = data;
    this.requestId = requestId;
  }

  /** The id echoed by the server, as received. Not checked against `requestId`. */
  get id(): unknown {
    return this.data.id;
  }

  get isError(): boolean {
    return isErrorEnvelope(this.data);
  }

  /**
   * Throw if the server answered with an error.
   *
   * @throws RemoteError carrying the envelope's `error` member
   */
  raiseForStatus(): void {
    if (isErrorEnvelope(this.data)) {
      throw new RemoteError(this.data.error);
    }
  }

  /**
   * The call's `result`.
   *
   * @throws RemoteError if the envelope carries an error
   *
   * @example
   * ```typescript
   * const response = await client.invoke('sum', [1, 2]);
   * console.log(response.json); // 3
   * ```
   */
  get json(): unknown {
    const data = this.data;
    if (isErrorEnvelope(data)) {
      throw new RemoteError(data.error);
    }
    return data.result;
  }

  /**
   * The result decoded from base64.
   *
   * @throws RemoteError if the envelope carries an error
   * @throws MalformedEnvelopeError if the result is not a string
   */
  get bytes(): Buffer {
    const result = this.json;
    if (typeof result !== 'string') {
      throw new MalformedEnvelopeError(`expected base64 text result, got ${typeof result}`);
    }
    return Buffer.from(result, 'base64');
  }

  /**
   * Decode a binary result with an external decoder.
   */
  decode<T>(decoder: ResultDecoder<T>): T {
    return decoder(this.bytes);
  }
}
