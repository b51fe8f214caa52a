/**
 * RpcResponse Unit Tests
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { RpcResponse } from '@/client/index.js';
import { MalformedEnvelopeError, RemoteError } from '@/errors/index.js';

void describe('RpcResponse', () => {
  void it('returns the result from json', () => {
    const response = new RpcResponse({ jsonrpc: '2.0', id: 9, result: { sum: 3 } }, 9);

    assert.deepEqual(response.json, { sum: 3 });
    assert.equal(response.isError, false);
    assert.equal(response.id, 9);
    assert.equal(response.requestId, 9);
  });

  void it('keeps the envelope untouched in data', () => {
    const envelope = { jsonrpc: '2.0', id: 1, result: null, extra: 'kept' };

    assert.deepEqual(new RpcResponse(envelope, 1).data, envelope);
  });

  void it('returns a null result without raising', () => {
    const response = new RpcResponse({ result: null }, 1);

    assert.equal(response.json, null);
    response.raiseForStatus();
  });

  void it('raises RemoteError from json when the envelope carries an error', () => {
    const response = new RpcResponse({ error: 'boom' }, 1);

    assert.equal(response.isError, true);
    assert.throws(() => response.json, (error: unknown) => {
      assert.ok(error instanceof RemoteError);
      assert.equal(error.message, 'Remote error: boom');
      assert.equal(error.error, 'boom');
      assert.equal(error.exitCode, 105);
      return true;
    });
  });

  void it('raises from raiseForStatus with the structured error kept', () => {
    const error = { code: -32601, message: 'Method not found' };
    const response = new RpcResponse({ error }, 1);

    assert.throws(() => response.raiseForStatus(), {
      name: 'RemoteError',
      message: 'Remote error: Method not found',
      error,
    });
  });

  void it('gives the error precedence when both members are present', () => {
    const response = new RpcResponse({ result: 1, error: 'boom' }, 1);

    assert.equal(response.isError, true);
    assert.throws(() => response.json, RemoteError);
  });

  void it('decodes a base64 result to bytes', () => {
    const response = new RpcResponse({ result: Buffer.from([0, 1, 254, 255]).toString('base64') }, 1);

    assert.deepEqual([...response.bytes], [0, 1, 254, 255]);
  });

  void it('refuses to decode a result that is not text', () => {
    assert.throws(() => new RpcResponse({ result: 42 }, 1).bytes, (error: unknown) => {
      assert.ok(error instanceof MalformedEnvelopeError);
      assert.equal(error.message, 'Malformed envelope: expected base64 text result, got number');
      return true;
    });
  });

  void it('hands the decoded bytes to an external decoder', () => {
    const response = new RpcResponse({ result: Buffer.from([1, 2, 3, 4]).toString('base64') }, 1);

    const words = response.decode((bytes) => [bytes.readUInt16BE(0), bytes.readUInt16BE(2)]);

    assert.deepEqual(words, [0x0102, 0x0304]);
  });
});
