/**
 * SocketSource Unit Tests
 *
 * Drives the source with an in-memory duplex stream.
 */

import assert from 'node:assert/strict';
import { PassThrough } from 'node:stream';
import { describe, it } from 'node:test';

import { SocketSource } from '@/framing/index.js';

async function readAll(source: SocketSource): Promise<string> {
  const chunks: Buffer[] = [];
  for (;;) {
    const chunk = await source.read();
    if (chunk === null) {
      return Buffer.concat(chunks).toString();
    }
    chunks.push(chunk);
  }
}

void describe('SocketSource', () => {
  void it('delivers written data in order, then null after end', async () => {
    const stream = new PassThrough();
    const source = new SocketSource(stream);

    stream.write('ab');
    stream.write('cd');
    stream.end();

    assert.equal(await readAll(source), 'abcd');
    assert.equal(source.isEnded(), true);
  });

  void it('wakes a reader that is waiting for data', async () => {
    const stream = new PassThrough();
    const source = new SocketSource(stream);

    const pending = source.read();
    stream.write('late');

    assert.equal((await pending)?.toString(), 'late');
  });

  void it('queues data that arrives while nobody reads', async () => {
    const stream = new PassThrough();
    const source = new SocketSource(stream);

    stream.write('unasked');
    await new Promise((resolve) => setImmediate(resolve));

    assert.equal(source.getBufferedBytes(), 7);
    assert.equal(source.isEnded(), false);
    assert.equal((await source.read())?.toString(), 'unasked');
  });

  void it('returns unread bytes first', async () => {
    const stream = new PassThrough();
    const source = new SocketSource(stream);

    source.unread(Buffer.from('back'));
    stream.end('tail');

    assert.equal(await readAll(source), 'backtail');
  });

  void it('rejects with the stream error', async () => {
    const stream = new PassThrough();
    const source = new SocketSource(stream);

    stream.destroy(new Error('read ECONNRESET'));

    await assert.rejects(source.read(), { message: 'read ECONNRESET' });
    assert.equal(source.getFailure()?.message, 'read ECONNRESET');
  });

  void it('fail() rejects a pending read', async () => {
    const source = new SocketSource(new PassThrough());

    const pending = source.read();
    source.fail(new Error('echo timed out after 50ms'));

    await assert.rejects(pending, { message: 'echo timed out after 50ms' });
  });
});
