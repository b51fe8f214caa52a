/**
 * Frame Reader Unit Tests
 *
 * Tests frame assembly from scripted chunk sequences, including partial reads
 * and early end of stream.
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { ChunkSource, splitIntoChunks } from '@/__testutils__/index.js';
import {
  ConnectionClosedError,
  IncompleteFrameError,
  MalformedFrameError,
} from '@/errors/index.js';
import { parseContentLength, readFrame, readHttpFrame, readRawFrame } from '@/framing/index.js';

const LIMITS = { maxFrameBytes: 1024 };
const RESPONSE = 'HTTP/1.1 200 OK\r\nContent-Type: application/json\r\nContent-Length: 13\r\n\r\n{"result":42}';

void describe('readHttpFrame', () => {
  void it('assembles a frame delivered one byte at a time', async () => {
    const source = new ChunkSource(splitIntoChunks(RESPONSE, 1));

    const body = await readHttpFrame(source, LIMITS);

    assert.equal(body.toString(), '{"result":42}');
  });

  void it('finds a separator split across chunks', async () => {
    const source = new ChunkSource(['HTTP/1.1 200 OK\r\nContent-Length: 2\r\n\r', '\n{}']);

    assert.equal((await readHttpFrame(source, LIMITS)).toString(), '{}');
  });

  void it('finds a separator split after its first byte', async () => {
    const source = new ChunkSource(['HTTP/1.1 200 OK\r\nContent-Length: 2\r', '\n\r\n{}']);

    assert.equal((await readHttpFrame(source, LIMITS)).toString(), '{}');
  });

  void it('counts body bytes read together with the header', async () => {
    const source = new ChunkSource(['HTTP/1.1 200 OK\r\nContent-Length: 10\r\n\r\n01234', '567', '89']);

    assert.equal((await readHttpFrame(source, LIMITS)).toString(), '0123456789');
    assert.equal(source.reads, 3);
  });

  void it('pushes bytes past the body back to the source', async () => {
    const source = new ChunkSource([`${RESPONSE}NEXT`]);

    assert.equal((await readHttpFrame(source, LIMITS)).toString(), '{"result":42}');
    assert.equal(source.remaining().toString(), 'NEXT');
  });

  void it('returns an empty body for Content-Length 0', async () => {
    const source = new ChunkSource(['HTTP/1.1 204 No Content\r\nContent-Length: 0\r\n\r\n']);

    assert.equal((await readHttpFrame(source, LIMITS)).length, 0);
  });

  void it('fails with ConnectionClosedError when the stream ends before any byte', async () => {
    await assert.rejects(readHttpFrame(new ChunkSource([]), LIMITS), ConnectionClosedError);
  });

  void it('fails with IncompleteFrameError when the header never terminates', async () => {
    const source = new ChunkSource(['HTTP/1.1 200 OK\r\nContent-Le']);

    await assert.rejects(readHttpFrame(source, LIMITS), (error: unknown) => {
      assert.ok(error instanceof IncompleteFrameError);
      assert.equal(error.receivedBytes, 27);
      return true;
    });
  });

  void it('fails with IncompleteFrameError when the body is cut short', async () => {
    const head = 'HTTP/1.1 200 OK\r\nContent-Length: 10\r\n\r\n';
    const source = new ChunkSource([head, 'abc']);

    await assert.rejects(readHttpFrame(source, LIMITS), (error: unknown) => {
      assert.ok(error instanceof IncompleteFrameError);
      assert.equal(error.receivedBytes, head.length + 3);
      return true;
    });
  });

  void it('fails when Content-Length is missing', async () => {
    const source = new ChunkSource(['HTTP/1.1 200 OK\r\nContent-Type: application/json\r\n\r\n{}']);

    await assert.rejects(readHttpFrame(source, LIMITS), {
      name: 'MalformedFrameError',
      message: 'Malformed frame: response has no Content-Length header',
    });
  });

  void it('fails when the header block exceeds the limit', async () => {
    const source = new ChunkSource(['X'.repeat(20)]);

    await assert.rejects(readHttpFrame(source, { maxFrameBytes: 1024, maxHeaderBytes: 16 }), {
      name: 'MalformedFrameError',
      message: 'Malformed frame: header block exceeds 16 bytes',
    });
  });

  void it('fails when Content-Length exceeds the frame limit', async () => {
    const source = new ChunkSource(['HTTP/1.1 200 OK\r\nContent-Length: 2048\r\n\r\n']);

    await assert.rejects(readHttpFrame(source, LIMITS), {
      name: 'MalformedFrameError',
      message: 'Malformed frame: Content-Length 2048 exceeds limit of 1024 bytes',
    });
  });

  void it('propagates source errors', async () => {
    const source = new ChunkSource(['HTTP/1.1'], { failWith: new Error('read ECONNRESET') });

    await assert.rejects(readHttpFrame(source, LIMITS), { message: 'read ECONNRESET' });
  });
});

void describe('parseContentLength', () => {
  void it('tolerates whitespace around the value', () => {
    assert.equal(parseContentLength('HTTP/1.1 200 OK\r\nContent-Length:   5  '), 5);
  });

  void it('matches the header name case-insensitively', () => {
    assert.equal(parseContentLength('HTTP/1.1 200 OK\r\ncontent-length: 12'), 12);
  });

  void it('ignores headers that merely contain the name', () => {
    assert.throws(() => parseContentLength('HTTP/1.1 200 OK\r\nX-Content-Length: 3'), MalformedFrameError);
  });

  void it('rejects values that are not plain integers', () => {
    assert.throws(() => parseContentLength('Content-Length: abc'), {
      message: "Malformed frame: invalid Content-Length value 'abc'",
    });
    assert.throws(() => parseContentLength('Content-Length: -1'), MalformedFrameError);
    assert.throws(() => parseContentLength('Content-Length: '), MalformedFrameError);
  });
});

void describe('readRawFrame', () => {
  void it('assembles a frame delivered one byte at a time', async () => {
    const source = new ChunkSource(splitIntoChunks('{"result":1}\0', 1));

    assert.equal((await readRawFrame(source, LIMITS)).toString(), '{"result":1}');
  });

  void it('pushes bytes after the terminator back to the source', async () => {
    const source = new ChunkSource(['{"a":1}\0{"b"']);

    assert.equal((await readRawFrame(source, LIMITS)).toString(), '{"a":1}');
    assert.equal(source.remaining().toString(), '{"b"');
  });

  void it('returns an empty body for a lone terminator', async () => {
    assert.equal((await readRawFrame(new ChunkSource(['\0']), LIMITS)).length, 0);
  });

  void it('fails with ConnectionClosedError when the stream ends before any byte', async () => {
    await assert.rejects(readRawFrame(new ChunkSource([]), LIMITS), ConnectionClosedError);
  });

  void it('fails with IncompleteFrameError when the terminator never arrives', async () => {
    await assert.rejects(readRawFrame(new ChunkSource(['{"a"', ':']), LIMITS), (error: unknown) => {
      assert.ok(error instanceof IncompleteFrameError);
      assert.equal(error.receivedBytes, 5);
      return true;
    });
  });

  void it('fails when the frame grows past the limit', async () => {
    const source = new ChunkSource(['abcd', 'efgh', '\0']);

    await assert.rejects(readRawFrame(source, { maxFrameBytes: 6 }), {
      name: 'MalformedFrameError',
      message: 'Malformed frame: raw frame exceeds limit of 6 bytes',
    });
  });
});

void describe('readRawFrame size limit', () => {
  void it('applies to a frame that arrives with its terminator', async () => {
    const source = new ChunkSource([`${'x'.repeat(100)}\0`]);

    await assert.rejects(readRawFrame(source, { maxFrameBytes: 6 }), {
      name: 'MalformedFrameError',
      message: 'Malformed frame: raw frame exceeds limit of 6 bytes',
    });
  });

  void it('applies across chunks when the terminator comes last', async () => {
    const source = new ChunkSource(['abcd', 'efg\0']);

    await assert.rejects(readRawFrame(source, { maxFrameBytes: 6 }), MalformedFrameError);
  });

  void it('accepts a body of exactly the limit', async () => {
    const source = new ChunkSource(['abc', 'def\0']);

    assert.equal((await readRawFrame(source, { maxFrameBytes: 6 })).toString(), 'abcdef');
  });
});

void describe('readFrame', () => {
  void it('dispatches on the transport mode', async () => {
    assert.equal((await readFrame(new ChunkSource([RESPONSE]), 'http', LIMITS)).toString(), '{"result":42}');
    assert.equal((await readFrame(new ChunkSource(['{}\0']), 'raw', LIMITS)).toString(), '{}');
  });
});
