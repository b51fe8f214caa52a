/**
 * ChunkSource - Scripted ByteSource for frame reader tests
 *
 * Hands out a fixed list of chunks, then reports end of stream (or fails).
 */

import type { ByteSource } from '@/framing/index.js';

export class ChunkSource implements ByteSource {
  private readonly chunks: Buffer[];
  private readonly failure: Error | null;
  /** Number of times `read()` was called */
  reads = 0;

  constructor(chunks: Array<Buffer | string>, options: { failWith?: Error } = {}) {
    this.chunks = chunks.map((chunk) => (typeof chunk === 'string' ? Buffer.from(chunk) : chunk));
    this.failure = options.failWith ?? null;
  }

  read(): Promise<Buffer | null> {
    this.reads++;
    const chunk = this.chunks.shift();
    if (chunk) {
      return Promise.resolve(chunk);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    return Promise.resolve(null);
  }

  unread(chunk: Buffer): void {
    if (chunk.length > 0) {
      this.chunks.unshift(chunk);
    }
  }

  /** Everything not yet read, concatenated */
  remaining(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

/**
 * Split bytes into chunks of `size` bytes (the last one may be shorter).
 */
export function splitIntoChunks(bytes: Buffer | string, size: number): Buffer[] {
  const buffer = typeof bytes === 'string' ? Buffer.from(bytes) : bytes;
  const chunks: Buffer[] = [];
  for (let offset = 0; offset < buffer.length; offset += size) {
    chunks.push(buffer.subarray(offset, offset + size));
  }
  return chunks;
}
