/**
 * SerialQueue Unit Tests
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { SerialQueue } from '@/utils/concurrency.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

void describe('SerialQueue', () => {
  void it('runs operations one at a time in submission order', async () => {
    const queue = new SerialQueue();
    const events: string[] = [];

    const task = (name: string, ms: number) => async (): Promise<string> => {
      events.push(`start ${name}`);
      await delay(ms);
      events.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([queue.run(task('a', 20)), queue.run(task('b', 1))]);

    assert.deepEqual(results, ['a', 'b']);
    assert.deepEqual(events, ['start a', 'end a', 'start b', 'end b']);
  });

  void it('keeps going after a rejected operation', async () => {
    const queue = new SerialQueue();

    const failed = queue.run(() => Promise.reject(new Error('first failed')));
    const next = queue.run(() => Promise.resolve('second'));

    await assert.rejects(failed, { message: 'first failed' });
    assert.equal(await next, 'second');
  });
});
