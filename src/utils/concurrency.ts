/**
 * Serial execution of async operations.
 *
 * @module utils/concurrency
 */

/**
 * Runs async operations one at a time, in submission order.
 *
 * A rejected operation does not stop the ones queued behind it.
 *
 * @example
 * ```typescript
 * const queue = new SerialQueue();
 * const [a, b] = await Promise.all([
 *   queue.run(() => roundTrip('first')),
 *   queue.run(() => roundTrip('second')), // starts after 'first' settles
 * ]);
 * ```
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Execute `fn` once every previously submitted operation has settled.
   *
   * @returns Promise resolving to the function's result
   */
  run<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.tail.then(fn);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
