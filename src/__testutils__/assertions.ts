/**
 * assertions - Custom assertion helpers for contract tests
 */

/**
 * Poll a condition until it becomes true or timeout
 *
 * @example
 * await assertEventually(() => server.requests.length === 2, 1000);
 */
export async function assertEventually(
  fn: () => boolean,
  timeoutMs: number,
  message?: string
): Promise<void> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (fn()) {
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
  throw new Error(message ?? `Condition not met within ${timeoutMs}ms`);
}
