/**
 * Request ID Generation
 *
 * Correlation ids are plain random integers. Calls on one client never overlap,
 * so no collision tracking is needed.
 */

import { randomInt } from 'node:crypto';

import { MAX_REQUEST_ID, MIN_REQUEST_ID } from '@/constants.js';

/**
 * Generate a random request id in [1, 65536].
 *
 * @example
 * ```typescript
 * generateRequestId(); // → 40213
 * ```
 */
export function generateRequestId(): number {
  return randomInt(MIN_REQUEST_ID, MAX_REQUEST_ID + 1);
}
