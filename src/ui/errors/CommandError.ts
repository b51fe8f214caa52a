/**
 * Errors raised by CLI commands for bad input.
 */

import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Extra detail printed with a command error.
 */
export interface ErrorMetadata {
  /** Hint shown below the error message */
  suggestion?: string;
  /** Included in --json output */
  context?: Record<string, string>;
}

/**
 * Error raised by a command for invalid input, with a suggestion and exit code.
 *
 * @example
 * ```typescript
 * throw new CommandError(
 *   "Named parameter 'limit' is missing '='",
 *   { suggestion: 'Use key=value pairs with --named' },
 *   EXIT_CODES.INVALID_ARGUMENTS
 * );
 * ```
 */
export class CommandError extends Error {
  public readonly metadata: ErrorMetadata;
  public readonly exitCode: number;

  constructor(
    message: string,
    metadata: ErrorMetadata = {},
    exitCode: number = EXIT_CODES.GENERIC_FAILURE
  ) {
    super(message);
    this.name = 'CommandError';
    this.metadata = metadata;
    this.exitCode = exitCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CommandError);
    }
  }
}
