/**
 * Semantic exit codes for the wirecall CLI.
 *
 * Exit codes follow semantic ranges for predictable automation:
 * - **0**: Success
 * - **1**: Generic failure
 * - **80-99**: User errors (invalid input, unreadable files)
 * - **100-119**: Transport and protocol errors
 *
 * Reference: https://developer.squareup.com/blog/command-line-observability-with-semantic-exit-codes/
 */

export const EXIT_CODES = {
  /** Command completed successfully */
  SUCCESS: 0,

  /** Generic failure (use specific codes when possible) */
  GENERIC_FAILURE: 1,

  // User Errors (80-99)

  /** Invalid command-line arguments or client options */
  INVALID_ARGUMENTS: 81,

  /** A file named on the command line could not be read */
  FILE_NOT_READABLE: 83,

  // Transport and protocol errors (100-119)

  /** Unhandled exception in code */
  UNHANDLED_EXCEPTION: 100,

  /** Socket connect or TLS handshake failed */
  CONNECTION_FAILURE: 101,

  /** Peer closed the connection before a response arrived */
  CONNECTION_CLOSED: 102,

  /** Response frame was truncated or malformed */
  FRAME_ERROR: 103,

  /** Response body was not a valid envelope */
  ENVELOPE_ERROR: 104,

  /** Server answered with an error envelope */
  REMOTE_ERROR: 105,

  /** Socket stayed idle longer than the configured timeout */
  TIMEOUT: 106,

  /** Generic software error (use specific codes when possible) */
  SOFTWARE_ERROR: 110,
} as const;
