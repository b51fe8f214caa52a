/**
 * Centralized configuration constants for wirecall.
 *
 * Defaults for the client configuration and the limits used by the frame reader.
 */

// ============================================================================
// CONNECTION DEFAULTS
// ============================================================================

/**
 * Default server address
 */
export const DEFAULT_HOST = '127.0.0.1';

/**
 * Default server port
 */
export const DEFAULT_PORT = 8545;

/**
 * User-Agent header sent in HTTP mode
 */
export const DEFAULT_USER_AGENT = 'wirecall';

/**
 * Socket inactivity timeout; 0 disables it
 */
export const DEFAULT_TIMEOUT_MS = 0;

// ============================================================================
// FRAMING
// ============================================================================

/**
 * JSON-RPC protocol version tag carried by every request
 */
export const JSONRPC_VERSION = '2.0';

/**
 * End-of-message marker in raw mode
 */
export const RAW_FRAME_TERMINATOR = 0x00;

/**
 * Separator between the HTTP header block and the body
 */
export const HTTP_HEADER_SEPARATOR = '\r\n\r\n';

/**
 * Largest HTTP header block accepted before the separator must appear
 */
export const MAX_HEADER_BYTES = 64 * 1024;

/**
 * Largest frame body accepted by default (64 MiB)
 */
export const DEFAULT_MAX_FRAME_BYTES = 64 * 1024 * 1024;

// ============================================================================
// REQUEST IDS
// ============================================================================

/**
 * Inclusive bounds of the random correlation id chosen per call
 */
export const MIN_REQUEST_ID = 1;
export const MAX_REQUEST_ID = 65536;
