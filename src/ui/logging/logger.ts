/**
 * Context-prefixed logging to stderr.
 *
 * By default only 'info' level logs are shown. Set WIRECALL_DEBUG=1 or pass
 * --debug to the CLI to enable verbose 'debug' level logs.
 */

// ============================================================================
// Global Debug State
// ============================================================================

let debugEnabled = false;

/**
 * Turn on debug output for every logger in the process.
 *
 * Called during CLI initialization when the --debug flag is detected.
 */
export function enableDebugLogging(): void {
  debugEnabled = true;
}

/**
 * Whether debug output is on, via `enableDebugLogging()` or `WIRECALL_DEBUG=1`.
 */
export function isDebugEnabled(): boolean {
  return debugEnabled || process.env['WIRECALL_DEBUG'] === '1';
}

// ============================================================================
// Log Levels
// ============================================================================

/**
 * Which messages are shown:
 *
 * - 'info': Always shown (user-facing messages, key milestones)
 * - 'debug': Only shown in debug mode (connection reuse, frame sizes, TLS sessions)
 */
export type LogLevel = 'info' | 'debug';

/**
 * Component name printed in front of each message.
 */
export type LogContext = 'client' | 'connection' | 'tls' | 'framing' | 'cli';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * A logger bound to one context. Calling it directly logs at debug level.
 */
export interface Logger {
  /** Log an info message (always shown). */
  info: (message: string) => void;

  /** Log a debug message (only shown in debug mode). */
  debug: (message: string) => void;

  /** Log a message at debug level. */
  (message: string): void;
}

// ============================================================================
// Logger Implementation
// ============================================================================

function write(context: LogContext, message: string, level: LogLevel): void {
  if (level === 'debug' && !isDebugEnabled()) {
    return;
  }
  console.error(`[${context}] ${message}`);
}

/**
 * Create a logger bound to `context`.
 *
 * Writes to stderr; stdout carries call results.
 *
 * @example
 * ```typescript
 * const log = createLogger('connection');
 *
 * log.info('Connected to 127.0.0.1:8545');
 * log.debug('Reusing connection #3');
 * ```
 */
export function createLogger(context: LogContext): Logger {
  const logger: Logger = Object.assign((message: string) => write(context, message, 'debug'), {
    info: (message: string) => write(context, message, 'info'),
    debug: (message: string) => write(context, message, 'debug'),
  });

  return logger;
}
