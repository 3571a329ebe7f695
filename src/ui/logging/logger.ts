/**
 * Logging utilities for consistent formatted output with log level support.
 *
 * All log lines go to stderr so that stdout stays reserved for command output
 * (the streamed reply of `chatcap ask`). By default only 'info' lines are
 * shown; `--debug` or CHATCAP_DEBUG=1 enables 'debug' lines.
 */

// ============================================================================
// Global Debug State
// ============================================================================

let debugEnabled = false;

/**
 * Enable debug logging globally.
 *
 * Called during CLI initialization when the --debug flag is detected.
 */
export function enableDebugLogging(): void {
  debugEnabled = true;
}

/**
 * Check if debug logging is currently enabled.
 *
 * @returns True if debug mode is active
 */
export function isDebugEnabled(): boolean {
  return debugEnabled || process.env['CHATCAP_DEBUG'] === '1';
}

// ============================================================================
// Log Levels
// ============================================================================

/**
 * - 'info': Always shown (milestones, operator-facing errors)
 * - 'debug': Only shown in debug mode (CDP traces, per-scan details)
 */
export type LogLevel = 'info' | 'debug';

/**
 * Log contexts for different components.
 * Used to prefix log messages with component name.
 */
export type LogContext =
  | 'chatcap'
  | 'launcher'
  | 'capture'
  | 'ask'
  | 'cdp'
  | 'http'
  | 'config';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Logger instance with support for different log levels.
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
 * Create a logger instance for a specific context.
 *
 * @param context - Component context for log prefix
 * @returns Logger instance with info/debug methods
 *
 * @example
 * ```typescript
 * const log = createLogger('capture');
 *
 * log.info('Capturing from https://chat.example.com');
 * log.debug('Scan 12: 4 user, 4 ai elements');
 * ```
 */
export function createLogger(context: LogContext): Logger {
  return Object.assign((message: string) => write(context, message, 'debug'), {
    info: (message: string) => write(context, message, 'info'),
    debug: (message: string) => write(context, message, 'debug'),
  });
}
