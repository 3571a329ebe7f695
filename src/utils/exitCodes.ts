/**
 * Semantic exit codes for scriptable error handling.
 *
 * Exit codes follow semantic ranges:
 * - **0**: Success (including an operator choosing to reuse a running browser)
 * - **1**: Generic failure
 * - **80-99**: User errors (invalid input, missing browser, busy port)
 * - **100-119**: Software errors (launch, CDP and I/O failures)
 *
 * Values are stable: scripts wrapping `chatcap launch` / `chatcap capture`
 * may branch on them.
 */
export const EXIT_CODES = {
  /** Command completed successfully */
  SUCCESS: 0,

  /** Generic failure (use specific codes when possible) */
  GENERIC_FAILURE: 1,

  // User Errors (80-99)

  /** Invalid command-line arguments, options or config file */
  INVALID_ARGUMENTS: 81,

  /** Insufficient permissions for operation */
  PERMISSION_DENIED: 82,

  /** Requested resource not found (browser executable, page target) */
  RESOURCE_NOT_FOUND: 83,

  /** Resource is busy (debugging port already bound) */
  RESOURCE_BUSY: 85,

  // Software Errors (100-119)

  /** Browser process failed to spawn */
  BROWSER_LAUNCH_FAILURE: 100,

  /** CDP connection failed or was lost */
  CDP_CONNECTION_FAILURE: 101,

  /** CDP operation timed out */
  CDP_TIMEOUT: 102,

  /** Output log could not be written */
  OUTPUT_FILE_ERROR: 103,

  /** Unhandled exception in code */
  UNHANDLED_EXCEPTION: 104,

  /** Signal handler error */
  SIGNAL_HANDLER_ERROR: 105,

  /** Generic software error (use specific codes when possible) */
  SOFTWARE_ERROR: 110,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
