/**
 * Error taxonomy for the launcher and the capture client.
 *
 * Every domain error carries a stable `code` for programmatic handling and a
 * semantic `exitCode` used by the CLI layer when the error is fatal.
 */

import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Base class for all chatcap errors.
 *
 * Supports cause chaining and optional user-facing suggestions that the
 * command runner prints below the error line.
 */
export abstract class ChatCaptureError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;
  readonly suggestions: readonly string[];

  constructor(message: string, options: { cause?: unknown; suggestions?: string[] } = {}) {
    super(message);
    this.name = this.constructor.name;
    this.suggestions = options.suggestions ?? [];
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * No browser executable exists at any checked path.
 */
export class ExecutableNotFoundError extends ChatCaptureError {
  readonly code = 'EXECUTABLE_NOT_FOUND';
  readonly exitCode = EXIT_CODES.RESOURCE_NOT_FOUND;

  constructor(
    readonly checkedPaths: readonly string[],
    message = 'No browser executable found',
    options: { suggestions?: string[] } = {}
  ) {
    super(message, options);
  }
}

/**
 * The debugging port already has a listener.
 *
 * Recoverable: the operator decides whether to reuse the running browser.
 */
export class PortInUseError extends ChatCaptureError {
  readonly code = 'PORT_IN_USE';
  readonly exitCode = EXIT_CODES.RESOURCE_BUSY;

  constructor(
    readonly port: number,
    message = `Port ${port} is already in use`
  ) {
    super(message);
  }
}

/**
 * The browser process (or its profile directory) could not be created.
 */
export class ProcessSpawnError extends ChatCaptureError {
  readonly code = 'PROCESS_SPAWN_ERROR';
  readonly exitCode = EXIT_CODES.BROWSER_LAUNCH_FAILURE;
}

/**
 * CDP endpoint unreachable, no browser context exposed, or socket lost.
 */
export class CDPConnectionError extends ChatCaptureError {
  readonly code = 'CDP_CONNECTION_ERROR';
  readonly exitCode = EXIT_CODES.CDP_CONNECTION_FAILURE;
}

/**
 * CDP command, connection attempt or reply wait exceeded its deadline.
 */
export class CDPTimeoutError extends ChatCaptureError {
  readonly code = 'CDP_TIMEOUT_ERROR';
  readonly exitCode = EXIT_CODES.CDP_TIMEOUT;
}

/**
 * The attached browser exposes no page target.
 */
export class NoPageError extends ChatCaptureError {
  readonly code = 'NO_PAGE';
  readonly exitCode = EXIT_CODES.RESOURCE_NOT_FOUND;
}

/**
 * A single DOM scan failed (page navigated away, element detached, script error).
 *
 * Never fatal: the capture loop logs it and runs the next scan.
 */
export class ScanError extends ChatCaptureError {
  readonly code = 'SCAN_ERROR';
  readonly exitCode = EXIT_CODES.SOFTWARE_ERROR;
}

/**
 * Invalid option value or configuration file.
 */
export class ConfigError extends ChatCaptureError {
  readonly code = 'CONFIG_ERROR';
  readonly exitCode = EXIT_CODES.INVALID_ARGUMENTS;
}

/**
 * The output log could not be written.
 */
export class OutputFileError extends ChatCaptureError {
  readonly code = 'OUTPUT_FILE_ERROR';
  readonly exitCode = EXIT_CODES.OUTPUT_FILE_ERROR;
}

/**
 * Extract error message from unknown error type.
 *
 * @param error - Error of unknown type
 * @returns Error message string
 *
 * @example
 * ```typescript
 * try {
 *   await someOperation();
 * } catch (error) {
 *   log.info(`Failed: ${getErrorMessage(error)}`);
 * }
 * ```
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
