/**
 * Common error messages and patterns.
 */

import { joinLines } from '@/ui/formatting.js';

/**
 * Generate generic error message.
 *
 * @example
 * ```typescript
 * console.error(genericError('Port 9222 is already in use'));
 * // Error: Port 9222 is already in use
 * ```
 */
export function genericError(message: string): string {
  return `Error: ${message}`;
}

export function unknownError(): string {
  return 'Error: Unknown error';
}

/**
 * Error line followed by indented suggestions, as printed by the command runner.
 */
export function errorReport(message: string, suggestions: readonly string[] = []): string {
  return joinLines(
    genericError(message),
    suggestions.length > 0 && '',
    ...suggestions.map((suggestion) => `  ${suggestion}`)
  );
}

export const shutdownSignalMessage = (signal: string): string =>
  `Received ${signal}, stopping...`;

export const FORCED_EXIT_MESSAGE = 'Second interrupt received, exiting immediately';
