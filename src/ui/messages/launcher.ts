/**
 * Browser launcher user-facing messages.
 */

import { joinLines, pluralize } from '@/ui/formatting.js';

/**
 * Lines appended to ExecutableNotFoundError: every checked path, then the
 * installations chrome-launcher could detect.
 *
 * @example
 * ```
 * Checked paths:
 *   1. /usr/bin/google-chrome
 *   2. /usr/bin/chromium
 * Detected installations: none
 * ```
 */
export function executableNotFoundDetails(
  checked: readonly string[],
  installations: readonly string[]
): string {
  const lines = ['Checked paths:', ...checked.map((path, index) => `  ${index + 1}. ${path}`)];
  if (installations.length === 0) {
    lines.push('Detected installations: none');
  } else {
    lines.push(`Detected ${pluralize(installations.length, 'installation')}:`);
    installations.forEach((path) => lines.push(`  - ${path}`));
  }
  return joinLines(...lines);
}

export const EXECUTABLE_NOT_FOUND_SUGGESTIONS = [
  'Pass the executable explicitly: chatcap launch --browser-path <path>',
  'Or set CHROME_PATH to the browser executable',
];

export const browserPathRejected = (path: string, reason: string): string =>
  `Skipping ${path}: ${reason}`;

export const browserResolvedMessage = (path: string, source: string): string =>
  `Using browser ${path} (${source})`;

export const PORT_IN_USE_PROMPT = (port: number): string =>
  `Port ${port} is already in use, probably by a running browser. Launch another one anyway?`;

export const portReusedMessage = (port: number): string =>
  `Keeping the browser already listening on port ${port}; connect with: chatcap capture --port ${port}`;

export const profileDirMessage = (dir: string): string => `Profile directory: ${dir}`;

export const profileDirError = (dir: string, reason: string): string =>
  `Cannot create profile directory ${dir}: ${reason}`;

export const launchingMessage = (port: number): string =>
  `Launching browser with remote debugging on port ${port}...`;

export const launchedMessage = (pid: number, port: number, durationMs: number): string =>
  `Browser running (PID ${pid}, port ${port}, ${durationMs}ms). Sign in, open the chat, then run: chatcap capture`;

export const launchFailedError = (reason: string): string => `Failed to launch browser: ${reason}`;

export const existingListenerError = (port: number): string =>
  `Cannot start another browser on port ${port}: the port already has a listener`;

export const existingListenerSuggestions = (port: number): string[] => [
  `Use the running browser: chatcap capture --port ${port}`,
  'Or launch on a free port: chatcap launch --port <number>',
];

export const browserExitedMessage = (code: number | null): string =>
  code === null ? 'Browser exited' : `Browser exited with code ${code}`;
