/**
 * Capture and ask user-facing messages.
 */

import type { CaptureSummary } from '@/capture/types.js';
import { OutputFormatter, formatDuration, pluralize, truncateUrl } from '@/ui/formatting.js';

/**
 * Remediation steps when the debugging endpoint does not answer.
 */
export function connectionHints(port: number): string[] {
  return [
    `Start the browser first: chatcap launch --port ${port}`,
    `Check that --port matches the browser's remote-debugging port (${port})`,
    'Make sure the browser has at least one tab open',
  ];
}

export const NAVIGATE_PROMPT = (url: string): string =>
  `Navigate the selected tab to ${url}?`;
export const READY_PROMPT =
  'Sign in and open the conversation in the browser. Start capturing now?';
export const CAPTURE_DECLINED_MESSAGE = 'Capture not started';

export const selectedPageMessage = (url: string, title: string): string =>
  `Selected page: ${title ? `${title} ` : ''}(${truncateUrl(url)})`;

export const capturingMessage = (output: string, intervalMs: number): string =>
  `Capturing to ${output} every ${intervalMs}ms (Ctrl+C to stop)`;

export const baselineSkippedMessage = (count: number): string =>
  `Skipped ${pluralize(count, 'message')} already on the page`;

export const capturedMessageLine = (type: string, id: string): string =>
  `Captured ${type} message ${id}`;

export const scanFailedMessage = (scan: number, reason: string): string =>
  `Scan ${scan} failed: ${reason}`;

export const CONNECTION_LOST_MESSAGE = 'Connection to the browser lost; stopping capture';

/**
 * Summary printed when a capture session stops.
 *
 * @example
 * ```
 * Capture stopped (signal)
 *   Messages written:  5 (2 user, 3 ai)
 *   Scans:             40 (1 failed)
 *   Duration:          1m 20s
 *   Output:            chat_capture.jsonl
 * ```
 */
export function formatCaptureSummary(
  summary: CaptureSummary,
  durationMs: number,
  output: string
): string {
  const total = summary.written.user + summary.written.ai;
  const rows: Array<[string, string]> = [
    ['  Messages written', `${total} (${summary.written.user} user, ${summary.written.ai} ai)`],
    ['  Scans', `${summary.scans} (${summary.failedScans} failed)`],
    ['  Duration', formatDuration(durationMs)],
    ['  Output', output],
  ];
  return new OutputFormatter()
    .text(`Capture stopped (${summary.stopReason})`)
    .keyValueList(rows, 21)
    .build();
}

export const askSentMessage = (chars: number): string =>
  `Sent prompt (${pluralize(chars, 'character')}); waiting for the reply`;
export const askSavedMessage = (output: string): string => `Saved exchange to ${output}`;
