/**
 * Shared formatting utilities for UI output.
 */

import { safeParseUrl } from '@/utils/url.js';

// ============================================================================
// Output Formatter Class
// ============================================================================

/**
 * Fluent builder for multi-line console output.
 */
export class OutputFormatter {
  private lines: string[] = [];

  text(content: string): this {
    this.lines.push(content);
    return this;
  }

  keyValueList(pairs: Array<[string, string]>, keyWidth?: number): this {
    const width = keyWidth ?? Math.max(...pairs.map(([k]) => k.length)) + 2;
    pairs.forEach(([key, value]) => this.lines.push(`${key}:`.padEnd(width) + value));
    return this;
  }

  build(): string {
    return this.lines.join('\n');
  }
}

// ============================================================================
// Visual/Text Utilities
// ============================================================================

export function joinLines(...lines: Array<string | null | undefined | false>): string {
  return lines
    .filter((line): line is string => line !== undefined && line !== null && line !== false)
    .join('\n');
}

/**
 * Shorten a URL to host and path for log lines.
 *
 * @example
 * ```typescript
 * truncateUrl('https://www.example.com/chat/?session=1'); // 'example.com/chat/'
 * ```
 */
export function truncateUrl(url: string, maxLength: number = 60): string {
  const parsed = safeParseUrl(url);
  if (!parsed || parsed.protocol === 'about:' || parsed.protocol === 'data:') {
    return url.length > maxLength ? url.substring(0, maxLength - 3) + '...' : url;
  }
  const domain = parsed.hostname.replace(/^www\./, '');
  const result = domain + parsed.pathname;
  return result.length > maxLength ? result.substring(0, maxLength - 3) + '...' : result;
}

export function pluralize(count: number, singular: string, plural?: string): string {
  const word = count === 1 ? singular : (plural ?? singular + 's');
  return `${count} ${word}`;
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  if (hours > 0) {
    const remainingMinutes = minutes % 60;
    return remainingMinutes > 0 ? `${hours}h ${remainingMinutes}m` : `${hours}h`;
  }
  if (minutes > 0) {
    const remainingSeconds = seconds % 60;
    return remainingSeconds > 0 ? `${minutes}m ${remainingSeconds}s` : `${minutes}m`;
  }
  if (seconds > 0) {
    return `${seconds}s`;
  }
  return `${ms}ms`;
}
