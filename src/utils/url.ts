/**
 * URL normalization and matching helpers.
 */

/**
 * Protocol prefixes that should be preserved as-is during normalization.
 */
const PRESERVED_PROTOCOL_PREFIXES = [
  'http://',
  'https://',
  'file://',
  'about:',
  'chrome:',
  'data:',
] as const;

/**
 * Normalize a URL by adding https:// when no protocol is given.
 *
 * @example
 * ```typescript
 * normalizeUrl('copilot.microsoft.com')  // → 'https://copilot.microsoft.com'
 * normalizeUrl(' HTTPS://example.com ')  // → 'https://example.com'
 * normalizeUrl('about:blank')            // → 'about:blank'
 * ```
 */
export function normalizeUrl(url: string): string {
  const trimmed = url.trim();
  const lower = trimmed.toLowerCase();

  const prefix = PRESERVED_PROTOCOL_PREFIXES.find((candidate) => lower.startsWith(candidate));
  if (prefix) {
    return prefix + trimmed.slice(prefix.length);
  }

  return `https://${trimmed}`;
}

/**
 * Parse a URL without throwing.
 */
export function safeParseUrl(url: string): URL | null {
  try {
    return new URL(url);
  } catch {
    return null;
  }
}
