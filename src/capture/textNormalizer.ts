/**
 * Text cleanup for streamed assistant replies.
 */

/**
 * Normalize reply text read from the page while it streams.
 *
 * Drops lines that start with a noise prefix (UI chrome such as
 * "Generating response") and lines that are only ":", keeps at most one
 * blank line in a row, trims trailing whitespace per line and the result
 * as a whole.
 *
 * @example
 * ```typescript
 * normalizeStreamText('You said:\nhi\n\n\n\nHello!\n:', ['You said:']); // 'hi\n\nHello!'
 * ```
 */
export function normalizeStreamText(text: string, noisePrefixes: readonly string[]): string {
  if (!text) return '';

  const cleaned: string[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trimEnd();
    const stripped = line.trim();

    if (!stripped) {
      if (cleaned.length > 0 && cleaned[cleaned.length - 1] !== '') {
        cleaned.push('');
      }
      continue;
    }
    if (stripped === ':' || noisePrefixes.some((prefix) => stripped.startsWith(prefix))) {
      continue;
    }
    cleaned.push(line);
  }

  return cleaned.join('\n').trim();
}

/**
 * What to print when the visible reply changes from `previous` to `current`.
 *
 * `append` carries only the new suffix; `rewrite` carries the whole text
 * because earlier output no longer matches. Null when nothing changed.
 */
export type StreamDelta = { kind: 'append'; text: string } | { kind: 'rewrite'; text: string };

export function computeDelta(previous: string, current: string): StreamDelta | null {
  if (current === previous) return null;
  if (current.startsWith(previous)) {
    return { kind: 'append', text: current.slice(previous.length) };
  }
  return { kind: 'rewrite', text: current };
}
