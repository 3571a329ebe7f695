/**
 * DOM extraction.
 *
 * The page side is a single script evaluated with Runtime.evaluate; it only
 * reads the DOM and returns plain data. Identifier derivation, boilerplate
 * removal and completeness checks run in Node on the returned data.
 */

import type {
  CapturedMessage,
  MessageType,
  RawMessageElement,
  ScanResult,
} from '@/capture/types.js';
import type { ChatSelectors } from '@/config/types.js';
import { HTML_SNIPPET_MAX_LENGTH } from '@/constants.js';
import { ScanError } from '@/utils/errors.js';

/**
 * Arguments passed to {@link SCAN_SCRIPT}.
 */
export interface ScanScriptArgs {
  user: string[];
  ai: string[];
  streamingIndicators: string[];
  loadingMessage: string;
  htmlLimit: number;
}

/**
 * In-page scan. For each role the first selector with any match defines the
 * element list. Invalid selectors are skipped.
 */
export const SCAN_SCRIPT = `function (args) {
  const queryAll = (selector) => {
    try {
      return Array.from(document.querySelectorAll(selector));
    } catch (e) {
      return [];
    }
  };
  const firstMatch = (selectors) => {
    for (const selector of selectors) {
      const nodes = queryAll(selector);
      if (nodes.length > 0) return nodes;
    }
    return [];
  };
  const describe = (type, el, index) => {
    let rect = null;
    if (el.getClientRects().length > 0) {
      const r = el.getBoundingClientRect();
      rect = { x: r.x, y: r.y, width: r.width, height: r.height };
    }
    return {
      type,
      index,
      text: el.innerText || el.textContent || '',
      html: (el.innerHTML || '').slice(0, args.htmlLimit),
      rect,
      dataMessageId: el.getAttribute('data-message-id'),
      dataId: el.getAttribute('data-id'),
      elementId: el.id || null,
    };
  };
  const user = firstMatch(args.user);
  const ai = firstMatch(args.ai);
  const loading = queryAll(args.loadingMessage);
  const last = loading[loading.length - 1];
  return {
    user: user.map((el, i) => describe('user', el, i)),
    ai: ai.map((el, i) => describe('ai', el, i)),
    streaming: args.streamingIndicators.some((s) => queryAll(s).length > 0),
    loadingText: last ? (last.innerText || last.textContent || '').trim() : '',
  };
}`;

/**
 * Build the Runtime.evaluate expression for one scan.
 */
export function buildScanExpression(selectors: ChatSelectors): string {
  const args: ScanScriptArgs = {
    user: selectors.user,
    ai: selectors.ai,
    streamingIndicators: selectors.streamingIndicators,
    loadingMessage: selectors.loadingMessage,
    htmlLimit: HTML_SNIPPET_MAX_LENGTH,
  };
  return `(${SCAN_SCRIPT})(${JSON.stringify(args)})`;
}

// ============================================================================
// Result parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function readRect(value: unknown): RawMessageElement['rect'] {
  if (!isRecord(value)) return null;
  const { x, y, width, height } = value;
  if (
    typeof x !== 'number' ||
    typeof y !== 'number' ||
    typeof width !== 'number' ||
    typeof height !== 'number' ||
    ![x, y, width, height].every(Number.isFinite)
  ) {
    return null;
  }
  return { x, y, width, height };
}

function readElements(value: unknown, type: MessageType): RawMessageElement[] {
  if (!Array.isArray(value)) {
    throw new ScanError(`Scan result has no ${type} element list`);
  }
  return value.filter(isRecord).map((entry, position) => ({
    type,
    index: typeof entry['index'] === 'number' ? entry['index'] : position,
    text: typeof entry['text'] === 'string' ? entry['text'] : '',
    html: typeof entry['html'] === 'string' ? entry['html'] : '',
    rect: readRect(entry['rect']),
    dataMessageId: optionalString(entry['dataMessageId']),
    dataId: optionalString(entry['dataId']),
    elementId: optionalString(entry['elementId']),
  }));
}

/**
 * Validate the value returned by the scan script.
 *
 * @throws ScanError when the value does not have the expected shape
 */
export function parseScanResult(value: unknown): ScanResult {
  if (!isRecord(value)) {
    throw new ScanError('Scan script returned no result');
  }
  return {
    user: readElements(value['user'], 'user'),
    ai: readElements(value['ai'], 'ai'),
    streaming: value['streaming'] === true,
    loadingText: typeof value['loadingText'] === 'string' ? value['loadingText'] : '',
  };
}

// ============================================================================
// Record construction
// ============================================================================

/**
 * Remove decoration the chat UI adds around assistant replies.
 *
 * @example
 * ```typescript
 * stripBoilerplate('Copilot said\nHello there\nEdit in a page', {
 *   prefixes: ['Copilot said'],
 *   suffixes: ['Edit in a page'],
 * }); // 'Hello there'
 * ```
 */
export function stripBoilerplate(
  text: string,
  boilerplate: { prefixes: string[]; suffixes: string[] }
): string {
  let result = text.trim();
  for (const prefix of boilerplate.prefixes) {
    if (result.startsWith(prefix)) {
      result = result.slice(prefix.length).trim();
    }
  }
  for (const suffix of boilerplate.suffixes) {
    if (result.endsWith(suffix)) {
      result = result.slice(0, result.length - suffix.length).trim();
    }
  }
  return result;
}

/**
 * Stable identifier for a message element.
 *
 * `data-message-id`, then `data-id`, then the type-prefixed `id` attribute,
 * then the positional `<type>_<index>`.
 *
 * @example
 * ```typescript
 * deriveMessageId({ type: 'ai', index: 3, elementId: 'msg-42', ... }); // 'ai:msg-42'
 * deriveMessageId({ type: 'user', index: 0, ... });                    // 'user_0'
 * ```
 */
export function deriveMessageId(element: RawMessageElement): string {
  return (
    element.dataMessageId ??
    element.dataId ??
    (element.elementId ? `${element.type}:${element.elementId}` : `${element.type}_${element.index}`)
  );
}

/**
 * Turn a scanned element into a record, or null when it is incomplete
 * (no text after cleanup, or no layout box).
 */
export function toCapturedMessage(
  element: RawMessageElement,
  boilerplate: { prefixes: string[]; suffixes: string[] },
  capturedAt: Date
): CapturedMessage | null {
  const content =
    element.type === 'ai' ? stripBoilerplate(element.text, boilerplate) : element.text.trim();
  if (!content || !element.rect) {
    return null;
  }

  return {
    timestamp: capturedAt.toISOString(),
    message_id: deriveMessageId(element),
    type: element.type,
    content,
    html_snippet: element.html.slice(0, HTML_SNIPPET_MAX_LENGTH),
    element_location: { ...element.rect },
  };
}

/**
 * All complete records of a scan, in vertical page order.
 *
 * @param options.holdAi - Leave assistant elements out (a reply is streaming)
 */
export function buildMessages(
  scan: ScanResult,
  options: {
    boilerplate: { prefixes: string[]; suffixes: string[] };
    holdAi?: boolean;
    capturedAt?: Date;
  }
): CapturedMessage[] {
  const capturedAt = options.capturedAt ?? new Date();
  const elements = options.holdAi ? scan.user : [...scan.user, ...scan.ai];

  return elements
    .map((element) => toCapturedMessage(element, options.boilerplate, capturedAt))
    .filter((message): message is CapturedMessage => message !== null)
    .sort((a, b) => a.element_location.y - b.element_location.y);
}
