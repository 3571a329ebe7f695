/**
 * One-shot prompt: type a message into the chat page, stream the reply.
 */

import type { CaptureLog } from '@/capture/CaptureLog.js';
import {
  buildScanExpression,
  parseScanResult,
  stripBoilerplate,
  toCapturedMessage,
} from '@/capture/extractor.js';
import { computeDelta, normalizeStreamText } from '@/capture/textNormalizer.js';
import type { CapturedMessage, RawMessageElement, ScanResult } from '@/capture/types.js';
import type { ChatProfile } from '@/config/types.js';
import { evaluateValue } from '@/connection/browser.js';
import type { TypedCDPConnection } from '@/connection/typed-cdp.js';
import {
  ASK_POLL_INTERVAL_MS,
  ASK_STABLE_POLLS,
  DEFAULT_ASK_TIMEOUT_MS,
  TEXTBOX_WAIT_TIMEOUT_MS,
} from '@/constants.js';
import type { Logger } from '@/types.js';
import { createLogger } from '@/ui/logging/index.js';
import { askSentMessage } from '@/ui/messages/capture.js';
import { CDPTimeoutError, ScanError } from '@/utils/errors.js';
import { sleep } from '@/utils/sleep.js';

const FILL_ATTEMPTS = 3;
const FILL_VERIFY_PREFIX_LENGTH = 10;

/**
 * Returns the first selector that matches an element, or null.
 */
const FIND_TEXTBOX_SCRIPT = `function (selectors) {
  for (const selector of selectors) {
    try {
      if (document.querySelector(selector)) return selector;
    } catch (e) {}
  }
  return null;
}`;

/**
 * Sets the value of an input, textarea or contenteditable element and fires
 * input/change so that framework-controlled inputs pick it up. Returns the
 * value read back from the element.
 */
const FILL_TEXTBOX_SCRIPT = `function (selector, value) {
  const el = document.querySelector(selector);
  if (!el) return null;
  el.focus();
  if (el.isContentEditable) {
    el.textContent = value;
  } else if ('value' in el) {
    const proto = Object.getPrototypeOf(el);
    const setter = Object.getOwnPropertyDescriptor(proto, 'value');
    if (setter && setter.set) {
      setter.set.call(el, value);
    } else {
      el.value = value;
    }
  }
  el.dispatchEvent(new Event('input', { bubbles: true }));
  el.dispatchEvent(new Event('change', { bubbles: true }));
  return el.isContentEditable ? el.textContent || '' : el.value || '';
}`;

export interface AskOptions {
  message: string;
  timeoutMs?: number;
  pollIntervalMs?: number;
  /** Unchanged polls after which a reply without a seen indicator is complete */
  stablePolls?: number;
  textboxTimeoutMs?: number;
}

export interface AskDeps {
  log?: CaptureLog | undefined;
  /** Receives streamed reply text (stdout in the CLI) */
  write?: (chunk: string) => void;
  logger?: Logger;
  now?: () => Date;
  signal?: AbortSignal | undefined;
}

export interface AskResult {
  reply: string;
  /** Records appended to the log (user prompt first, then the reply) */
  records: CapturedMessage[];
}

/**
 * Poll until one of the textbox selectors matches.
 *
 * @returns The matching selector
 * @throws CDPTimeoutError when none appears within `timeoutMs`
 */
export async function waitForTextbox(
  page: TypedCDPConnection,
  selectors: string[],
  timeoutMs = TEXTBOX_WAIT_TIMEOUT_MS,
  pollIntervalMs = ASK_POLL_INTERVAL_MS
): Promise<string> {
  const expression = `(${FIND_TEXTBOX_SCRIPT})(${JSON.stringify(selectors)})`;
  const deadline = Date.now() + timeoutMs;

  for (;;) {
    const found = await evaluateValue(page, expression);
    if (typeof found === 'string') {
      return found;
    }
    if (Date.now() >= deadline) {
      throw new CDPTimeoutError(`Chat input not found within ${timeoutMs}ms`, {
        suggestions: ['Open the conversation in the selected tab and sign in first'],
      });
    }
    await sleep(pollIntervalMs);
  }
}

/**
 * Put `message` into the chat input and press Enter.
 *
 * @throws ScanError when the input does not take the value after retries
 */
export async function submitMessage(
  page: TypedCDPConnection,
  selector: string,
  message: string
): Promise<void> {
  const expression = `(${FILL_TEXTBOX_SCRIPT})(${JSON.stringify(selector)}, ${JSON.stringify(message)})`;
  const expected = message.slice(0, FILL_VERIFY_PREFIX_LENGTH);

  for (let attempt = 1; attempt <= FILL_ATTEMPTS; attempt++) {
    const value = await evaluateValue(page, expression, { userGesture: true });
    if (typeof value === 'string' && value.includes(expected)) {
      await pressEnter(page);
      return;
    }
    await sleep(ASK_POLL_INTERVAL_MS);
  }

  throw new ScanError(`Could not set the chat input (${selector})`);
}

async function pressEnter(page: TypedCDPConnection): Promise<void> {
  const key = { key: 'Enter', code: 'Enter', windowsVirtualKeyCode: 13, nativeVirtualKeyCode: 13 };
  await page.send('Input.dispatchKeyEvent', { type: 'keyDown', text: '\r', ...key });
  await page.send('Input.dispatchKeyEvent', { type: 'keyUp', ...key });
}

function lastOf<T>(items: readonly T[]): T | undefined {
  return items[items.length - 1];
}

/**
 * Send a prompt and wait for the assistant's complete reply.
 *
 * The reply is streamed through `deps.write` as it grows. It counts as
 * complete once new text has appeared, no streaming indicator is present,
 * and either an indicator was seen earlier or the text stayed unchanged for
 * `stablePolls` polls.
 *
 * @throws CDPTimeoutError if no complete reply arrives within `timeoutMs`
 */
export async function askChat(
  page: TypedCDPConnection,
  profile: ChatProfile,
  options: AskOptions,
  deps: AskDeps = {}
): Promise<AskResult> {
  const {
    message,
    timeoutMs = DEFAULT_ASK_TIMEOUT_MS,
    pollIntervalMs = ASK_POLL_INTERVAL_MS,
    stablePolls = ASK_STABLE_POLLS,
  } = options;
  const logger = deps.logger ?? createLogger('ask');
  const write = deps.write ?? ((chunk: string) => process.stdout.write(chunk));
  const now = deps.now ?? (() => new Date());

  const scanExpression = buildScanExpression(profile.selectors);
  const readPage = async (): Promise<ScanResult> =>
    parseScanResult(await evaluateValue(page, scanExpression));
  const replyText = (element: RawMessageElement | undefined): string =>
    element ? normalizeStreamText(stripBoilerplate(element.text, profile.boilerplate), profile.noisePrefixes) : '';

  const selector = await waitForTextbox(page, profile.selectors.textbox, options.textboxTimeoutMs);

  const before = await readPage();
  const baselineUserCount = before.user.length;
  const baselineAiCount = before.ai.length;
  const baselineReply = replyText(lastOf(before.ai));
  const baselineLoading = before.loadingText;

  await submitMessage(page, selector, message);
  logger.info(askSentMessage(message.length));

  const deadline = Date.now() + timeoutMs;
  let lastSeen = baselineReply;
  let emitted = '';
  let hasNewContent = false;
  let seenIndicator = false;
  let unchangedPolls = 0;

  const emit = (text: string): void => {
    const delta = computeDelta(emitted, text);
    if (!delta) return;
    write(delta.kind === 'append' ? delta.text : `\n${delta.text}`);
    emitted = text;
  };

  while (Date.now() < deadline && !deps.signal?.aborted) {
    await sleep(pollIntervalMs, deps.signal);
    const scan = await readPage();
    const lastAi = lastOf(scan.ai);
    const latest = scan.loadingText
      ? normalizeStreamText(scan.loadingText, profile.noisePrefixes)
      : replyText(lastAi);

    if (scan.streaming) {
      seenIndicator = true;
    }
    if (!latest) continue;
    if (scan.loadingText ? scan.loadingText === baselineLoading : scan.ai.length <= baselineAiCount && latest === baselineReply) {
      continue;
    }

    if (latest !== lastSeen) {
      if (!hasNewContent) {
        logger.debug(`First reply text after ${timeoutMs - (deadline - Date.now())}ms`);
      }
      hasNewContent = true;
      unchangedPolls = 0;
      lastSeen = latest;
      emit(latest);
    } else if (hasNewContent) {
      unchangedPolls++;
    }

    if (!hasNewContent || scan.streaming || (!seenIndicator && unchangedPolls < stablePolls)) {
      continue;
    }

    const reply = replyText(lastAi);
    if (!lastAi || !reply) continue;

    emit(reply);
    write('\n');

    const capturedAt = now();
    const records: CapturedMessage[] = [];
    const userElement = scan.user.length > baselineUserCount ? lastOf(scan.user) : undefined;
    const userRecord = userElement && toCapturedMessage(userElement, profile.boilerplate, capturedAt);
    if (userRecord) {
      records.push(userRecord);
    }
    const aiRecord = toCapturedMessage(lastAi, profile.boilerplate, capturedAt);
    if (aiRecord) {
      records.push({ ...aiRecord, content: reply });
    }
    await deps.log?.append(...records);

    return { reply, records };
  }

  if (deps.signal?.aborted) {
    throw new CDPTimeoutError('Interrupted before the reply was complete');
  }
  throw new CDPTimeoutError(`No complete reply within ${timeoutMs}ms`);
}
