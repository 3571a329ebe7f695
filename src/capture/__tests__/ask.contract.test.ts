/**
 * ask contract tests
 *
 * FakeBrowser answers the three page scripts (find textbox, fill textbox,
 * scan) and the Enter key events; scans come from a queue whose last entry
 * repeats.
 */

import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { rawElement, scanResult } from '@/__testfixtures__/chatPage.js';
import { FakeBrowser, evaluateResult } from '@/__testutils__/FakeBrowser.js';
import { silentLogger } from '@/__testutils__/logger.js';
import { createTempDir, removeTempDir } from '@/__testutils__/tempDir.js';
import { CaptureLog } from '@/capture/CaptureLog.js';
import type { CapturedMessage, ScanResult } from '@/capture/types.js';
import { DEFAULT_PROFILE } from '@/config/loader.js';
import type { TypedCDPConnection } from '@/connection/typed-cdp.js';
import { CDPTimeoutError, ScanError } from '@/utils/errors.js';

import { type AskDeps, askChat, submitMessage, waitForTextbox } from '../ask.js';

const PROMPT = 'What is 6 times 7?';
const TEXTBOX = '[role="textbox"]';
const CAPTURED_AT = new Date('2026-03-01T09:30:00.000Z');

const earlierExchange = scanResult({
  user: [rawElement('user', 0, 'Earlier question')],
  ai: [rawElement('ai', 0, 'Copilot said\nEarlier answer')],
});

describe('ask contract', () => {
  let browser: FakeBrowser;
  let page: TypedCDPConnection;
  let tempDir: string;
  let scans: ScanResult[];
  let textbox: string | null;
  let filledValue: string;
  let chunks: string[];

  const deps = (extra: { log?: CaptureLog; signal?: AbortSignal } = {}): AskDeps => ({
    logger: silentLogger,
    write: (chunk) => chunks.push(chunk),
    now: () => CAPTURED_AT,
    ...extra,
  });

  beforeEach(async () => {
    tempDir = createTempDir();
    scans = [];
    textbox = TEXTBOX;
    filledValue = PROMPT;
    chunks = [];
    browser = new FakeBrowser();
    browser.handle('Input.dispatchKeyEvent', () => ({}));
    browser.handle('Runtime.evaluate', (params) => {
      const expression = String(params['expression']);
      if (expression.startsWith('(function (selectors)')) {
        return evaluateResult(textbox);
      }
      if (expression.startsWith('(function (selector, value)')) {
        return evaluateResult(filledValue);
      }
      const next = scans.length > 1 ? scans.shift() : scans[0];
      return evaluateResult(next ?? scanResult());
    });
    const connection = await browser.connect({ host: '127.0.0.1', port: 9222 });
    page = connection.browser.forSession('session-chat');
  });

  afterEach(() => {
    browser.dispose();
    removeTempDir(tempDir);
  });

  it('should stream the reply and save the exchange', async () => {
    const output = path.join(tempDir, 'ask.jsonl');
    scans = [
      earlierExchange,
      { ...earlierExchange, streaming: true, loadingText: 'Generating response\nThe answer' },
      { ...earlierExchange, streaming: true, loadingText: 'The answer is 42' },
      scanResult({
        user: [...earlierExchange.user, rawElement('user', 1, PROMPT)],
        ai: [...earlierExchange.ai, rawElement('ai', 1, 'Copilot said\nThe answer is 42.')],
      }),
    ];

    const result = await askChat(
      page,
      DEFAULT_PROFILE,
      { message: PROMPT, pollIntervalMs: 1 },
      deps({ log: new CaptureLog(output) })
    );

    assert.equal(result.reply, 'The answer is 42.');
    assert.deepEqual(chunks, ['The answer', ' is 42', '.', '\n']);
    assert.deepEqual(
      result.records.map((record) => [record.message_id, record.type, record.content]),
      [
        ['user_1', 'user', PROMPT],
        ['ai_1', 'ai', 'The answer is 42.'],
      ]
    );
    const saved = fs
      .readFileSync(output, 'utf8')
      .trimEnd()
      .split('\n')
      .map((line) => JSON.parse(line) as CapturedMessage);
    assert.deepEqual(saved, result.records);
    assert.equal(saved[1]?.timestamp, '2026-03-01T09:30:00.000Z');
  });

  it('should fill the textbox with a user gesture and press Enter', async () => {
    scans = [
      earlierExchange,
      scanResult({
        user: [...earlierExchange.user, rawElement('user', 1, PROMPT)],
        ai: [...earlierExchange.ai, rawElement('ai', 1, '42')],
        streaming: true,
      }),
      scanResult({
        user: [...earlierExchange.user, rawElement('user', 1, PROMPT)],
        ai: [...earlierExchange.ai, rawElement('ai', 1, '42')],
      }),
    ];

    await askChat(page, DEFAULT_PROFILE, { message: PROMPT, pollIntervalMs: 1 }, deps());

    const fill = browser
      .sent('Runtime.evaluate')
      .find((command) => String(command.params['expression']).startsWith('(function (selector, value)'));
    assert.equal(fill?.params['userGesture'], true);
    assert.equal(fill?.sessionId, 'session-chat');
    assert.deepEqual(
      browser.sent('Input.dispatchKeyEvent').map((command) => command.params['type']),
      ['keyDown', 'keyUp']
    );
  });

  it('should treat a reply that stops changing as complete without an indicator', async () => {
    scans = [
      scanResult(),
      scanResult({
        user: [rawElement('user', 0, PROMPT)],
        ai: [rawElement('ai', 0, 'Hi there')],
      }),
    ];

    const result = await askChat(
      page,
      DEFAULT_PROFILE,
      { message: PROMPT, pollIntervalMs: 1, stablePolls: 2 },
      deps()
    );

    assert.equal(result.reply, 'Hi there');
    assert.deepEqual(chunks, ['Hi there', '\n']);
    assert.deepEqual(
      result.records.map((record) => record.message_id),
      ['user_0', 'ai_0']
    );
  });

  it('should ignore the previous reply still on the page', async () => {
    scans = [earlierExchange];

    await assert.rejects(
      askChat(page, DEFAULT_PROFILE, { message: PROMPT, pollIntervalMs: 1, timeoutMs: 30 }, deps()),
      (error: unknown) => {
        assert.ok(error instanceof CDPTimeoutError);
        assert.equal(error.message, 'No complete reply within 30ms');
        return true;
      }
    );
    assert.deepEqual(chunks, []);
  });

  it('should stop waiting when the signal aborts', async () => {
    scans = [earlierExchange];
    const controller = new AbortController();
    controller.abort();

    await assert.rejects(
      askChat(page, DEFAULT_PROFILE, { message: PROMPT, pollIntervalMs: 1 }, deps({ signal: controller.signal })),
      { name: 'CDPTimeoutError', message: 'Interrupted before the reply was complete' }
    );
  });

  describe('waitForTextbox', () => {
    it('should return the first matching selector', async () => {
      assert.equal(await waitForTextbox(page, DEFAULT_PROFILE.selectors.textbox, 1000, 1), TEXTBOX);
    });

    it('should time out when no input appears', async () => {
      textbox = null;

      await assert.rejects(waitForTextbox(page, DEFAULT_PROFILE.selectors.textbox, 20, 5), {
        name: 'CDPTimeoutError',
        message: 'Chat input not found within 20ms',
      });
    });
  });

  describe('submitMessage', () => {
    it('should give up when the input never takes the value', async () => {
      filledValue = '';

      await assert.rejects(submitMessage(page, TEXTBOX, PROMPT), (error: unknown) => {
        assert.ok(error instanceof ScanError);
        assert.equal(error.message, 'Could not set the chat input ([role="textbox"])');
        return true;
      });
      assert.equal(browser.sent('Input.dispatchKeyEvent').length, 0);
    });
  });
});
