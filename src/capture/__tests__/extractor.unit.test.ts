import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { rawElement, scanResult } from '@/__testfixtures__/chatPage.js';
import { DEFAULT_PROFILE } from '@/config/loader.js';
import { ScanError } from '@/utils/errors.js';

import {
  buildMessages,
  buildScanExpression,
  deriveMessageId,
  parseScanResult,
  stripBoilerplate,
  toCapturedMessage,
} from '../extractor.js';

const boilerplate = DEFAULT_PROFILE.boilerplate;
const capturedAt = new Date('2026-03-01T09:30:00.000Z');

describe('deriveMessageId', () => {
  it('should prefer data-message-id', () => {
    const element = rawElement('ai', 2, 'Hi', { dataMessageId: 'm-1', dataId: 'd-1', elementId: 'e-1' });

    assert.equal(deriveMessageId(element), 'm-1');
  });

  it('should use data-id when there is no data-message-id', () => {
    assert.equal(deriveMessageId(rawElement('ai', 2, 'Hi', { dataId: 'd-1', elementId: 'e-1' })), 'd-1');
  });

  it('should prefix the element id with the message type', () => {
    assert.equal(deriveMessageId(rawElement('user', 0, 'Hi', { elementId: 'e-1' })), 'user:e-1');
  });

  it('should fall back to the position', () => {
    assert.equal(deriveMessageId(rawElement('ai', 3, 'Hi')), 'ai_3');
  });
});

describe('stripBoilerplate', () => {
  it('should remove the configured prefix and suffix', () => {
    assert.equal(stripBoilerplate('Copilot said\nHello there\nEdit in a page', boilerplate), 'Hello there');
  });

  it('should leave text without decoration alone apart from trimming', () => {
    assert.equal(stripBoilerplate('  Plain reply \n', boilerplate), 'Plain reply');
  });
});

describe('toCapturedMessage', () => {
  it('should build a record from a complete element', () => {
    const message = toCapturedMessage(
      rawElement('ai', 0, 'Copilot said\nThe answer is 42', { dataMessageId: 'r-7' }),
      boilerplate,
      capturedAt
    );

    assert.deepEqual(message, {
      timestamp: '2026-03-01T09:30:00.000Z',
      message_id: 'r-7',
      type: 'ai',
      content: 'The answer is 42',
      html_snippet: '<p>Copilot said\nThe answer is 42</p>',
      element_location: { x: 10, y: 100, width: 600, height: 40 },
    });
  });

  it('should not strip boilerplate from user messages', () => {
    const message = toCapturedMessage(rawElement('user', 0, ' Copilot said hi '), boilerplate, capturedAt);

    assert.equal(message?.content, 'Copilot said hi');
  });

  it('should skip an element with only whitespace', () => {
    assert.equal(toCapturedMessage(rawElement('user', 0, '  \n '), boilerplate, capturedAt), null);
  });

  it('should skip an assistant element with only decoration', () => {
    assert.equal(toCapturedMessage(rawElement('ai', 0, 'Copilot said'), boilerplate, capturedAt), null);
  });

  it('should skip an element without a layout box', () => {
    assert.equal(toCapturedMessage(rawElement('user', 0, 'Hidden', { rect: null }), boilerplate, capturedAt), null);
  });

  it('should cap the HTML snippet at 500 characters', () => {
    const message = toCapturedMessage(
      rawElement('user', 0, 'Long', { html: 'x'.repeat(600) }),
      boilerplate,
      capturedAt
    );

    assert.equal(message?.html_snippet.length, 500);
  });
});

describe('buildMessages', () => {
  const scan = scanResult({
    user: [
      rawElement('user', 0, 'First question'),
      rawElement('user', 1, 'Second question', { rect: { x: 10, y: 300, width: 600, height: 40 } }),
    ],
    ai: [rawElement('ai', 0, 'First answer', { rect: { x: 10, y: 150, width: 600, height: 80 } })],
  });

  it('should order records by vertical position', () => {
    const messages = buildMessages(scan, { boilerplate, capturedAt });

    assert.deepEqual(
      messages.map((message) => message.message_id),
      ['user_0', 'ai_0', 'user_1']
    );
  });

  it('should leave assistant elements out while holding', () => {
    const messages = buildMessages(scan, { boilerplate, capturedAt, holdAi: true });

    assert.deepEqual(
      messages.map((message) => message.message_id),
      ['user_0', 'user_1']
    );
  });
});

describe('parseScanResult', () => {
  it('should accept the page script result', () => {
    const parsed = parseScanResult({
      user: [
        {
          index: 0,
          text: 'Hello',
          html: '<p>Hello</p>',
          rect: { x: 1, y: 2, width: 3, height: 4 },
          dataMessageId: 'u-1',
          dataId: null,
          elementId: '',
        },
      ],
      ai: [],
      streaming: true,
      loadingText: 'Generating response',
    });

    assert.deepEqual(parsed, {
      user: [
        {
          type: 'user',
          index: 0,
          text: 'Hello',
          html: '<p>Hello</p>',
          rect: { x: 1, y: 2, width: 3, height: 4 },
          dataMessageId: 'u-1',
          dataId: null,
          elementId: null,
        },
      ],
      ai: [],
      streaming: true,
      loadingText: 'Generating response',
    });
  });

  it('should drop a rect with non-numeric fields', () => {
    const parsed = parseScanResult({
      user: [{ index: 0, text: 'Hi', html: '', rect: { x: 'a', y: 0, width: 1, height: 1 } }],
      ai: [],
    });

    assert.equal(parsed.user[0]?.rect, null);
  });

  it('should throw ScanError for a missing result', () => {
    assert.throws(() => parseScanResult(undefined), ScanError);
  });

  it('should throw ScanError when an element list is missing', () => {
    assert.throws(() => parseScanResult({ user: [] }), {
      name: 'ScanError',
      message: 'Scan result has no ai element list',
    });
  });
});

describe('buildScanExpression', () => {
  it('should call the scan script with the selectors as JSON', () => {
    const expression = buildScanExpression(DEFAULT_PROFILE.selectors);

    assert.ok(expression.startsWith('(function (args) {'));
    assert.ok(
      expression.endsWith(
        `(${JSON.stringify({
          user: DEFAULT_PROFILE.selectors.user,
          ai: DEFAULT_PROFILE.selectors.ai,
          streamingIndicators: DEFAULT_PROFILE.selectors.streamingIndicators,
          loadingMessage: DEFAULT_PROFILE.selectors.loadingMessage,
          htmlLimit: 500,
        })})`
      )
    );
  });
});
