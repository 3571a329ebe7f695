import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { createTempDir, removeTempDir } from '@/__testutils__/tempDir.js';
import type { CapturedMessage } from '@/capture/types.js';
import { OutputFileError } from '@/utils/errors.js';

import { CaptureLog } from '../CaptureLog.js';

const message = (id: string, content: string): CapturedMessage => ({
  timestamp: '2026-03-01T09:30:00.000Z',
  message_id: id,
  type: 'user',
  content,
  html_snippet: `<p>${content}</p>`,
  element_location: { x: 0, y: 10, width: 100, height: 20 },
});

describe('CaptureLog', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  it('should write one JSON object per line with the record fields in order', () => {
    assert.equal(
      CaptureLog.formatRecord(message('user_0', 'Hi')),
      '{"timestamp":"2026-03-01T09:30:00.000Z","message_id":"user_0","type":"user","content":"Hi",' +
        '"html_snippet":"<p>Hi</p>","element_location":{"x":0,"y":10,"width":100,"height":20}}\n'
    );
  });

  it('should keep non-ASCII text and escape embedded newlines', () => {
    const line = CaptureLog.formatRecord(message('user_0', 'Grüße\nzweite Zeile'));

    assert.ok(line.includes('"content":"Grüße\\nzweite Zeile"'));
    assert.equal(line.split('\n').length, 2);
  });

  it('should create parent directories and append across calls', async () => {
    const file = path.join(tempDir, 'nested', 'dir', 'capture.jsonl');
    const log = new CaptureLog(file);

    await log.append(message('user_0', 'one'));
    await log.append(message('user_1', 'two'), message('user_2', 'three'));

    const lines = fs.readFileSync(file, 'utf8').trimEnd().split('\n');
    assert.deepEqual(
      lines.map((line) => (JSON.parse(line) as CapturedMessage).message_id),
      ['user_0', 'user_1', 'user_2']
    );
    assert.equal(log.count, 3);
  });

  it('should never truncate an existing file', async () => {
    const file = path.join(tempDir, 'capture.jsonl');
    fs.writeFileSync(file, '{"existing":true}\n');

    await new CaptureLog(file).append(message('user_0', 'new'));

    const lines = fs.readFileSync(file, 'utf8').trimEnd().split('\n');
    assert.equal(lines[0], '{"existing":true}');
    assert.equal(lines.length, 2);
  });

  it('should not touch the file when given nothing', async () => {
    const file = path.join(tempDir, 'capture.jsonl');

    await new CaptureLog(file).append();

    assert.equal(fs.existsSync(file), false);
  });

  it('should throw OutputFileError when the path is a directory', async () => {
    const log = new CaptureLog(tempDir);

    await assert.rejects(log.append(message('user_0', 'x')), (error: unknown) => {
      assert.ok(error instanceof OutputFileError);
      assert.ok(error.message.startsWith(`Cannot write ${tempDir}: `));
      assert.equal(log.count, 0);
      return true;
    });
  });
});
