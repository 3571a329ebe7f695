import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { DEFAULT_PROFILE } from '@/config/loader.js';

import { computeDelta, normalizeStreamText } from '../textNormalizer.js';

describe('normalizeStreamText', () => {
  const noise = DEFAULT_PROFILE.noisePrefixes;

  it('should drop noise lines and lone colons', () => {
    const text = 'You said:\nhi\nGenerating response\n:\nHello!';

    assert.equal(normalizeStreamText(text, noise), 'hi\nHello!');
  });

  it('should keep at most one blank line in a row', () => {
    assert.equal(normalizeStreamText('one\n\n\n\ntwo\n\nthree', noise), 'one\n\ntwo\n\nthree');
  });

  it('should trim trailing whitespace per line and around the result', () => {
    assert.equal(normalizeStreamText('\n\nfirst   \n  indented\t\n\n', noise), 'first\n  indented');
  });

  it('should accept Windows line endings', () => {
    assert.equal(normalizeStreamText('first\r\nsecond', noise), 'first\nsecond');
  });

  it('should match noise prefixes after leading whitespace', () => {
    assert.equal(normalizeStreamText('   Reasoned for 3 seconds\nAnswer', noise), 'Answer');
  });

  it('should return an empty string for empty input', () => {
    assert.equal(normalizeStreamText('', noise), '');
  });
});

describe('computeDelta', () => {
  it('should return null when nothing changed', () => {
    assert.equal(computeDelta('Hello', 'Hello'), null);
  });

  it('should append only the new suffix', () => {
    assert.deepEqual(computeDelta('Hel', 'Hello'), { kind: 'append', text: 'lo' });
  });

  it('should rewrite when earlier text changed', () => {
    assert.deepEqual(computeDelta('Hello wrld', 'Hello world'), { kind: 'rewrite', text: 'Hello world' });
  });

  it('should append everything after an empty start', () => {
    assert.deepEqual(computeDelta('', 'First'), { kind: 'append', text: 'First' });
  });
});
