import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { browserTabs, createMockTarget } from '@/__testfixtures__/connectionTargets.js';
import { DEFAULT_PROFILE } from '@/config/loader.js';
import { NoPageError } from '@/utils/errors.js';

import { isCandidatePage, scoreTabMatch, scoreUrlHints, selectPageTarget } from '../targets.js';

describe('scoreTabMatch', () => {
  const tab = (url: string): ReturnType<typeof createMockTarget> => createMockTarget({ url });

  it('should score an exact URL 100', () => {
    assert.equal(scoreTabMatch(tab('https://example.com/chat'), 'https://example.com/chat'), 100);
  });

  it('should score the same host and path 90', () => {
    assert.equal(scoreTabMatch(tab('https://example.com/chat?id=7'), 'https://example.com/chat'), 90);
  });

  it('should score the same host with a path prefix 70', () => {
    assert.equal(scoreTabMatch(tab('https://example.com/chat/thread/7'), 'https://example.com/chat'), 70);
  });

  it('should score the same host only 50', () => {
    assert.equal(scoreTabMatch(tab('https://example.com/settings'), 'https://example.com/chat'), 50);
  });

  it('should score a plain substring 30', () => {
    assert.equal(scoreTabMatch(tab('https://www.example.com/chat'), 'example.com/chat'), 30);
  });

  it('should score an unrelated tab 0', () => {
    assert.equal(scoreTabMatch(tab('https://other.org/'), 'https://example.com/chat'), 0);
  });
});

describe('scoreUrlHints', () => {
  it('should add up every matching hint', () => {
    const score = scoreUrlHints('https://m365.cloud.microsoft/chat/?auth=2', DEFAULT_PROFILE.chatUrlHints);

    assert.equal(score, 11);
  });

  it('should be 0 without a matching hint', () => {
    assert.equal(scoreUrlHints('https://news.example.com/today', DEFAULT_PROFILE.chatUrlHints), 0);
  });
});

describe('isCandidatePage', () => {
  it('should keep regular pages and drop internal pages and workers', () => {
    const kept = browserTabs.filter(isCandidatePage).map((target) => target.id);

    assert.deepEqual(kept, ['news', 'chat']);
  });
});

describe('selectPageTarget', () => {
  it('should pick the tab that best matches the target URL and hints', () => {
    const selected = selectPageTarget(browserTabs, {
      targetUrl: 'https://m365.cloud.microsoft/chat/',
      chatUrlHints: DEFAULT_PROFILE.chatUrlHints,
    });

    assert.equal(selected.id, 'chat');
  });

  it('should use hints alone when no target URL is configured', () => {
    const selected = selectPageTarget(browserTabs, { chatUrlHints: DEFAULT_PROFILE.chatUrlHints });

    assert.equal(selected.id, 'chat');
  });

  it('should fall back to the first candidate when nothing scores', () => {
    const tabs = [
      createMockTarget({ id: 'a', url: 'https://a.example.com/' }),
      createMockTarget({ id: 'b', url: 'https://b.example.com/' }),
    ];

    assert.equal(selectPageTarget(tabs, { chatUrlHints: DEFAULT_PROFILE.chatUrlHints }).id, 'a');
  });

  it('should prefer the earlier tab on a tie', () => {
    const tabs = [
      createMockTarget({ id: 'first', url: 'https://chat.example.com/chat' }),
      createMockTarget({ id: 'second', url: 'https://chat.example.com/chat' }),
    ];

    assert.equal(selectPageTarget(tabs, { targetUrl: 'https://chat.example.com/chat' }).id, 'first');
  });

  it('should throw NoPageError when only internal pages exist', () => {
    const tabs = browserTabs.filter((target) => target.id === 'devtools' || target.id === 'worker');

    assert.throws(() => selectPageTarget(tabs), (error: unknown) => {
      assert.ok(error instanceof NoPageError);
      assert.equal(error.message, 'The browser has no open page to capture');
      assert.equal(error.exitCode, 83);
      return true;
    });
  });
});
