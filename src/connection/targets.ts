import type { Protocol, TypedCDPConnection } from '@/connection/typed-cdp.js';
import {
  CDP_FLATTEN_SESSION_FLAG,
  INTERNAL_PAGE_PREFIXES,
  NAVIGATION_POLL_INTERVAL_MS,
  NAVIGATION_READY_TIMEOUT_MS,
  PAGE_TARGET_TYPE,
} from '@/constants.js';
import type { UrlHint } from '@/config/types.js';
import type { CDPTarget } from '@/types.js';
import { createLogger } from '@/ui/logging/index.js';
import { CDPConnectionError, CDPTimeoutError, NoPageError, getErrorMessage } from '@/utils/errors.js';
import { sleep } from '@/utils/sleep.js';
import { safeParseUrl } from '@/utils/url.js';

import { evaluateValue } from './browser.js';

const log = createLogger('capture');

// Tab Matching Score Thresholds
const EXACT_URL_MATCH_SCORE = 100;
const HOST_AND_PATH_MATCH_SCORE = 90;
const HOST_AND_PATH_PREFIX_MATCH_SCORE = 70;
const HOST_ONLY_MATCH_SCORE = 50;
const SUBSTRING_MATCH_SCORE = 30;
const NO_MATCH_SCORE = 0;

const MULTIPLE_TABS_WARNING = (score: number, url: string): string =>
  `Multiple tabs match equally (score ${score}), using: ${url}`;
const NAVIGATION_FAILED_ERROR = (errorText: string): string => `Navigation failed: ${errorText}`;
const PAGE_NOT_READY_ERROR = (timeoutMs: number): string =>
  `Page still loading after ${timeoutMs}ms`;

/**
 * Score how well a tab matches the configured chat URL.
 *
 * Exact match (100) beats host+path (90), host+path prefix (70), host only
 * (50) and finally plain substring (30).
 */
export function scoreTabMatch(tab: CDPTarget, searchUrl: string): number {
  if (tab.url === searchUrl) {
    return EXACT_URL_MATCH_SCORE;
  }

  const currentTabUrl = safeParseUrl(tab.url);
  const targetUrl = safeParseUrl(searchUrl);

  if (currentTabUrl && targetUrl && currentTabUrl.host === targetUrl.host) {
    if (currentTabUrl.pathname === targetUrl.pathname) {
      return HOST_AND_PATH_MATCH_SCORE;
    }
    if (currentTabUrl.pathname.startsWith(targetUrl.pathname)) {
      return HOST_AND_PATH_PREFIX_MATCH_SCORE;
    }
    return HOST_ONLY_MATCH_SCORE;
  }

  if (tab.url.includes(searchUrl)) {
    return SUBSTRING_MATCH_SCORE;
  }

  return NO_MATCH_SCORE;
}

/**
 * Sum of the scores of every hint whose pattern occurs in the URL.
 */
export function scoreUrlHints(url: string, hints: readonly UrlHint[]): number {
  return hints.reduce((total, hint) => (url.includes(hint.pattern) ? total + hint.score : total), 0);
}

/**
 * Regular tab that is not a browser-internal page.
 */
export function isCandidatePage(target: CDPTarget): boolean {
  return (
    target.type === PAGE_TARGET_TYPE &&
    !INTERNAL_PAGE_PREFIXES.some((prefix) => target.url.startsWith(prefix))
  );
}

/**
 * Pick the chat page among the browser's targets.
 *
 * Each candidate scores {@link scoreTabMatch} against the target URL (when
 * configured) plus {@link scoreUrlHints}. The best positive score wins; on
 * a tie the earlier target wins. With no positive score the first candidate
 * is used.
 *
 * @throws NoPageError when no candidate page exists
 */
export function selectPageTarget(
  targets: readonly CDPTarget[],
  options: { targetUrl?: string | undefined; chatUrlHints?: readonly UrlHint[] } = {}
): CDPTarget {
  const candidates = targets.filter(isCandidatePage);
  const first = candidates[0];
  if (!first) {
    throw new NoPageError('The browser has no open page to capture', {
      suggestions: ['Open the chat in a browser tab, then run the command again'],
    });
  }

  const { targetUrl, chatUrlHints = [] } = options;
  const scored = candidates
    .map((target) => ({
      target,
      score:
        (targetUrl ? scoreTabMatch(target, targetUrl) : NO_MATCH_SCORE) +
        scoreUrlHints(target.url, chatUrlHints),
    }))
    .filter(({ score }) => score > 0)
    .sort((a, b) => b.score - a.score);

  const best = scored[0];
  const runnerUp = scored[1];
  if (!best) {
    log.debug(`No tab matches the chat hints; using first page ${first.url}`);
    return first;
  }
  if (runnerUp && runnerUp.score === best.score) {
    log.info(MULTIPLE_TABS_WARNING(best.score, best.target.url));
  }
  return best.target;
}

/**
 * List targets through the browser connection.
 */
export async function listTargets(browser: TypedCDPConnection): Promise<CDPTarget[]> {
  const { targetInfos } = await browser.send('Target.getTargets', {});
  return targetInfos.map((info) => ({
    id: info.targetId,
    type: info.type,
    url: info.url,
    title: info.title,
    webSocketDebuggerUrl: '',
  }));
}

/**
 * Attach to a target with a flattened session.
 *
 * @returns A wrapper routing commands to the page
 */
export async function attachToTarget(
  browser: TypedCDPConnection,
  targetId: string
): Promise<TypedCDPConnection> {
  const { sessionId } = await browser.send('Target.attachToTarget', {
    targetId,
    flatten: CDP_FLATTEN_SESSION_FLAG,
  });
  log.debug(`Attached to ${targetId} (session ${sessionId})`);
  return browser.forSession(sessionId);
}

/**
 * Navigate an attached page.
 *
 * @returns The browser's response; no `loaderId` means a same-document navigation
 * @throws Error if the browser reports a navigation error
 */
export async function navigateToUrl(
  page: TypedCDPConnection,
  url: string
): Promise<Protocol.Page.NavigateResponse> {
  const response = await page.send('Page.navigate', { url });
  if (response.errorText) {
    throw new Error(NAVIGATION_FAILED_ERROR(response.errorText));
  }
  return response;
}

/**
 * Read `document.readyState`, or null while the document is being replaced.
 */
async function readDocumentState(page: TypedCDPConnection): Promise<string | null> {
  try {
    const state = await evaluateValue(page, 'document.readyState');
    return typeof state === 'string' ? state : null;
  } catch (error) {
    if (error instanceof CDPConnectionError) {
      throw error;
    }
    log.debug(`document.readyState not readable yet: ${getErrorMessage(error)}`);
    return null;
  }
}

/**
 * Navigate and wait for the new document.
 *
 * Ready means `Page.loadEventFired`, or a readyState past `loading` once the
 * main frame has committed the new document. A failed read counts as not
 * ready until the deadline.
 *
 * @throws CDPTimeoutError if the page is still loading after `timeoutMs`
 */
export async function navigateAndWait(
  page: TypedCDPConnection,
  url: string,
  timeoutMs = NAVIGATION_READY_TIMEOUT_MS,
  pollIntervalMs = NAVIGATION_POLL_INTERVAL_MS
): Promise<void> {
  await page.send('Page.enable', {});

  let loaded = false;
  let committed = false;
  const loadHandlerId = page.on('Page.loadEventFired', () => {
    loaded = true;
  });
  const frameHandlerId = page.on('Page.frameNavigated', ({ frame }) => {
    if (frame.parentId === undefined) {
      committed = true;
    }
  });

  try {
    const { loaderId } = await navigateToUrl(page, url);
    if (loaderId === undefined) {
      log.debug('Same-document navigation');
      return;
    }

    const deadline = Date.now() + timeoutMs;
    while (Date.now() < deadline) {
      if (loaded) {
        log.debug('Load event fired');
        return;
      }
      if (committed) {
        const state = await readDocumentState(page);
        if (state !== null && state !== 'loading') {
          log.debug(`Document ready (${state})`);
          return;
        }
      }
      await sleep(pollIntervalMs);
    }
  } finally {
    page.off('Page.loadEventFired', loadHandlerId);
    page.off('Page.frameNavigated', frameHandlerId);
  }

  throw new CDPTimeoutError(PAGE_NOT_READY_ERROR(timeoutMs));
}

/**
 * Select the chat page among the browser's targets and attach to it.
 *
 * @throws NoPageError when the browser has no candidate page
 */
export async function openChatPage(
  browser: TypedCDPConnection,
  options: { targetUrl?: string | undefined; chatUrlHints?: readonly UrlHint[] }
): Promise<{ target: CDPTarget; page: TypedCDPConnection }> {
  const target = selectPageTarget(await listTargets(browser), options);
  const page = await attachToTarget(browser, target.id);
  return { target, page };
}
