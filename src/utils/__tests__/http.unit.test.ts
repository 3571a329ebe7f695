import assert from 'node:assert/strict';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { DiscoveryRequestError, endpointUrl, fetchBrowserVersion } from '../http.js';

const WS_URL = 'ws://127.0.0.1:9222/devtools/browser/7f3e';

describe('endpointUrl', () => {
  it('should default to the loopback address and port 9222', () => {
    assert.equal(endpointUrl(), 'http://127.0.0.1:9222');
  });

  it('should use the given host and port', () => {
    assert.equal(endpointUrl({ host: '[::1]', port: 9333 }), 'http://[::1]:9333');
  });
});

describe('fetchBrowserVersion', () => {
  let originalFetch: typeof fetch;
  let requested: string[];

  const respondWith = (response: () => Response): void => {
    global.fetch = (input: string | URL | Request): Promise<Response> => {
      requested.push(String(input));
      return Promise.resolve(response());
    };
  };

  beforeEach(() => {
    originalFetch = global.fetch;
    requested = [];
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  it('should read the discovery document', async () => {
    respondWith(
      () =>
        new Response(
          JSON.stringify({
            Browser: 'Chrome/126.0.6478.126',
            'Protocol-Version': '1.3',
            'User-Agent': 'Mozilla/5.0',
            webSocketDebuggerUrl: WS_URL,
          })
        )
    );

    const version = await fetchBrowserVersion({ port: 9222 });

    assert.deepEqual(requested, ['http://127.0.0.1:9222/json/version']);
    assert.deepEqual(version, {
      Browser: 'Chrome/126.0.6478.126',
      'Protocol-Version': '1.3',
      webSocketDebuggerUrl: WS_URL,
    });
  });

  it('should reject a document without a WebSocket URL', async () => {
    respondWith(() => new Response(JSON.stringify({ Browser: 'Chrome/126.0', webSocketDebuggerUrl: '' })));

    await assert.rejects(fetchBrowserVersion(), (error: unknown) => {
      assert.ok(error instanceof DiscoveryRequestError);
      assert.equal(error.message, 'Discovery response has no webSocketDebuggerUrl');
      assert.equal(error.url, 'http://127.0.0.1:9222/json/version');
      return true;
    });
  });

  it('should reject a body that is not a JSON object', async () => {
    respondWith(() => new Response('null'));

    await assert.rejects(fetchBrowserVersion(), { message: 'Discovery response is not a JSON object' });
  });

  it('should reject invalid JSON', async () => {
    respondWith(() => new Response('<html>'));

    await assert.rejects(fetchBrowserVersion(), DiscoveryRequestError);
  });

  it('should report the status of a failed request', async () => {
    respondWith(() => new Response('', { status: 404, statusText: 'Not Found' }));

    await assert.rejects(fetchBrowserVersion(), { message: 'HTTP 404 Not Found' });
  });

  it('should give up after the timeout', async () => {
    global.fetch = (_input: string | URL | Request, init?: RequestInit): Promise<Response> =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new DOMException('aborted', 'AbortError')));
      });

    await assert.rejects(fetchBrowserVersion({}, 20), {
      name: 'DiscoveryRequestError',
      message: 'No response after 20ms',
    });
  });
});
