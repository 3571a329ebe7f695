/**
 * Attaching to a running browser.
 *
 * Discovery goes through the HTTP endpoint (/json/version); everything after
 * that travels over the single browser-level WebSocket.
 */

import { CDPConnection, type WebSocketFactory } from '@/connection/cdp.js';
import { TypedCDPConnection } from '@/connection/typed-cdp.js';
import type { BrowserVersionInfo, Logger } from '@/types.js';
import { createLogger } from '@/ui/logging/index.js';
import { connectionHints } from '@/ui/messages/capture.js';
import { CDPConnectionError } from '@/utils/errors.js';
import { type DebugEndpoint, endpointUrl, fetchBrowserVersion } from '@/utils/http.js';

/**
 * Live browser-level connection.
 */
export interface BrowserConnection {
  cdp: CDPConnection;
  browser: TypedCDPConnection;
  version: BrowserVersionInfo;
}

export interface ConnectToBrowserOptions {
  /** WebSocket open timeout */
  timeout?: number;
  onDisconnect?: ((code: number, reason: string) => void) | undefined;
  createWebSocket?: WebSocketFactory;
  logger?: Logger;
}

/**
 * Discover the browser WebSocket and open it. A single bounded attempt.
 *
 * @throws CDPConnectionError with remediation hints when nothing answers on
 *   the endpoint or the discovery document is unusable
 * @throws CDPTimeoutError when the WebSocket does not open in time
 */
export async function connectToBrowser(
  endpoint: Required<DebugEndpoint>,
  options: ConnectToBrowserOptions = {}
): Promise<BrowserConnection> {
  const log = options.logger ?? createLogger('cdp');

  let version: BrowserVersionInfo;
  try {
    version = await fetchBrowserVersion(endpoint);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CDPConnectionError(
      `Cannot reach the remote-debugging endpoint at ${endpointUrl(endpoint)}: ${reason}`,
      { cause: error, suggestions: connectionHints(endpoint.port) }
    );
  }

  log.debug(`Browser: ${version.Browser} (protocol ${version['Protocol-Version']})`);

  const cdp = new CDPConnection({
    ...(options.createWebSocket ? { createWebSocket: options.createWebSocket } : {}),
    logger: log,
  });
  await cdp.connect(version.webSocketDebuggerUrl, {
    ...(options.timeout !== undefined ? { timeout: options.timeout } : {}),
    onDisconnect: options.onDisconnect,
  });

  return { cdp, browser: new TypedCDPConnection(cdp), version };
}

/**
 * Evaluate an expression in a page and return its value.
 *
 * @throws Error carrying the exception text if the expression throws
 */
export async function evaluateValue(
  page: TypedCDPConnection,
  expression: string,
  options: { userGesture?: boolean } = {}
): Promise<unknown> {
  const response = await page.send('Runtime.evaluate', {
    expression,
    returnByValue: true,
    awaitPromise: true,
    ...(options.userGesture ? { userGesture: true } : {}),
  });

  if (response.exceptionDetails) {
    const details = response.exceptionDetails;
    throw new Error(details.exception?.description ?? details.text);
  }

  const value: unknown = response.result.value;
  return value;
}
