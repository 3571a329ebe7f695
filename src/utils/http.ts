import { CDP_HTTP_TIMEOUT_MS, DEFAULT_CDP_PORT, HTTP_LOCALHOST } from '@/constants.js';
import type { BrowserVersionInfo } from '@/types.js';
import { createLogger } from '@/ui/logging/index.js';

const log = createLogger('http');

/**
 * Remote-debugging endpoint coordinates.
 */
export interface DebugEndpoint {
  host?: string;
  port?: number;
}

/**
 * Failure of an HTTP discovery request, with the URL that was requested.
 */
export class DiscoveryRequestError extends Error {
  constructor(
    message: string,
    readonly url: string,
    options: { cause?: unknown } = {}
  ) {
    super(message, options);
    this.name = 'DiscoveryRequestError';
  }
}

/**
 * Base URL of the HTTP discovery endpoint.
 *
 * @example
 * ```typescript
 * endpointUrl({ port: 9333 }); // 'http://127.0.0.1:9333'
 * endpointUrl({ host: '[::1]', port: 9222 }); // 'http://[::1]:9222'
 * ```
 */
export function endpointUrl({
  host = HTTP_LOCALHOST,
  port = DEFAULT_CDP_PORT,
}: DebugEndpoint = {}): string {
  return `http://${host}:${port}`;
}

/**
 * GET a JSON document with a bounded wait.
 *
 * @throws DiscoveryRequestError on timeout, network failure, non-2xx status or invalid JSON
 */
async function fetchJson(url: string, timeoutMs: number): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, { signal: controller.signal });
    if (!response.ok) {
      throw new DiscoveryRequestError(`HTTP ${response.status} ${response.statusText}`, url);
    }
    return (await response.json()) as unknown;
  } catch (error) {
    if (error instanceof DiscoveryRequestError) {
      throw error;
    }
    if (error instanceof Error && error.name === 'AbortError') {
      throw new DiscoveryRequestError(`No response after ${timeoutMs}ms`, url, { cause: error });
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new DiscoveryRequestError(reason, url, { cause: error });
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Fetch /json/version, the browser-level discovery document.
 *
 * @returns Version info; `webSocketDebuggerUrl` is guaranteed non-empty
 * @throws DiscoveryRequestError if the request fails or the document lacks a WebSocket URL
 */
export async function fetchBrowserVersion(
  endpoint: DebugEndpoint = {},
  timeoutMs = CDP_HTTP_TIMEOUT_MS
): Promise<BrowserVersionInfo> {
  const url = `${endpointUrl(endpoint)}/json/version`;
  const body = await fetchJson(url, timeoutMs);

  if (typeof body !== 'object' || body === null) {
    throw new DiscoveryRequestError('Discovery response is not a JSON object', url);
  }

  const wsUrl = readString(body, 'webSocketDebuggerUrl');
  if (!wsUrl) {
    throw new DiscoveryRequestError('Discovery response has no webSocketDebuggerUrl', url);
  }

  log.debug(`Discovered ${readString(body, 'Browser') || 'browser'} at ${wsUrl}`);
  return {
    Browser: readString(body, 'Browser'),
    'Protocol-Version': readString(body, 'Protocol-Version'),
    webSocketDebuggerUrl: wsUrl,
  };
}

function readString(source: object, key: string): string {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : '';
}
