/**
 * FakeBrowser - in-process stand-in for a browser's CDP endpoint.
 *
 * Answers commands sent over a FakeWebSocket through per-method handlers and
 * hands out a real CDPConnection wired to it, shaped like connectToBrowser.
 */

import type WebSocket from 'ws';

import { FakeWebSocket } from './FakeWebSocket.js';

import type { BrowserConnection, ConnectToBrowserOptions } from '@/connection/browser.js';
import { CDPConnection } from '@/connection/cdp.js';
import { TypedCDPConnection } from '@/connection/typed-cdp.js';
import type { CDPTarget } from '@/types.js';

import { silentLogger } from './logger.js';

export type FakeCommandHandler = (
  params: Record<string, unknown>,
  sessionId: string | undefined
) => unknown;

export interface RecordedCommand {
  method: string;
  params: Record<string, unknown>;
  sessionId: string | undefined;
}

const METHOD_NOT_FOUND = -32601;
const SERVER_ERROR = -32000;
const KEEPALIVE_DISABLED_MS = 3_600_000;

/**
 * Runtime.evaluate response carrying a by-value result.
 */
export function evaluateResult(value: unknown): { result: { type: string; value: unknown } } {
  return { result: { type: value === null ? 'object' : typeof value, value } };
}

/**
 * Target.getTargets response for the given tabs.
 */
export function targetInfos(targets: readonly CDPTarget[]): { targetInfos: unknown[] } {
  return {
    targetInfos: targets.map((target) => ({
      targetId: target.id,
      type: target.type,
      title: target.title,
      url: target.url,
      attached: false,
      canAccessOpener: false,
    })),
  };
}

export class FakeBrowser {
  readonly socket = new FakeWebSocket();
  readonly commands: RecordedCommand[] = [];
  private readonly handlers = new Map<string, FakeCommandHandler>();
  private connection: CDPConnection | null = null;

  constructor() {
    this.socket.onSend = (frame) => this.answer(frame);
  }

  /**
   * Register the response for a method. A handler that throws produces a CDP error.
   */
  handle(method: string, handler: FakeCommandHandler): this {
    this.handlers.set(method, handler);
    return this;
  }

  /**
   * Expose tabs through Target.getTargets and attach each to `session-<id>`.
   */
  withTargets(targets: readonly CDPTarget[]): this {
    return this.handle('Target.getTargets', () => targetInfos(targets)).handle(
      'Target.attachToTarget',
      (params) => ({ sessionId: `session-${String(params['targetId'])}` })
    );
  }

  /**
   * Answer Page.enable and Page.navigate. A navigation commits the main frame
   * and, when `fireLoad` is set, fires the load event, both before the reply.
   */
  withNavigation(fireLoad = true): this {
    return this.handle('Page.enable', () => ({})).handle('Page.navigate', (params, sessionId) => {
      setImmediate(() => {
        if (this.socket.readyState !== FakeWebSocket.OPEN) return;
        this.emitEvent(
          'Page.frameNavigated',
          { frame: { id: 'frame-1', loaderId: 'loader-1', url: String(params['url']) }, type: 'Navigation' },
          sessionId
        );
        if (fireLoad) {
          this.emitEvent('Page.loadEventFired', { timestamp: 1 }, sessionId);
        }
      });
      return { frameId: 'frame-1', loaderId: 'loader-1' };
    });
  }

  /**
   * Commands sent for `method`, in order.
   */
  sent(method: string): RecordedCommand[] {
    return this.commands.filter((command) => command.method === method);
  }

  emitEvent(method: string, params: Record<string, unknown>, sessionId?: string): void {
    this.socket.simulateMessage({ method, params, ...(sessionId ? { sessionId } : {}) });
  }

  /**
   * Browser goes away: the socket closes without close() from the client.
   */
  disconnect(code = 1006, reason = 'Browser closed'): void {
    this.socket.simulateClose(code, reason);
  }

  /**
   * Drop-in for connectToBrowser.
   */
  connect = async (
    _endpoint: { host: string; port: number },
    options: ConnectToBrowserOptions = {}
  ): Promise<BrowserConnection> => {
    const cdp = new CDPConnection({
      createWebSocket: () => this.socket as unknown as WebSocket,
      logger: silentLogger,
      commandTimeout: 2000,
    });
    const opened = cdp.connect('ws://127.0.0.1:9222/devtools/browser/fake', {
      keepaliveInterval: KEEPALIVE_DISABLED_MS,
      onDisconnect: options.onDisconnect,
    });
    this.socket.simulateOpen();
    await opened;
    this.connection = cdp;
    return {
      cdp,
      browser: new TypedCDPConnection(cdp),
      version: {
        Browser: 'FakeChrome/1.0',
        'Protocol-Version': '1.3',
        webSocketDebuggerUrl: 'ws://127.0.0.1:9222/devtools/browser/fake',
      },
    };
  };

  /**
   * Close the client side; stops the keepalive timer.
   */
  dispose(): void {
    this.connection?.close();
    this.connection = null;
  }

  private answer(frame: string): void {
    const message: unknown = JSON.parse(frame);
    if (typeof message !== 'object' || message === null) return;
    const id = 'id' in message && typeof message.id === 'number' ? message.id : undefined;
    const method = 'method' in message && typeof message.method === 'string' ? message.method : '';
    const params: Record<string, unknown> =
      'params' in message && typeof message.params === 'object' && message.params !== null
        ? { ...message.params }
        : {};
    const sessionId =
      'sessionId' in message && typeof message.sessionId === 'string' ? message.sessionId : undefined;
    if (id === undefined) return;

    this.commands.push({ method, params, sessionId });

    const handler = this.handlers.get(method);
    let reply: object;
    if (!handler) {
      reply = { id, error: { code: METHOD_NOT_FOUND, message: `'${method}' wasn't found` } };
    } else {
      try {
        reply = { id, result: handler(params, sessionId) ?? {} };
      } catch (error) {
        reply = { id, error: { code: SERVER_ERROR, message: error instanceof Error ? error.message : String(error) } };
      }
    }

    setImmediate(() => {
      if (this.socket.readyState === FakeWebSocket.OPEN) {
        this.socket.simulateMessage({ ...reply, ...(sessionId ? { sessionId } : {}) });
      }
    });
  }
}
