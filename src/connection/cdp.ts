import WebSocket from 'ws';

import {
  CDP_COMMAND_TIMEOUT_MS,
  CDP_CONNECTION_TIMEOUT_MS,
  CDP_KEEPALIVE_INTERVAL,
  CDP_MAX_MISSED_PONGS,
  UTF8_ENCODING,
  WEBSOCKET_MAX_PAYLOAD,
  WEBSOCKET_NO_PONG_CLOSURE,
  WEBSOCKET_NORMAL_CLOSURE,
} from '@/constants.js';
import type { CDPMessage, ConnectionOptions, Logger } from '@/types.js';
import { createLogger } from '@/ui/logging/index.js';
import { CDPConnectionError, CDPTimeoutError, getErrorMessage } from '@/utils/errors.js';

// Error Messages
const CONNECTION_TIMEOUT_ERROR = (url: string, timeout: number): string =>
  `Timed out after ${timeout}ms opening ${url}`;
const CONNECTION_FAILED_ERROR = (url: string, reason: string): string =>
  `Could not open ${url}: ${reason}`;
const WEBSOCKET_CLOSED_ERROR = (code: number, reason: string): string =>
  `WebSocket closed: ${code}${reason ? ` - ${reason}` : ''}`;
const NOT_CONNECTED_ERROR = 'Not connected to browser';
const CONNECTION_CLOSED_ERROR = 'Connection closed';
const NO_PONG_RECEIVED_REASON = 'No pong received';
const NORMAL_CLOSURE_REASON = 'Normal closure';
const COMMAND_TIMEOUT_ERROR = (method: string, timeout: number): string =>
  `Command timeout after ${timeout}ms: ${method}`;

/**
 * Factory for WebSocket instances.
 *
 * Tests inject a FakeWebSocket; production uses the `ws` client.
 */
export type WebSocketFactory = (url: string) => WebSocket;

/**
 * Event handler. `sessionId` identifies the attached target that emitted the
 * event and is undefined for browser-level events.
 */
export type CDPEventHandler<T = unknown> = (params: T, sessionId: string | undefined) => void;

interface PendingCommand {
  method: string;
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  timeout: NodeJS.Timeout;
}

const defaultWebSocketFactory: WebSocketFactory = (url) =>
  new WebSocket(url, { maxPayload: WEBSOCKET_MAX_PAYLOAD });

/**
 * Chrome DevTools Protocol WebSocket connection.
 *
 * One socket to the browser endpoint; page commands are routed through
 * flattened target sessions via the `sessionId` argument of {@link send}.
 *
 * A closed socket is final: there is no reconnection. Pending commands are
 * rejected with {@link CDPConnectionError} and `onDisconnect` fires once, so
 * the capture loop can stop.
 */
export class CDPConnection {
  private ws: WebSocket | null = null;
  private messageId = 0;
  private readonly pending = new Map<number, PendingCommand>();
  private nextHandlerId = 0;
  private readonly eventHandlers = new Map<string, Map<number, CDPEventHandler>>();

  private pingInterval: NodeJS.Timeout | null = null;
  private missedPongs = 0;

  private intentionallyClosed = false;
  private onDisconnect: ConnectionOptions['onDisconnect'];

  private readonly createWebSocket: WebSocketFactory;
  private readonly logger: Logger;
  private readonly commandTimeout: number;

  constructor(
    options: {
      createWebSocket?: WebSocketFactory;
      logger?: Logger;
      commandTimeout?: number;
    } = {}
  ) {
    this.createWebSocket = options.createWebSocket ?? defaultWebSocketFactory;
    this.logger = options.logger ?? createLogger('cdp');
    this.commandTimeout = options.commandTimeout ?? CDP_COMMAND_TIMEOUT_MS;
  }

  /**
   * Open the WebSocket. A single attempt bounded by `options.timeout`.
   *
   * @param wsUrl - Browser WebSocket debugger URL from /json/version
   * @param options - Connection options
   * @throws CDPTimeoutError if the socket does not open in time
   * @throws CDPConnectionError if the socket errors or closes before opening
   */
  connect(wsUrl: string, options: ConnectionOptions = {}): Promise<void> {
    const timeout = options.timeout ?? CDP_CONNECTION_TIMEOUT_MS;
    this.intentionallyClosed = false;
    this.onDisconnect = options.onDisconnect;

    return new Promise((resolve, reject) => {
      const ws = this.createWebSocket(wsUrl);
      this.ws = ws;
      let settled = false;

      const connectTimeout = setTimeout(() => {
        if (settled) return;
        settled = true;
        reject(new CDPTimeoutError(CONNECTION_TIMEOUT_ERROR(wsUrl, timeout)));
        ws.close();
      }, timeout);

      ws.on('open', () => {
        if (settled) return;
        settled = true;
        clearTimeout(connectTimeout);
        this.missedPongs = 0;
        this.startKeepalive(options.keepaliveInterval ?? CDP_KEEPALIVE_INTERVAL);
        this.logger.debug(`Connected to ${wsUrl}`);
        resolve();
      });

      ws.on('error', (error: Error) => {
        this.logger.debug(`WebSocket error: ${error.message}`);
        if (settled) return;
        settled = true;
        clearTimeout(connectTimeout);
        reject(new CDPConnectionError(CONNECTION_FAILED_ERROR(wsUrl, error.message), { cause: error }));
      });

      ws.on('close', (code: number, reason: Buffer | string) => {
        const reasonText = reason.toString();
        if (!settled) {
          settled = true;
          clearTimeout(connectTimeout);
          reject(new CDPConnectionError(CONNECTION_FAILED_ERROR(wsUrl, WEBSOCKET_CLOSED_ERROR(code, reasonText))));
        }
        this.handleClose(code, reasonText);
      });

      ws.on('pong', () => {
        this.missedPongs = 0;
      });

      ws.on('message', (data: WebSocket.RawData | string) => {
        this.handleMessage(data);
      });
    });
  }

  private handleClose(code: number, reason: string): void {
    this.stopKeepalive();
    this.ws = null;

    if (this.intentionallyClosed) {
      return;
    }

    const message = WEBSOCKET_CLOSED_ERROR(code, reason);
    this.logger.debug(message);
    this.rejectPending(new CDPConnectionError(message));

    const onDisconnect = this.onDisconnect;
    this.onDisconnect = undefined;
    onDisconnect?.(code, reason);
  }

  /**
   * Parse and route an incoming frame. Malformed frames are logged and dropped.
   */
  private handleMessage(data: WebSocket.RawData | string): void {
    let message: CDPMessage;
    try {
      const parsed: unknown = JSON.parse(rawDataToString(data));
      if (!isCDPMessage(parsed)) {
        throw new Error('CDP message must be an object');
      }
      message = parsed;
    } catch (error) {
      this.logger.debug(`Dropping malformed CDP message: ${getErrorMessage(error)}`);
      return;
    }

    if (message.id !== undefined) {
      this.resolvePending(message);
    }
    if (message.method) {
      this.dispatchEvent(message.method, message.params, message.sessionId);
    }
  }

  private resolvePending(message: CDPMessage): void {
    if (message.id === undefined) return;
    const command = this.pending.get(message.id);
    if (!command) return;

    this.pending.delete(message.id);
    clearTimeout(command.timeout);
    if (message.error) {
      command.reject(new Error(`${command.method}: ${message.error.message}`));
    } else {
      command.resolve(message.result);
    }
  }

  private dispatchEvent(method: string, params: unknown, sessionId: string | undefined): void {
    const handlers = this.eventHandlers.get(method);
    if (!handlers) return;
    for (const handler of handlers.values()) {
      handler(params, sessionId);
    }
  }

  private rejectPending(error: Error): void {
    for (const command of this.pending.values()) {
      clearTimeout(command.timeout);
      command.reject(error);
    }
    this.pending.clear();
  }

  /**
   * Ping on an interval; close the socket after CDP_MAX_MISSED_PONGS
   * unanswered pings so that a silently dead browser ends the session.
   */
  private startKeepalive(interval: number): void {
    this.stopKeepalive();
    this.pingInterval = setInterval(() => {
      const ws = this.ws;
      if (!ws || ws.readyState !== WebSocket.OPEN) return;

      this.missedPongs++;
      if (this.missedPongs >= CDP_MAX_MISSED_PONGS) {
        this.logger.info('Connection lost: no pong received');
        ws.close(WEBSOCKET_NO_PONG_CLOSURE, NO_PONG_RECEIVED_REASON);
        return;
      }
      ws.ping();
    }, interval);
  }

  private stopKeepalive(): void {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
  }

  /**
   * Send a CDP command and wait for its result.
   *
   * @param method - CDP method name (e.g., 'Target.getTargets')
   * @param params - Method parameters
   * @param sessionId - Flattened target session for page-level commands
   * @returns The command result
   * @throws CDPConnectionError if not connected or the socket closes first
   * @throws CDPTimeoutError if no response arrives in time
   */
  send(method: string, params: Record<string, unknown> = {}, sessionId?: string): Promise<unknown> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new CDPConnectionError(NOT_CONNECTED_ERROR));
    }

    const id = ++this.messageId;
    const message: CDPMessage = { id, method, params };
    if (sessionId) {
      message.sessionId = sessionId;
    }

    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.pending.delete(id);
        reject(new CDPTimeoutError(COMMAND_TIMEOUT_ERROR(method, this.commandTimeout)));
      }, this.commandTimeout);

      this.pending.set(id, { method, resolve, reject, timeout });

      try {
        ws.send(JSON.stringify(message));
      } catch (error) {
        clearTimeout(timeout);
        this.pending.delete(id);
        reject(new CDPConnectionError(getErrorMessage(error), { cause: error }));
      }
    });
  }

  /**
   * Register an event handler.
   *
   * @returns Handler ID for {@link off}
   */
  on<T = unknown>(event: string, handler: CDPEventHandler<T>): number {
    let handlers = this.eventHandlers.get(event);
    if (!handlers) {
      handlers = new Map();
      this.eventHandlers.set(event, handlers);
    }
    const handlerId = ++this.nextHandlerId;
    handlers.set(handlerId, (params, sessionId) => handler(params as T, sessionId));
    return handlerId;
  }

  off(event: string, handlerId: number): void {
    const handlers = this.eventHandlers.get(event);
    if (!handlers) return;
    handlers.delete(handlerId);
    if (handlers.size === 0) {
      this.eventHandlers.delete(event);
    }
  }

  /**
   * Close the socket and release everything. Safe to call more than once.
   */
  close(code = WEBSOCKET_NORMAL_CLOSURE, reason = NORMAL_CLOSURE_REASON): void {
    this.intentionallyClosed = true;
    this.onDisconnect = undefined;
    this.stopKeepalive();
    this.rejectPending(new CDPConnectionError(CONNECTION_CLOSED_ERROR));

    const ws = this.ws;
    this.ws = null;
    ws?.close(code, reason);
    this.eventHandlers.clear();
  }

  isConnected(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }
}

function isCDPMessage(value: unknown): value is CDPMessage {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function rawDataToString(data: WebSocket.RawData | string): string {
  if (typeof data === 'string') {
    return data;
  }
  if (Buffer.isBuffer(data)) {
    return data.toString(UTF8_ENCODING);
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString(UTF8_ENCODING);
  }
  return Buffer.from(data).toString(UTF8_ENCODING);
}
