/**
 * FakeWebSocket - WebSocket boundary fake for testing
 *
 * Mimics the part of the `ws` API that CDPConnection uses, so the transport
 * can be contract-tested without network I/O.
 *
 * - readyState, send, ping, close
 * - Events: open, message, close, error, pong
 * - simulate* methods drive the socket from tests
 * - onSend lets a test answer commands as they are sent
 */

import { EventEmitter } from 'node:events';

// ws library readyState constants
export const CONNECTING = 0;
export const OPEN = 1;
export const CLOSING = 2;
export const CLOSED = 3;

type ReadyState = typeof CONNECTING | typeof OPEN | typeof CLOSING | typeof CLOSED;

export class FakeWebSocket extends EventEmitter {
  public readyState: ReadyState = CONNECTING;

  /** Called with every frame accepted by send() */
  public onSend: ((data: string) => void) | null = null;

  private sentMessages: string[] = [];
  private pingSentCount = 0;
  private closeCode: number | null = null;
  private closeReason: string | null = null;

  static readonly CONNECTING = CONNECTING;
  static readonly OPEN = OPEN;
  static readonly CLOSING = CLOSING;
  static readonly CLOSED = CLOSED;

  /**
   * ws API - Send a message. Throws if the connection is not OPEN.
   */
  send(data: string): void {
    if (this.readyState !== OPEN) {
      throw new Error('WebSocket is not open: readyState ' + this.readyState);
    }
    this.sentMessages.push(data);
    this.onSend?.(data);
  }

  /**
   * ws API - Send a ping frame
   */
  ping(): void {
    if (this.readyState === OPEN) {
      this.pingSentCount++;
    }
  }

  /**
   * ws API - Close connection. Immediate OPEN -> CLOSED with a 'close' event.
   */
  close(code?: number, reason?: string): void {
    if (this.readyState === CLOSED || this.readyState === CLOSING) {
      return;
    }
    this.readyState = CLOSED;
    this.closeCode = code ?? null;
    this.closeReason = reason ?? null;
    this.emit('close', code ?? 1000, Buffer.from(reason ?? ''));
  }

  /**
   * TEST CONTROL - CONNECTING -> OPEN, emits 'open'
   */
  simulateOpen(): void {
    if (this.readyState !== CONNECTING) {
      throw new Error('Can only open from CONNECTING state');
    }
    this.readyState = OPEN;
    this.emit('open');
  }

  /**
   * TEST CONTROL - Receive a frame. Objects are serialized as JSON.
   */
  simulateMessage(data: string | Buffer | object): void {
    if (this.readyState !== OPEN) {
      throw new Error('Cannot receive message when not OPEN');
    }
    const frame = typeof data === 'string' || Buffer.isBuffer(data) ? data : JSON.stringify(data);
    this.emit('message', frame);
  }

  /**
   * TEST CONTROL - Peer closes the connection
   */
  simulateClose(code: number, reason: string): void {
    if (this.readyState === CLOSED) {
      return;
    }
    this.readyState = CLOSED;
    this.closeCode = code;
    this.closeReason = reason;
    this.emit('close', code, Buffer.from(reason));
  }

  /**
   * TEST CONTROL - Emit 'error'
   */
  simulateError(error: Error): void {
    this.emit('error', error);
  }

  /**
   * TEST CONTROL - Receive a pong frame
   */
  simulatePong(): void {
    this.emit('pong');
  }

  /**
   * VERIFICATION - Sent frames (copy)
   */
  getSentMessages(): string[] {
    return [...this.sentMessages];
  }

  /**
   * VERIFICATION - Sent frames parsed as JSON
   */
  getSentCommands(): Array<{ id: number; method: string; params: Record<string, unknown>; sessionId?: string }> {
    return this.sentMessages.map((frame) => JSON.parse(frame));
  }

  getPingSent(): number {
    return this.pingSentCount;
  }

  getCloseCode(): number | null {
    return this.closeCode;
  }

  getCloseReason(): string | null {
    return this.closeReason;
  }
}
