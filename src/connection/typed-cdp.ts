/**
 * Type-safe CDP Connection Wrapper
 *
 * Compile-time checked parameters and results for Chrome DevTools Protocol
 * methods, using the official definitions from the devtools-protocol package.
 * A wrapper may be bound to a flattened target session, in which case every
 * command is routed to that page and only that page's events are delivered.
 */

import type { CDPConnection } from './cdp.js';
import type { Protocol } from 'devtools-protocol/types/protocol.js';
import type { ProtocolMapping } from 'devtools-protocol/types/protocol-mapping.js';

/**
 * Extract parameter type from a CDP command.
 *
 * If command has no parameters, returns empty object type.
 * If command has a single (possibly optional) parameter, returns its type.
 */
type CommandParams<T extends keyof ProtocolMapping.Commands> =
  ProtocolMapping.Commands[T]['paramsType'] extends []
    ? Record<string, never>
    : ProtocolMapping.Commands[T]['paramsType'] extends [(infer P)?]
      ? Exclude<P, undefined>
      : never;

/**
 * Extract return type from a CDP command.
 */
type CommandReturn<T extends keyof ProtocolMapping.Commands> =
  ProtocolMapping.Commands[T]['returnType'];

type EventParams<T extends keyof ProtocolMapping.Events> = ProtocolMapping.Events[T] extends [
  infer P,
]
  ? P
  : ProtocolMapping.Events[T] extends []
    ? void
    : never;

/**
 * Type-safe wrapper around CDPConnection.
 *
 * @example
 * ```typescript
 * const browser = new TypedCDPConnection(cdp);
 * const { sessionId } = await browser.send('Target.attachToTarget', { targetId, flatten: true });
 *
 * const page = browser.forSession(sessionId);
 * const { result } = await page.send('Runtime.evaluate', {
 *   expression: 'document.readyState',
 *   returnByValue: true,
 * });
 * ```
 */
export class TypedCDPConnection {
  constructor(
    private readonly cdp: CDPConnection,
    private readonly sessionId?: string
  ) {}

  /**
   * Send a type-safe CDP command, routed to the bound session if any.
   */
  async send<T extends keyof ProtocolMapping.Commands>(
    method: T,
    params: CommandParams<T>
  ): Promise<CommandReturn<T>> {
    const result = await this.cdp.send(method, params as Record<string, unknown>, this.sessionId);
    return result as CommandReturn<T>;
  }

  /**
   * Register a type-safe event handler.
   *
   * A session-bound wrapper ignores events from other sessions.
   *
   * @returns Handler ID for later removal
   */
  on<T extends keyof ProtocolMapping.Events>(
    event: T,
    handler: (params: EventParams<T>) => void
  ): number {
    const boundSession = this.sessionId;
    return this.cdp.on<EventParams<T>>(event, (params, sessionId) => {
      if (boundSession !== undefined && sessionId !== boundSession) return;
      handler(params);
    });
  }

  off(event: string, handlerId: number): void {
    this.cdp.off(event, handlerId);
  }

  /**
   * Wrapper sharing this socket but bound to a flattened target session.
   */
  forSession(sessionId: string): TypedCDPConnection {
    return new TypedCDPConnection(this.cdp, sessionId);
  }

  /**
   * Session this wrapper is bound to (undefined for browser-level).
   */
  get session(): string | undefined {
    return this.sessionId;
  }

  /**
   * Access underlying CDPConnection for advanced use cases.
   */
  get raw(): CDPConnection {
    return this.cdp;
  }
}

export type { Protocol };
