import { createLogger } from '@/ui/logging/index.js';
import { FORCED_EXIT_MESSAGE, shutdownSignalMessage } from '@/ui/messages/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

const log = createLogger('chatcap');

const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

/**
 * Minimal process surface used for signal wiring, injectable for tests.
 */
export interface SignalSource {
  on(event: 'SIGINT' | 'SIGTERM', listener: () => void): unknown;
  off(event: 'SIGINT' | 'SIGTERM', listener: () => void): unknown;
  exit(code: number): void;
}

/**
 * Translates SIGINT/SIGTERM into an AbortSignal.
 *
 * The first signal aborts so the running command can stop cleanly; a second
 * one exits at once.
 */
export class SignalHandler {
  private readonly controller = new AbortController();
  private readonly listeners = new Map<string, () => void>();

  constructor(private readonly source: SignalSource = process) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Register signal handlers.
   */
  register(): AbortSignal {
    for (const name of SHUTDOWN_SIGNALS) {
      const listener = (): void => this.handleSignal(name);
      this.listeners.set(name, listener);
      this.source.on(name, listener);
    }
    return this.controller.signal;
  }

  /**
   * Unregister all signal handlers.
   */
  unregister(): void {
    for (const name of SHUTDOWN_SIGNALS) {
      const listener = this.listeners.get(name);
      if (listener) {
        this.source.off(name, listener);
      }
    }
    this.listeners.clear();
  }

  private handleSignal(name: string): void {
    if (this.controller.signal.aborted) {
      log.info(FORCED_EXIT_MESSAGE);
      this.source.exit(EXIT_CODES.SIGNAL_HANDLER_ERROR);
      return;
    }
    log.info(shutdownSignalMessage(name));
    this.controller.abort();
  }
}
