import { CaptureLog } from '@/capture/CaptureLog.js';
import { buildMessages, buildScanExpression, parseScanResult } from '@/capture/extractor.js';
import type {
  CaptureState,
  CaptureSummary,
  CapturedMessage,
  ScanResult,
  StopReason,
} from '@/capture/types.js';
import type { ChatCapConfig } from '@/config/types.js';
import {
  type BrowserConnection,
  type ConnectToBrowserOptions,
  connectToBrowser,
  evaluateValue,
} from '@/connection/browser.js';
import { navigateAndWait, openChatPage } from '@/connection/targets.js';
import type { TypedCDPConnection } from '@/connection/typed-cdp.js';
import type { CDPTarget, Logger } from '@/types.js';
import { createLogger } from '@/ui/logging/index.js';
import {
  CAPTURE_DECLINED_MESSAGE,
  CONNECTION_LOST_MESSAGE,
  NAVIGATE_PROMPT,
  READY_PROMPT,
  baselineSkippedMessage,
  capturedMessageLine,
  capturingMessage,
  formatCaptureSummary,
  scanFailedMessage,
  selectedPageMessage,
} from '@/ui/messages/capture.js';
import type { Confirm } from '@/ui/prompt.js';
import { CDPConnectionError, ScanError, getErrorMessage } from '@/utils/errors.js';
import { sleep } from '@/utils/sleep.js';

const INVALID_TRANSITION_ERROR = (from: CaptureState, to: CaptureState): string =>
  `Invalid capture state transition: ${from} -> ${to}`;

const ALLOWED_TRANSITIONS: Record<CaptureState, readonly CaptureState[]> = {
  disconnected: ['attached', 'stopped'],
  attached: ['ready', 'stopped'],
  ready: ['capturing', 'stopped'],
  capturing: ['stopped'],
  stopped: [],
};

export interface CaptureSessionOptions {
  config: ChatCapConfig;
  /** Navigate to the configured URL; undefined asks the operator */
  autoNavigate?: boolean | undefined;
  /** Start without the "ready to capture?" prompt */
  autoStart?: boolean;
}

/**
 * Collaborators, injectable for tests.
 */
export interface CaptureSessionDeps {
  connect?: (
    endpoint: { host: string; port: number },
    options: ConnectToBrowserOptions
  ) => Promise<BrowserConnection>;
  confirm?: Confirm;
  log?: CaptureLog;
  logger?: Logger;
  now?: () => Date;
}

/**
 * One capture run against a chat page.
 *
 * disconnected → attached (connect) → ready (selectPage + prepare) →
 * capturing (run) → stopped. Every message id is written at most once per
 * session; nothing is written after stop.
 */
export class CaptureSession {
  private currentState: CaptureState = 'disconnected';
  private connection: BrowserConnection | null = null;
  private page: TypedCDPConnection | null = null;
  private pageTarget: CDPTarget | null = null;
  private detachHandlerId: number | null = null;

  private readonly seen = new Set<string>();
  private readonly wake = new AbortController();
  private stopReason: StopReason | null = null;
  private startedAt = 0;
  private readonly summary: CaptureSummary = {
    written: { user: 0, ai: 0 },
    scans: 0,
    failedScans: 0,
    heldScans: 0,
    stopReason: 'aborted',
  };

  private readonly config: ChatCapConfig;
  private readonly scanExpression: string;
  private readonly connectFn: NonNullable<CaptureSessionDeps['connect']>;
  private readonly confirm: Confirm;
  private readonly output: CaptureLog;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly options: CaptureSessionOptions,
    deps: CaptureSessionDeps = {}
  ) {
    this.config = options.config;
    this.scanExpression = buildScanExpression(options.config.selectors);
    this.connectFn = deps.connect ?? connectToBrowser;
    this.confirm = deps.confirm ?? (() => Promise.resolve(true));
    this.output = deps.log ?? new CaptureLog(options.config.output);
    this.logger = deps.logger ?? createLogger('capture');
    this.now = deps.now ?? (() => new Date());
  }

  get state(): CaptureState {
    return this.currentState;
  }

  /**
   * Identifiers written so far.
   */
  get seenIds(): ReadonlySet<string> {
    return this.seen;
  }

  get selectedTarget(): CDPTarget | null {
    return this.pageTarget;
  }

  private transition(to: CaptureState): void {
    if (!ALLOWED_TRANSITIONS[this.currentState].includes(to)) {
      throw new Error(INVALID_TRANSITION_ERROR(this.currentState, to));
    }
    this.logger.debug(`State: ${this.currentState} -> ${to}`);
    this.currentState = to;
  }

  /**
   * Attach to the browser's debugging endpoint.
   *
   * @throws CDPConnectionError or CDPTimeoutError; no retry
   */
  async connect(): Promise<void> {
    if (this.currentState !== 'disconnected') {
      throw new Error(INVALID_TRANSITION_ERROR(this.currentState, 'attached'));
    }
    this.connection = await this.connectFn(
      { host: this.config.host, port: this.config.port },
      { onDisconnect: () => this.handleConnectionLost() }
    );
    this.transition('attached');
  }

  /**
   * Choose the chat page and attach a flattened session to it.
   *
   * @throws NoPageError when the browser has no candidate page
   */
  async selectPage(): Promise<CDPTarget> {
    const connection = this.requireConnection('attached');
    const { target, page } = await openChatPage(connection.browser, {
      targetUrl: this.config.targetUrl,
      chatUrlHints: this.config.chatUrlHints,
    });

    this.page = page;
    this.pageTarget = target;
    this.detachHandlerId = connection.browser.on('Target.detachedFromTarget', (event) => {
      if (event.sessionId === this.page?.session) {
        this.logger.info('The chat page was closed');
        this.handleConnectionLost();
      }
    });
    this.logger.info(selectedPageMessage(target.url, target.title));
    return target;
  }

  /**
   * Optionally navigate to the configured chat URL, then mark the session ready.
   */
  async prepare(): Promise<void> {
    const page = this.requirePage('attached');
    const { targetUrl } = this.config;

    if (targetUrl && this.pageTarget?.url !== targetUrl) {
      const navigate = this.options.autoNavigate ?? (await this.confirm(NAVIGATE_PROMPT(targetUrl)));
      if (navigate) {
        this.logger.info(`Navigating to ${targetUrl}`);
        await navigateAndWait(page, targetUrl);
      }
    }

    this.transition('ready');
  }

  /**
   * Run the scan loop until `signal` aborts or the connection is lost.
   *
   * @returns Counters for the session; the session is stopped afterwards
   */
  async run(signal?: AbortSignal): Promise<CaptureSummary> {
    this.requirePage('ready');
    const onAbort = (): void => this.stop('signal');
    if (signal?.aborted) {
      onAbort();
      return this.summary;
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const start = this.options.autoStart || (await this.confirm(READY_PROMPT));
      if (this.isStopped()) {
        return this.summary;
      }
      if (!start) {
        this.logger.info(CAPTURE_DECLINED_MESSAGE);
        this.stop('aborted');
        return this.summary;
      }

      this.transition('capturing');
      this.startedAt = Date.now();
      this.logger.info(capturingMessage(this.output.filePath, this.config.intervalMs));

      if (this.config.baseline === 'skip') {
        await this.seedBaseline();
      }

      while (!this.isStopped()) {
        await this.scanOnce();
        if (this.isStopped()) break;
        await sleep(this.config.intervalMs, this.wake.signal);
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      this.stop(this.stopReason ?? 'aborted');
    }

    this.logger.info(formatCaptureSummary(this.summary, Date.now() - this.startedAt, this.output.filePath));
    return this.summary;
  }

  /**
   * One scan: read the page, append unseen messages, remember their ids.
   *
   * A failing scan is logged and counted; connection loss stops the session.
   *
   * @throws OutputFileError if the log cannot be written
   */
  private async scanOnce(): Promise<void> {
    if (this.currentState !== 'capturing') return;
    this.summary.scans++;

    let scan: ScanResult;
    try {
      scan = await this.readPage();
    } catch (error) {
      if (error instanceof CDPConnectionError) {
        this.handleConnectionLost();
        return;
      }
      const scanError =
        error instanceof ScanError ? error : new ScanError(getErrorMessage(error), { cause: error });
      this.summary.failedScans++;
      this.logger.info(scanFailedMessage(this.summary.scans, scanError.message));
      return;
    }

    const holdAi = this.config.holdWhileStreaming && scan.streaming;
    if (holdAi) {
      this.summary.heldScans++;
      this.logger.debug('Reply still streaming; assistant messages held');
    }

    const fresh = this.unseen(
      buildMessages(scan, { boilerplate: this.config.boilerplate, holdAi, capturedAt: this.now() })
    );
    if (fresh.length === 0 || this.isStopped()) return;

    await this.output.append(...fresh);
    for (const message of fresh) {
      this.seen.add(message.message_id);
      this.summary.written[message.type]++;
      this.logger.debug(capturedMessageLine(message.type, message.message_id));
    }
  }

  /**
   * Move to stopped and close the connection. Safe to call more than once.
   */
  stop(reason: StopReason = 'aborted'): void {
    if (this.currentState === 'stopped') return;
    this.stopReason ??= reason;
    this.summary.stopReason = this.stopReason;
    this.transition('stopped');
    this.wake.abort();

    const connection = this.connection;
    if (connection && this.detachHandlerId !== null) {
      connection.browser.off('Target.detachedFromTarget', this.detachHandlerId);
    }
    this.connection = null;
    this.page = null;
    connection?.cdp.close();
  }

  private async seedBaseline(): Promise<void> {
    try {
      const scan = await this.readPage();
      const existing = this.unseen(buildMessages(scan, { boilerplate: this.config.boilerplate }));
      existing.forEach((message) => this.seen.add(message.message_id));
      this.logger.info(baselineSkippedMessage(existing.length));
    } catch (error) {
      if (error instanceof CDPConnectionError) {
        this.handleConnectionLost();
        return;
      }
      this.logger.info(`Baseline scan failed: ${getErrorMessage(error)}`);
    }
  }

  private async readPage(): Promise<ScanResult> {
    const page = this.page;
    if (!page) {
      throw new CDPConnectionError('No page attached');
    }
    return parseScanResult(await evaluateValue(page, this.scanExpression));
  }

  /**
   * Records whose id is neither in the seen-set nor earlier in the batch.
   */
  private unseen(messages: CapturedMessage[]): CapturedMessage[] {
    const batch = new Set<string>();
    return messages.filter((message) => {
      if (this.seen.has(message.message_id) || batch.has(message.message_id)) return false;
      batch.add(message.message_id);
      return true;
    });
  }

  private handleConnectionLost(): void {
    if (this.isStopped()) return;
    this.logger.info(CONNECTION_LOST_MESSAGE);
    this.stop('connection-lost');
  }

  private isStopped(): boolean {
    return this.currentState === 'stopped';
  }

  private requireConnection(expected: CaptureState): BrowserConnection {
    if (this.currentState !== expected || !this.connection) {
      throw new Error(`Capture session is ${this.currentState}, expected ${expected}`);
    }
    return this.connection;
  }

  private requirePage(expected: CaptureState): TypedCDPConnection {
    this.requireConnection(expected);
    if (!this.page) {
      throw new Error('No chat page selected');
    }
    return this.page;
  }
}
