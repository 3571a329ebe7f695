/**
 * Connection module type definitions.
 *
 * Types for the CDP transport, the HTTP discovery endpoints and the
 * browser launcher.
 */

/**
 * Chrome DevTools Protocol message structure.
 *
 * CDP uses a JSON-RPC-like protocol over WebSocket with request/response
 * correlation via message IDs.
 */
export interface CDPMessage {
  /** Message ID for request/response correlation */
  id?: number;
  /** CDP method name (e.g., 'Runtime.evaluate') */
  method?: string;
  /** Method parameters */
  params?: Record<string, unknown>;
  /** Method result (present in responses) */
  result?: unknown;
  /** Error information (present in error responses) */
  error?: { code?: number; message: string };
  /** Session ID for commands sent to or events from a specific target */
  sessionId?: string;
}

/**
 * CDP target information, as listed by Target.getTargets.
 */
export interface CDPTarget {
  /** Target ID */
  id: string;
  /** Target type (page, worker, service_worker, etc.) */
  type: string;
  /** Page title */
  title: string;
  /** Page URL */
  url: string;
  /** WebSocket debugger URL (empty when discovered over CDP) */
  webSocketDebuggerUrl: string;
}

/**
 * Response of the /json/version discovery endpoint.
 */
export interface BrowserVersionInfo {
  Browser: string;
  'Protocol-Version': string;
  webSocketDebuggerUrl: string;
}

/**
 * Optional tuning parameters for CDPConnection.connect.
 */
export interface ConnectionOptions {
  /** Milliseconds to wait for the socket to open */
  timeout?: number;
  /** Interval between ping frames */
  keepaliveInterval?: number;
  /** Invoked once when the socket closes without close() being called */
  onDisconnect?: ((code: number, reason: string) => void) | undefined;
}

/**
 * Information about a launched browser instance.
 */
export interface LaunchedBrowser {
  /** Process ID of the browser */
  pid: number;
  /** Remote debugging port the browser listens on */
  port: number;
  /** Profile directory passed to the browser */
  userDataDir: string;
  /** Resolves with the exit code once the browser process exits */
  exited: Promise<number | null>;
  /** Terminate the browser */
  kill: () => void;
}

/**
 * Logger interface for the connection module.
 *
 * Allows injecting a silent or recording logger in tests.
 */
export interface Logger {
  /** Log informational message */
  info(message: string): void;
  /** Log debug message (only shown with debug flag) */
  debug(message: string): void;
}
