/**
 * Centralized configuration constants for chatcap.
 *
 * Timing, limits, browser flags and well-known paths. Chat-page selectors
 * live in `config/chat-profile.default.json` so they can be overridden
 * without touching code.
 */

// ============================================================================
// BROWSER & CDP CONFIGURATION
// ============================================================================

/**
 * Default browser debugging port
 */
export const DEFAULT_CDP_PORT = 9222;

/**
 * Loopback address used for the debugging endpoint unless --host is given
 */
export const HTTP_LOCALHOST = '127.0.0.1';

/**
 * chrome-launcher log level for quiet operation
 */
export const DEFAULT_CHROME_LOG_LEVEL = 'silent';

/**
 * Name of the dedicated profile directory (under ~/.chatcap)
 */
export const CHROME_PROFILE_DIR = 'chrome-profile';

/**
 * Base directory for chatcap state in the user's home
 */
export const CHATCAP_HOME_DIR = '.chatcap';

/**
 * Headless mode flag (new headless implementation)
 */
export const HEADLESS_FLAG = '--headless=new';

/**
 * Flags applied on top of chrome-launcher's defaults to keep first-run UI,
 * prompts and popups from interfering with the chat page.
 */
export const CHATCAP_CHROME_FLAGS = [
  '--no-first-run',
  '--no-default-browser-check',
  '--disable-search-engine-choice-screen',
  '--disable-session-crashed-bubble',
  '--disable-infobars',
  '--disable-notifications',
  '--disable-features=Translate',
  '--remote-allow-origins=*',
];

/**
 * Flags for containerized environments without GPU access
 */
export const DOCKER_CHROME_FLAGS = [
  '--disable-gpu',
  '--disable-dev-shm-usage',
  '--disable-software-rasterizer',
];

/**
 * Well-known browser installation paths, checked in order.
 *
 * Entries may reference environment variables as `%NAME%`; they are expanded
 * at resolution time and skipped when the variable is unset.
 */
export const WELL_KNOWN_BROWSER_PATHS: Readonly<Record<'win32' | 'darwin' | 'linux', string[]>> = {
  win32: [
    'C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe',
    'C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe',
    '%LOCALAPPDATA%\\Google\\Chrome\\Application\\chrome.exe',
    'C:\\Program Files (x86)\\Microsoft\\Edge\\Application\\msedge.exe',
    'C:\\Program Files\\Microsoft\\Edge\\Application\\msedge.exe',
  ],
  darwin: [
    '/Applications/Google Chrome.app/Contents/MacOS/Google Chrome',
    '/Applications/Chromium.app/Contents/MacOS/Chromium',
    '/Applications/Microsoft Edge.app/Contents/MacOS/Microsoft Edge',
  ],
  linux: [
    '/usr/bin/google-chrome',
    '/usr/bin/google-chrome-stable',
    '/usr/bin/chromium',
    '/usr/bin/chromium-browser',
    '/snap/bin/chromium',
    '/usr/bin/microsoft-edge',
  ],
};

/**
 * Target type for regular browser tabs
 */
export const PAGE_TARGET_TYPE = 'page';

/**
 * URL prefixes of internal pages that are never chat candidates
 */
export const INTERNAL_PAGE_PREFIXES = ['devtools://', 'chrome://', 'chrome-extension://', 'edge://'];

/**
 * Flattened sessions let page commands travel over the browser socket
 */
export const CDP_FLATTEN_SESSION_FLAG = true;

// ============================================================================
// TIMEOUTS & INTERVALS
// ============================================================================

/**
 * Timeout for the TCP probe of the debugging port
 */
export const PORT_PROBE_TIMEOUT_MS = 1000;

/**
 * Timeout for the /json/version discovery request
 */
export const CDP_HTTP_TIMEOUT_MS = 5000;

/**
 * WebSocket open timeout
 */
export const CDP_CONNECTION_TIMEOUT_MS = 10000;

/**
 * Per-command CDP timeout
 */
export const CDP_COMMAND_TIMEOUT_MS = 30000;

/**
 * Keepalive ping interval; a dead socket is closed after CDP_MAX_MISSED_PONGS
 */
export const CDP_KEEPALIVE_INTERVAL = 30000;
export const CDP_MAX_MISSED_PONGS = 3;

export const WEBSOCKET_NORMAL_CLOSURE = 1000;
export const WEBSOCKET_NO_PONG_CLOSURE = 1001;
export const UTF8_ENCODING = 'utf8' as const;

/**
 * Maximum WebSocket payload (large chat pages return big HTML snippets)
 */
export const WEBSOCKET_MAX_PAYLOAD = 100 * 1024 * 1024;

/**
 * Bounds accepted for --interval (milliseconds)
 */
export const MIN_CAPTURE_INTERVAL_MS = 100;
export const MAX_CAPTURE_INTERVAL_MS = 60000;

/**
 * Time allowed for a navigated page to leave the 'loading' state
 */
export const NAVIGATION_READY_TIMEOUT_MS = 15000;
export const NAVIGATION_POLL_INTERVAL_MS = 250;

/**
 * Time allowed for the chat textbox to appear before `ask` gives up
 */
export const TEXTBOX_WAIT_TIMEOUT_MS = 30000;

/**
 * Poll interval and overall reply timeout for `ask`
 */
export const ASK_POLL_INTERVAL_MS = 150;
export const DEFAULT_ASK_TIMEOUT_MS = 180000;

/**
 * Consecutive unchanged polls that mark an assistant reply as complete
 */
export const ASK_STABLE_POLLS = 6;

// ============================================================================
// OUTPUT
// ============================================================================

/**
 * Default JSON Lines output file (relative to the working directory)
 */
export const DEFAULT_OUTPUT_FILE = 'chat_capture.jsonl';

/**
 * Maximum characters of inner HTML kept per record
 */
export const HTML_SNIPPET_MAX_LENGTH = 500;

// ============================================================================
// CLI OPTION DESCRIPTIONS
// ============================================================================

export const PORT_OPTION_DESCRIPTION = 'Browser remote-debugging port';
export const HOST_OPTION_DESCRIPTION = 'Host of the remote-debugging endpoint';
