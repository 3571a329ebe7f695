import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import * as chromeLauncher from 'chrome-launcher';

import type { LaunchedBrowser, Logger } from './types.js';

import {
  CHATCAP_HOME_DIR,
  CHROME_PROFILE_DIR,
  DEFAULT_CDP_PORT,
  DEFAULT_CHROME_LOG_LEVEL,
  HTTP_LOCALHOST,
} from '@/constants.js';
import { createLogger } from '@/ui/logging/index.js';
import {
  PORT_IN_USE_PROMPT,
  browserExitedMessage,
  existingListenerError,
  existingListenerSuggestions,
  launchFailedError,
  launchedMessage,
  launchingMessage,
  portReusedMessage,
  profileDirError,
  profileDirMessage,
} from '@/ui/messages/launcher.js';
import type { Confirm } from '@/ui/prompt.js';
import {
  ChatCaptureError,
  PortInUseError,
  ProcessSpawnError,
  getErrorMessage,
} from '@/utils/errors.js';

import { resolveBrowserExecutable, type BinaryResolverOptions } from './launcher/binaryResolver.js';
import { buildBrowserFlags } from './launcher/flagsBuilder.js';
import { probePort } from './portProbe.js';

/**
 * Options that control how the browser is launched.
 */
export interface LaunchOptions {
  /** Remote debugging port (defaults to 9222) */
  port?: number;
  /** Host probed for an existing listener */
  host?: string;
  /** Explicit executable; CHROME_PATH and well-known paths are tried otherwise */
  browserPath?: string | undefined;
  /** Profile directory. Falls back to ~/.chatcap/chrome-profile */
  userDataDir?: string | undefined;
  headless?: boolean;
  /** Page opened on start; about:blank when omitted */
  startingUrl?: string | undefined;
  /** Flags appended after the built-in ones */
  extraFlags?: string[];
  /** Answer the port-in-use prompt with yes */
  assumeYes?: boolean;
  /** Aborting kills the browser */
  signal?: AbortSignal | undefined;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/**
 * Process-level collaborators, injectable for tests.
 */
export interface LauncherDeps {
  resolveExecutable?: (options: BinaryResolverOptions) => { path: string };
  probe?: (host: string, port: number) => Promise<boolean>;
  confirm?: Confirm;
  spawn?: (options: chromeLauncher.Options) => Promise<LaunchedBrowser>;
}

export type LaunchOutcome =
  | { status: 'reused'; port: number }
  | { status: 'exited'; pid: number; port: number; exitCode: number | null };

/**
 * Get the default persistent profile directory.
 *
 * A persistent directory keeps cookies and the chat sign-in across launches.
 */
export function defaultProfileDir(homeDir: string = os.homedir()): string {
  return path.join(homeDir, CHATCAP_HOME_DIR, CHROME_PROFILE_DIR);
}

/**
 * Create the profile directory if it does not exist.
 *
 * @throws ProcessSpawnError naming the directory when it cannot be created
 */
export async function ensureProfileDir(dir: string): Promise<string> {
  try {
    await fs.promises.mkdir(dir, { recursive: true });
  } catch (error) {
    throw new ProcessSpawnError(profileDirError(dir, getErrorMessage(error)), { cause: error });
  }
  return dir;
}

/**
 * Decide whether to launch when the debugging port may be taken.
 *
 * A free port proceeds without asking. A bound port is reported and the
 * operator chooses; `assumeYes` answers yes.
 *
 * @returns false when the operator keeps the existing browser
 */
export async function checkDebugPort(
  options: { host: string; port: number; assumeYes?: boolean },
  deps: { probe?: LauncherDeps['probe']; confirm?: Confirm | undefined; logger?: Logger } = {}
): Promise<boolean> {
  const probe = deps.probe ?? probePort;
  const logger = deps.logger ?? createLogger('launcher');

  if (!(await probe(options.host, options.port))) {
    return true;
  }

  logger.info(new PortInUseError(options.port).message);
  if (options.assumeYes) {
    return true;
  }
  const confirm = deps.confirm ?? ((): Promise<boolean> => Promise.resolve(false));
  return confirm(PORT_IN_USE_PROMPT(options.port));
}

/**
 * Spawn through chrome-launcher and expose the process exit as a promise.
 *
 * @throws ProcessSpawnError when the port already has a listener, since
 * chrome-launcher then reuses it and starts nothing
 */
export async function spawnWithChromeLauncher(
  options: chromeLauncher.Options
): Promise<LaunchedBrowser> {
  const chrome = await chromeLauncher.launch(options);
  // chrome-launcher attaches to an existing listener on the port instead of spawning
  if (chrome.process === undefined) {
    throw new ProcessSpawnError(existingListenerError(chrome.port), {
      suggestions: existingListenerSuggestions(chrome.port),
    });
  }
  const exited = new Promise<number | null>((resolve) => {
    if (chrome.process.exitCode !== null) {
      resolve(chrome.process.exitCode);
      return;
    }
    chrome.process.once('exit', (code) => resolve(code));
  });

  return {
    pid: chrome.pid,
    port: chrome.port,
    userDataDir: typeof options.userDataDir === 'string' ? options.userDataDir : '',
    exited,
    kill: () => chrome.kill(),
  };
}

/**
 * Launch a browser with remote debugging and block until it exits.
 *
 * resolve executable -> check port -> ensure profile -> spawn -> wait.
 * No retry.
 *
 * @throws ExecutableNotFoundError when no executable qualifies
 * @throws ProcessSpawnError when the profile directory or the process cannot be created
 */
export async function launchBrowser(
  options: LaunchOptions = {},
  deps: LauncherDeps = {}
): Promise<LaunchOutcome> {
  const logger = options.logger ?? createLogger('launcher');
  const port = options.port ?? DEFAULT_CDP_PORT;
  const host = options.host ?? HTTP_LOCALHOST;
  const resolveExecutable = deps.resolveExecutable ?? resolveBrowserExecutable;
  const spawn = deps.spawn ?? spawnWithChromeLauncher;

  const executable = resolveExecutable({
    browserPath: options.browserPath,
    logger,
    ...(options.env ? { env: options.env } : {}),
  });

  const proceed = await checkDebugPort(
    { host, port, ...(options.assumeYes !== undefined ? { assumeYes: options.assumeYes } : {}) },
    { probe: deps.probe, confirm: deps.confirm, logger }
  );
  if (!proceed) {
    logger.info(portReusedMessage(port));
    return { status: 'reused', port };
  }

  const userDataDir = await ensureProfileDir(options.userDataDir ?? defaultProfileDir());
  logger.debug(profileDirMessage(userDataDir));
  logger.info(launchingMessage(port));

  const launchStart = Date.now();
  let browser: LaunchedBrowser;
  try {
    browser = await spawn({
      chromePath: executable.path,
      chromeFlags: buildBrowserFlags({
        headless: options.headless,
        extraFlags: options.extraFlags,
        ignoreDefaultFlags: false,
      }),
      ignoreDefaultFlags: true,
      port,
      userDataDir,
      logLevel: DEFAULT_CHROME_LOG_LEVEL,
      handleSIGINT: false,
      ...(options.startingUrl ? { startingUrl: options.startingUrl } : {}),
    });
  } catch (error) {
    if (error instanceof ChatCaptureError) {
      throw error;
    }
    throw new ProcessSpawnError(launchFailedError(getErrorMessage(error)), { cause: error });
  }

  logger.info(launchedMessage(browser.pid, browser.port, Date.now() - launchStart));

  const onAbort = (): void => browser.kill();
  if (options.signal?.aborted) {
    onAbort();
  } else {
    options.signal?.addEventListener('abort', onAbort, { once: true });
  }

  try {
    const exitCode = await browser.exited;
    logger.info(browserExitedMessage(exitCode));
    return { status: 'exited', pid: browser.pid, port: browser.port, exitCode };
  } finally {
    options.signal?.removeEventListener('abort', onAbort);
  }
}
