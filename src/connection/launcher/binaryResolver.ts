/**
 * Browser executable resolution and validation.
 *
 * Candidates are checked in order: the explicit `--browser-path`, the
 * CHROME_PATH environment variable, then the well-known installation paths
 * for the platform. The first one that exists, is a regular file and is
 * executable wins.
 */

import * as fs from 'fs';

import * as chromeLauncher from 'chrome-launcher';

import { WELL_KNOWN_BROWSER_PATHS } from '@/constants.js';
import type { Logger } from '@/types.js';
import { createLogger } from '@/ui/logging/index.js';
import {
  EXECUTABLE_NOT_FOUND_SUGGESTIONS,
  browserPathRejected,
  browserResolvedMessage,
  executableNotFoundDetails,
} from '@/ui/messages/launcher.js';
import { ExecutableNotFoundError, getErrorMessage } from '@/utils/errors.js';

const CHROME_PATH_ENV = 'CHROME_PATH';
const ENV_REFERENCE_PATTERN = /%([^%]+)%/g;

export type ExecutableSource = 'option' | 'env' | 'well-known';

export interface BinaryResolverOptions {
  /** Explicit browser path (wins over CHROME_PATH) */
  browserPath?: string | undefined;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  /** Replaces the platform's well-known list */
  wellKnownPaths?: readonly string[];
  /** Installation detection used for the error hint */
  detectInstallations?: () => string[];
  logger?: Logger;
}

export interface ResolvedExecutable {
  path: string;
  source: ExecutableSource;
  /** Every path examined, in order, including the winner */
  checked: string[];
}

/**
 * Well-known paths for a platform. Unknown platforms use the Linux list.
 */
export function wellKnownPathsFor(platform: NodeJS.Platform): readonly string[] {
  if (platform === 'win32' || platform === 'darwin') {
    return WELL_KNOWN_BROWSER_PATHS[platform];
  }
  return WELL_KNOWN_BROWSER_PATHS.linux;
}

/**
 * Expand `%NAME%` references. Returns null when a referenced variable is unset.
 *
 * @example
 * ```typescript
 * expandEnvReferences('%LOCALAPPDATA%\\Google\\Chrome\\Application\\chrome.exe', process.env);
 * ```
 */
export function expandEnvReferences(path: string, env: NodeJS.ProcessEnv): string | null {
  let missing = false;
  const expanded = path.replace(ENV_REFERENCE_PATTERN, (_match, name: string) => {
    const value = env[name];
    if (!value) {
      missing = true;
      return '';
    }
    return value;
  });
  return missing ? null : expanded;
}

/**
 * Why a path cannot be used as the browser executable, or null if it can.
 */
export function executableProblem(path: string): string | null {
  if (!fs.existsSync(path)) {
    return 'does not exist';
  }
  try {
    if (!fs.statSync(path).isFile()) {
      return 'is not a regular file';
    }
    fs.accessSync(path, fs.constants.X_OK);
  } catch (error) {
    return `is not executable (${getErrorMessage(error)})`;
  }
  return null;
}

function detectWithChromeLauncher(logger: Logger): () => string[] {
  return () => {
    try {
      return chromeLauncher.Launcher.getInstallations();
    } catch (error) {
      logger.debug(`Installation detection failed: ${getErrorMessage(error)}`);
      return [];
    }
  };
}

/**
 * Find a usable browser executable.
 *
 * @throws ExecutableNotFoundError listing every checked path when none qualifies
 *
 * @example
 * ```typescript
 * const { path } = resolveBrowserExecutable({ browserPath: options.browserPath });
 * ```
 */
export function resolveBrowserExecutable(options: BinaryResolverOptions = {}): ResolvedExecutable {
  const env = options.env ?? process.env;
  const logger = options.logger ?? createLogger('launcher');
  const candidates: Array<{ path: string; source: ExecutableSource }> = [];

  const explicit = options.browserPath?.trim();
  if (explicit) {
    candidates.push({ path: explicit, source: 'option' });
  }
  const fromEnv = env[CHROME_PATH_ENV]?.trim();
  if (fromEnv) {
    candidates.push({ path: fromEnv, source: 'env' });
  }
  const wellKnown = options.wellKnownPaths ?? wellKnownPathsFor(options.platform ?? process.platform);
  for (const entry of wellKnown) {
    const path = expandEnvReferences(entry, env);
    if (path) {
      candidates.push({ path, source: 'well-known' });
    }
  }

  const checked: string[] = [];
  for (const candidate of candidates) {
    checked.push(candidate.path);
    const problem = executableProblem(candidate.path);
    if (problem === null) {
      logger.debug(browserResolvedMessage(candidate.path, candidate.source));
      return { path: candidate.path, source: candidate.source, checked };
    }
    logger.debug(browserPathRejected(candidate.path, problem));
  }

  const installations = (options.detectInstallations ?? detectWithChromeLauncher(logger))();
  throw new ExecutableNotFoundError(
    checked,
    `No browser executable found\n\n${executableNotFoundDetails(checked, installations)}`,
    { suggestions: EXECUTABLE_NOT_FOUND_SUGGESTIONS }
  );
}
