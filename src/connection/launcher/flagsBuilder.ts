/**
 * Browser command-line flags builder.
 *
 * Constructs the flags array from launch options, handling:
 * - Base chrome-launcher defaults
 * - chatcap flags (first-run and prompt suppression)
 * - Docker environment detection and GPU-disabling flags
 * - Headless mode
 *
 * `--remote-debugging-port` and `--user-data-dir` are added by chrome-launcher
 * itself, even with `ignoreDefaultFlags`, so they are not built here.
 */

import * as fs from 'fs';

import * as chromeLauncher from 'chrome-launcher';

import { CHATCAP_CHROME_FLAGS, DOCKER_CHROME_FLAGS, HEADLESS_FLAG } from '@/constants.js';

/**
 * Options that affect flags construction.
 */
export interface FlagsBuilderOptions {
  /** Whether to leave out chrome-launcher's default flags */
  ignoreDefaultFlags?: boolean | undefined;
  /** Whether to launch in headless mode */
  headless?: boolean | undefined;
  /** Operator-supplied flags, appended last */
  extraFlags?: readonly string[] | undefined;
  /** Container detection, injectable for tests */
  inContainer?: boolean | undefined;
}

/**
 * Check if running inside a Docker container.
 *
 * Detects Docker environment by checking for:
 * 1. /.dockerenv file (standard Docker indicator)
 * 2. "docker" or "containerd" in /proc/self/cgroup
 */
export function isDocker(): boolean {
  try {
    if (fs.existsSync('/.dockerenv')) {
      return true;
    }

    if (fs.existsSync('/proc/self/cgroup')) {
      const cgroup = fs.readFileSync('/proc/self/cgroup', 'utf8');
      return cgroup.includes('docker') || cgroup.includes('containerd');
    }

    return false;
  } catch {
    return false;
  }
}

/**
 * Build the browser flags array.
 *
 * Order: headless (when requested), chrome-launcher defaults, chatcap flags,
 * Docker flags, then extra flags. Later flags win when
 * the browser sees a duplicate switch.
 *
 * @example
 * ```typescript
 * const flags = buildBrowserFlags({ extraFlags: ['--window-size=1280,900'] });
 * ```
 */
export function buildBrowserFlags(options: FlagsBuilderOptions = {}): string[] {
  const baseFlags = options.ignoreDefaultFlags ? [] : chromeLauncher.Launcher.defaultFlags();
  const dockerFlags = (options.inContainer ?? isDocker()) ? DOCKER_CHROME_FLAGS : [];

  return [
    ...(options.headless ? [HEADLESS_FLAG] : []),
    ...baseFlags,
    ...CHATCAP_CHROME_FLAGS,
    ...dockerFlags,
    ...(options.extraFlags ?? []),
  ];
}
