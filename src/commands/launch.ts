import type { Command } from 'commander';

import { runCommand } from '@/commands/shared/CommandRunner.js';
import { SignalHandler } from '@/commands/shared/SignalHandler.js';
import {
  configOption,
  hostOption,
  portOption,
  yesOption,
  type ConnectionCommandOptions,
} from '@/commands/shared/commonOptions.js';
import { loadConfig } from '@/config/loader.js';
import { launchBrowser } from '@/connection/launcher.js';
import { createConfirm } from '@/ui/prompt.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { normalizeUrl } from '@/utils/url.js';

/**
 * Options for the `chatcap launch` command.
 */
export interface LaunchCommandOptions extends ConnectionCommandOptions {
  /** Browser executable, overriding CHROME_PATH and the well-known paths */
  browserPath?: string;
  /** Profile directory (default ~/.chatcap/chrome-profile) */
  userDataDir?: string;
  /** Page to open on start */
  url?: string;
  headless?: boolean;
  /** Extra browser flags, repeatable */
  flag?: string[];
  yes?: boolean;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Launch the browser and wait until it exits.
 *
 * @returns Exit code; 0 also when the operator keeps an already-running browser
 */
export async function launchAction(options: LaunchCommandOptions): Promise<number> {
  const config = loadConfig({
    configPath: options.config,
    host: options.host,
    port: options.port,
    browserPath: options.browserPath,
  });
  const signals = new SignalHandler();
  const signal = signals.register();

  try {
    await launchBrowser(
      {
        port: config.port,
        host: config.host,
        browserPath: config.browserPath,
        userDataDir: options.userDataDir,
        headless: options.headless ?? false,
        startingUrl: options.url === undefined ? undefined : normalizeUrl(options.url),
        extraFlags: options.flag ?? [],
        assumeYes: options.yes ?? false,
        signal,
      },
      { confirm: createConfirm({ assumeYes: options.yes ?? false, defaultAnswer: false, signal }) }
    );
    return EXIT_CODES.SUCCESS;
  } finally {
    signals.unregister();
  }
}

/**
 * Register launch command
 */
export function registerLaunchCommand(program: Command): void {
  program
    .command('launch')
    .description('Start a browser with remote debugging and a dedicated profile')
    .addOption(portOption)
    .addOption(hostOption)
    .addOption(configOption)
    .option('-b, --browser-path <path>', 'Browser executable (default: CHROME_PATH, then well-known paths)')
    .option('-u, --user-data-dir <path>', 'Profile directory (default: ~/.chatcap/chrome-profile)')
    .option('--url <url>', 'Page to open on start')
    .option('--headless', 'Launch without a visible window', false)
    .option('--flag <flag>', 'Extra browser flag (repeatable)', collect)
    .addOption(yesOption)
    .action((options: LaunchCommandOptions) => runCommand(launchAction, options));
}
