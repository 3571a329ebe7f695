import type { Command } from 'commander';

import { CaptureSession } from '@/capture/CaptureSession.js';
import type { CaptureSummary } from '@/capture/types.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import { SignalHandler } from '@/commands/shared/SignalHandler.js';
import {
  configOption,
  hostOption,
  outputOption,
  portOption,
  yesOption,
  type ConnectionCommandOptions,
} from '@/commands/shared/commonOptions.js';
import { loadConfig } from '@/config/loader.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { createConfirm } from '@/ui/prompt.js';

/**
 * Options for the `chatcap capture` command.
 */
export interface CaptureCommandOptions extends ConnectionCommandOptions {
  output?: string;
  /** Chat URL used for page selection and auto-navigation */
  url?: string;
  /** undefined asks the operator */
  navigate?: boolean;
  autoStart?: boolean;
  interval?: string;
  baseline?: string;
  /** undefined keeps the configured streaming policy */
  hold?: boolean;
  yes?: boolean;
}

/**
 * Exit status for a finished capture: a lost connection is a failure,
 * an operator stop is not.
 */
export function captureExitCode(summary: CaptureSummary): number {
  return summary.stopReason === 'connection-lost'
    ? EXIT_CODES.CDP_CONNECTION_FAILURE
    : EXIT_CODES.SUCCESS;
}

/**
 * Connect, select and prepare the chat page, then capture until interrupted.
 */
export async function captureAction(options: CaptureCommandOptions): Promise<number> {
  const config = loadConfig({
    configPath: options.config,
    host: options.host,
    port: options.port,
    output: options.output,
    targetUrl: options.url,
    intervalMs: options.interval,
    baseline: options.baseline,
    holdWhileStreaming: options.hold,
  });
  const assumeYes = options.yes ?? false;
  const signals = new SignalHandler();
  const signal = signals.register();
  const session = new CaptureSession(
    {
      config,
      autoNavigate: options.navigate ?? (assumeYes ? true : undefined),
      autoStart: options.autoStart ?? assumeYes,
    },
    { confirm: createConfirm({ assumeYes, signal }) }
  );

  try {
    await session.connect();
    await session.selectPage();
    await session.prepare();
    return captureExitCode(await session.run(signal));
  } finally {
    signals.unregister();
    session.stop('aborted');
  }
}

/**
 * Register capture command
 */
export function registerCaptureCommand(program: Command): void {
  program
    .command('capture')
    .description('Record chat messages from the browser into a JSON Lines log')
    .addOption(portOption)
    .addOption(hostOption)
    .addOption(configOption)
    .addOption(outputOption)
    .option('--url <url>', 'Chat page URL (default: the profile target URL)')
    .option('--navigate', 'Navigate the selected tab to the chat URL without asking')
    .option('--no-navigate', 'Never navigate the selected tab')
    .option('--auto-start', 'Start capturing without the ready prompt')
    .option('-i, --interval <ms>', 'Milliseconds between scans (default: 2000)')
    .option('--baseline <policy>', 'Messages already on the page: emit or skip (default: emit)')
    .option('--hold', 'Hold assistant messages while a reply is streaming')
    .option('--no-hold', 'Capture assistant messages even while streaming')
    .addOption(yesOption)
    .action((options: CaptureCommandOptions) => runCommand(captureAction, options));
}
