import type { Command } from 'commander';

import { CaptureLog } from '@/capture/CaptureLog.js';
import { askChat } from '@/capture/ask.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import { SignalHandler } from '@/commands/shared/SignalHandler.js';
import {
  configOption,
  hostOption,
  outputOption,
  portOption,
  type ConnectionCommandOptions,
} from '@/commands/shared/commonOptions.js';
import { loadConfig } from '@/config/loader.js';
import { integerRule, nonEmptyStringRule } from '@/config/validation.js';
import { type BrowserConnection, connectToBrowser } from '@/connection/browser.js';
import { openChatPage } from '@/connection/targets.js';
import { DEFAULT_ASK_TIMEOUT_MS } from '@/constants.js';
import { createLogger } from '@/ui/logging/index.js';
import { askSavedMessage } from '@/ui/messages/capture.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

const log = createLogger('ask');

const TIMEOUT_RULE = integerRule({ min: 1000, max: 3_600_000 });
const MESSAGE_RULE = nonEmptyStringRule();

/**
 * Options for the `chatcap ask` command.
 */
export interface AskCommandOptions extends ConnectionCommandOptions {
  output?: string;
  url?: string;
  /** Reply timeout in milliseconds */
  timeout?: string;
  /** false skips writing the exchange to the log */
  save?: boolean;
}

/**
 * Send one prompt to the chat page and stream the reply to stdout.
 */
export async function askAction(message: string, options: AskCommandOptions): Promise<number> {
  const prompt = MESSAGE_RULE.validate(message, 'message');
  const timeoutMs =
    options.timeout === undefined ? DEFAULT_ASK_TIMEOUT_MS : TIMEOUT_RULE.validate(options.timeout, 'timeout');
  const config = loadConfig({
    configPath: options.config,
    host: options.host,
    port: options.port,
    output: options.output,
    targetUrl: options.url,
  });

  const signals = new SignalHandler();
  const signal = signals.register();
  let connection: BrowserConnection | undefined;
  try {
    connection = await connectToBrowser({ host: config.host, port: config.port });
    const { page } = await openChatPage(connection.browser, {
      targetUrl: config.targetUrl,
      chatUrlHints: config.chatUrlHints,
    });
    const saveLog = options.save === false ? undefined : new CaptureLog(config.output);
    await askChat(page, config, { message: prompt, timeoutMs }, { log: saveLog, signal });
    if (saveLog) {
      log.info(askSavedMessage(saveLog.filePath));
    }
    return EXIT_CODES.SUCCESS;
  } finally {
    signals.unregister();
    connection?.cdp.close();
  }
}

/**
 * Register ask command
 */
export function registerAskCommand(program: Command): void {
  program
    .command('ask')
    .description('Type a prompt into the chat page and stream the reply to stdout')
    .argument('<message>', 'Prompt to send')
    .addOption(portOption)
    .addOption(hostOption)
    .addOption(configOption)
    .addOption(outputOption)
    .option('--url <url>', 'Chat page URL used to pick the tab')
    .option('-t, --timeout <ms>', 'Give up when no complete reply arrives in time (default: 180000)')
    .option('--no-save', 'Do not append the exchange to the output log')
    .action((message: string, options: AskCommandOptions) =>
      runCommand((opts: AskCommandOptions) => askAction(message, opts), options)
    );
}
