import { Option } from 'commander';

import { HOST_OPTION_DESCRIPTION, PORT_OPTION_DESCRIPTION } from '@/constants.js';

/**
 * Options shared by every subcommand. Values stay strings here; the config
 * loader validates them together with environment and file values.
 */
export interface ConnectionCommandOptions {
  port?: string;
  host?: string;
  config?: string;
}

/**
 * Shared --port option. No default: CHATCAP_PORT and 9222 apply when absent.
 */
export const portOption = new Option('-p, --port <number>', `${PORT_OPTION_DESCRIPTION} (default: 9222)`);

/**
 * Shared --host option.
 */
export const hostOption = new Option('--host <host>', `${HOST_OPTION_DESCRIPTION} (default: 127.0.0.1)`);

/**
 * Shared --config option naming a JSON chat profile.
 */
export const configOption = new Option(
  '-c, --config <path>',
  'JSON file overriding selectors, URL hints, interval and baseline'
);

/**
 * Shared --output option for the JSON Lines log.
 */
export const outputOption = new Option(
  '-o, --output <path>',
  'JSON Lines output file (default: chat_capture.jsonl)'
);

/**
 * Shared --yes flag answering every prompt with yes.
 */
export const yesOption = new Option('-y, --yes', 'Answer yes to every prompt').default(false);
