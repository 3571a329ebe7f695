#!/usr/bin/env node

import { Command } from 'commander';

import { commandRegistry } from '@/commandRegistry.js';
import { createLogger, enableDebugLogging } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { VERSION } from '@/utils/version.js';

// Commander Configuration
const CLI_NAME = 'chatcap';
const CLI_DESCRIPTION = 'Capture chat transcripts from a browser tab via Chrome DevTools Protocol';

const log = createLogger('chatcap');

/**
 * Main entry point.
 *
 * 1. Enable debug logging early when --debug is present
 * 2. Initialize Commander and register command handlers
 * 3. Parse arguments and route to the command; each command exits through
 *    runCommand with its semantic exit code
 */
async function main(): Promise<void> {
  if (process.argv.includes('--debug')) {
    enableDebugLogging();
  }

  const program = new Command()
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(VERSION)
    .option('--debug', 'Enable debug logging (verbose output)');

  commandRegistry.forEach((register) => register(program));

  await program.parseAsync();
}

main().catch((error: unknown) => {
  log.info(`Fatal: ${getErrorMessage(error)}`);
  process.exit(EXIT_CODES.UNHANDLED_EXCEPTION);
});
