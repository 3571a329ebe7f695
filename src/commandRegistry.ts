import type { Command } from 'commander';

import { registerAskCommand } from '@/commands/ask.js';
import { registerCaptureCommand } from '@/commands/capture.js';
import { registerLaunchCommand } from '@/commands/launch.js';

/**
 * Command registration function type
 */
export type CommandRegistrar = (program: Command) => void;

/**
 * Registry of all CLI commands.
 * Order matters: it is the order of the help output, which follows the
 * operator workflow (launch, then capture or ask).
 */
export const commandRegistry: CommandRegistrar[] = [
  registerLaunchCommand,
  registerCaptureCommand,
  registerAskCommand,
];
