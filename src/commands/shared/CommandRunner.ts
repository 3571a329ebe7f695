import { errorReport, unknownError } from '@/ui/messages/errors.js';
import { ChatCaptureError, getErrorMessage } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Handler function type.
 *
 * Command logic resolves with the exit code to use, or nothing for success.
 */
export type CommandHandler<TOptions> = (options: TOptions) => Promise<number | void>;

/**
 * Process hooks, injectable for tests.
 */
export interface CommandRunnerIO {
  exit: (code: number) => void;
  stderr: (text: string) => void;
}

const processIO: CommandRunnerIO = {
  exit: (code) => process.exit(code),
  stderr: (text) => console.error(text),
};

/**
 * Exit code for an error raised by a command.
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof ChatCaptureError ? error.exitCode : EXIT_CODES.UNHANDLED_EXCEPTION;
}

/**
 * Run a command with consistent error handling and exit codes.
 *
 * This helper:
 * - Wraps command logic in try-catch
 * - Prints `Error: <message>` plus the error's suggestions to stderr
 * - Exits with the handler's code, or the error's semantic exit code
 *
 * @example
 * ```typescript
 * program.command('capture').action((opts: CaptureCommandOptions) =>
 *   runCommand(captureAction, opts)
 * );
 * ```
 */
export async function runCommand<TOptions>(
  handler: CommandHandler<TOptions>,
  options: TOptions,
  io: CommandRunnerIO = processIO
): Promise<void> {
  let exitCode: number;
  try {
    exitCode = (await handler(options)) ?? EXIT_CODES.SUCCESS;
  } catch (error) {
    if (error instanceof ChatCaptureError) {
      io.stderr(errorReport(error.message, error.suggestions));
    } else if (error instanceof Error) {
      io.stderr(errorReport(getErrorMessage(error)));
    } else {
      io.stderr(unknownError());
    }
    exitCode = exitCodeFor(error);
  }
  io.exit(exitCode);
}
