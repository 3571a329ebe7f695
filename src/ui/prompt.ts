/**
 * Operator prompts.
 *
 * Yes/no questions on the terminal via node:readline. Every prompt has a
 * non-interactive flag; `assumeYes` answers without reading input. An
 * aborted signal answers no and releases the terminal.
 */

import * as readline from 'readline';

export type Confirm = (question: string) => Promise<boolean>;

export interface ConfirmOptions {
  /** Answer yes without asking */
  assumeYes?: boolean;
  /** Answer used for an empty line or when input closes */
  defaultAnswer?: boolean;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Aborting answers no */
  signal?: AbortSignal | undefined;
}

/**
 * Interpret a typed answer. Returns undefined when it is neither yes nor no.
 */
export function parseAnswer(answer: string): boolean | undefined {
  const normalized = answer.trim().toLowerCase();
  if (normalized === 'y' || normalized === 'yes') return true;
  if (normalized === 'n' || normalized === 'no') return false;
  return undefined;
}

/**
 * Ask a yes/no question.
 *
 * An empty or unrecognized answer, or closed input, yields `defaultAnswer`.
 * An abort of `options.signal` yields false.
 *
 * @example
 * ```typescript
 * if (await confirm('Port 9222 is in use. Launch anyway?')) {
 *   // ...
 * }
 * ```
 */
export function confirm(question: string, options: ConfirmOptions = {}): Promise<boolean> {
  const { assumeYes = false, defaultAnswer = true, signal } = options;
  const output = options.output ?? process.stderr;

  if (assumeYes) {
    output.write(`${question} yes (--yes)\n`);
    return Promise.resolve(true);
  }
  if (signal?.aborted) {
    return Promise.resolve(false);
  }

  const rl = readline.createInterface({
    input: options.input ?? process.stdin,
    output,
    terminal: false,
  });

  return new Promise((resolve) => {
    let answered = false;
    const onAbort = (): void => {
      output.write('\n');
      finish(false);
    };
    const finish = (value: boolean): void => {
      if (answered) return;
      answered = true;
      signal?.removeEventListener('abort', onAbort);
      rl.close();
      resolve(value);
    };

    signal?.addEventListener('abort', onAbort, { once: true });
    rl.once('close', () => finish(defaultAnswer));
    rl.question(`${question} ${defaultAnswer ? '[Y/n]' : '[y/N]'} `, (answer) => {
      finish(parseAnswer(answer) ?? defaultAnswer);
    });
  });
}

/**
 * Bind prompt options once, for code that takes a {@link Confirm}.
 */
export function createConfirm(options: ConfirmOptions = {}): Confirm {
  return (question) => confirm(question, options);
}
