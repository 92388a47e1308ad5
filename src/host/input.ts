import { createInterface } from 'node:readline';
import type { InputProvider } from '../core/context.js';
import { ProvisionError, ErrorCode } from '../lib/errors.js';
import { isInteractive } from '../lib/utils/prompt-utils.js';

/**
 * Reads one line per question. The prompt goes to stderr so that stdout
 * stays clean for `--json`. End of input or Ctrl-C rejects with
 * `INTERACTIVE_REQUIRED` instead of leaving the question pending.
 */
export function createTerminalInput(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stderr,
): InputProvider {
  return {
    ask(question: string): Promise<string> {
      return new Promise((resolve, reject) => {
        const rl = createInterface({ input, output });
        let answered = false;

        rl.once('SIGINT', () => rl.close());
        rl.once('close', () => {
          if (!answered) {
            reject(new ProvisionError(
              ErrorCode.INTERACTIVE_REQUIRED,
              'no input received',
              'Pass the key with --key to run without a prompt',
            ));
          }
        });
        rl.question(`${question}: `, (answer) => {
          answered = true;
          rl.close();
          resolve(answer);
        });
      });
    },
  };
}

/** The process terminal; streams are looked up when a question is asked */
export const terminalInput: InputProvider = {
  ask: (question) => createTerminalInput().ask(question),
};

/** Always answers with the same value */
export function staticInput(answer: string): InputProvider {
  return {
    ask: async () => answer,
  };
}

/** Refuses to ask; used without a terminal or with --non-interactive */
export const noInput: InputProvider = {
  ask: async (question: string) => {
    throw new ProvisionError(
      ErrorCode.INTERACTIVE_REQUIRED,
      `input required but not available: "${question}"`,
      'Pass the value on the command line (e.g. --key) or run in a terminal',
    );
  },
};

export interface InputOptions {
  answer?: string;
  nonInteractive?: boolean;
}

export function createInputProvider(options: InputOptions = {}): InputProvider {
  if (options.answer !== undefined) return staticInput(options.answer);
  if (options.nonInteractive || !isInteractive()) return noInput;
  return terminalInput;
}
