// Interactive prompts
//
// Prompter is the only way the CLI talks to the operator's keyboard. The
// readline implementation reads stdin; the scripted one replays answers in tests.

import readline from 'node:readline';
import { stdin, stdout } from 'node:process';
import { ValidationError } from '@property-tracker/runtime';

export interface Prompter {
  /**
   * Ask a question and return the raw answer.
   * @throws PromptClosedError once input has ended
   */
  ask(question: string): Promise<string>;

  close(): void;
}

/**
 * Input ended (EOF or Ctrl+D). Ends the session cleanly.
 */
export class PromptClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'PromptClosedError';
  }
}

/**
 * Prompter over a readline interface. Lines are queued as they arrive, so
 * answers piped in ahead of their questions are served in order.
 */
export function createReadlinePrompter(
  input: NodeJS.ReadableStream = stdin,
  output: NodeJS.WritableStream = stdout
): Prompter {
  const rl = readline.createInterface({ input, output });
  const lines: string[] = [];
  let waiting: { resolve: (line: string) => void; reject: (error: Error) => void } | undefined;
  let closed = false;

  rl.on('line', (line) => {
    if (waiting) {
      const { resolve } = waiting;
      waiting = undefined;
      resolve(line);
    } else {
      lines.push(line);
    }
  });
  rl.on('close', () => {
    closed = true;
    if (waiting) {
      const { reject } = waiting;
      waiting = undefined;
      reject(new PromptClosedError());
    }
  });

  return {
    ask(question: string): Promise<string> {
      output.write(question);
      const buffered = lines.shift();
      if (buffered !== undefined) {
        return Promise.resolve(buffered);
      }
      if (closed) {
        return Promise.reject(new PromptClosedError());
      }
      return new Promise<string>((resolve, reject) => {
        waiting = { resolve, reject };
      });
    },

    close() {
      if (!closed) {
        rl.close();
      }
    },
  };
}

/**
 * Prompter that replays fixed answers, then behaves like closed input.
 * The `questions` array records every question asked.
 */
export function createScriptedPrompter(answers: string[]): Prompter & { questions: string[] } {
  const queue = [...answers];
  const questions: string[] = [];

  return {
    questions,

    async ask(question: string): Promise<string> {
      questions.push(question);
      const answer = queue.shift();
      if (answer === undefined) {
        throw new PromptClosedError();
      }
      return answer;
    },

    close() {
      queue.length = 0;
    },
  };
}

/**
 * Ask until the answer parses. Validation messages are printed and the
 * question repeated; any other error propagates.
 */
export async function askUntilValid<T>(
  prompter: Prompter,
  question: string,
  parse: (raw: string) => T,
  print: (text: string) => void
): Promise<T> {
  for (;;) {
    const raw = await prompter.ask(question);
    try {
      return parse(raw);
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        throw error;
      }
      print(`  ${error.message}`);
    }
  }
}
