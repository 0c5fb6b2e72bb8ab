import * as readline from 'readline';

/**
 * Line-based question/answer source for the menu
 */
export interface Prompter {
  /**
   * Ask a question
   *
   * @returns The trimmed answer, or null once input has ended
   */
  ask(question: string): Promise<string | null>;
  close(): void;
}

/**
 * Prompter over a readline interface. Lines are queued as they arrive, so
 * piped input holding several answers in one chunk is answered in order.
 */
export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  const rl = readline.createInterface({ input, output });
  const lines: string[] = [];
  const waiting: Array<(answer: string | null) => void> = [];
  let closed = false;

  rl.on('line', (line) => {
    const answer = line.trim();
    const next = waiting.shift();
    if (next) {
      next(answer);
    } else {
      lines.push(answer);
    }
  });

  rl.on('close', () => {
    closed = true;
    waiting.splice(0).forEach((resolve) => resolve(null));
  });

  return {
    ask(question: string): Promise<string | null> {
      if (!closed) {
        rl.setPrompt(question);
        rl.prompt();
      }

      const buffered = lines.shift();
      if (buffered !== undefined) {
        return Promise.resolve(buffered);
      }
      if (closed) {
        return Promise.resolve(null);
      }
      return new Promise((resolve) => {
        waiting.push(resolve);
      });
    },
    close() {
      rl.close();
    },
  };
}
