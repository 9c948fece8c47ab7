import readline from 'node:readline';
import { Writable } from 'node:stream';
import type { Logger } from '@gt911-config/engine';

export interface Prompter {
  /** Resolves null once input has ended. */
  ask(question: string): Promise<string | null>;
  /** Like ask, without echoing what is typed. */
  askHidden(question: string): Promise<string | null>;
  close(): void;
}

export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream & { isTTY?: boolean } = process.stdout
): Prompter {
  let muted = false;
  let closed = false;
  const sink = new Writable({
    write(chunk: string | Uint8Array, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
      if (!muted) output.write(chunk);
      callback();
    }
  });
  const rl = readline.createInterface({ input, output: sink, terminal: Boolean(output.isTTY) });
  rl.on('close', () => {
    closed = true;
  });

  const question = (text: string): Promise<string | null> => {
    if (closed) return Promise.resolve(null);
    return new Promise(resolve => {
      const onClose = () => resolve(null);
      rl.once('close', onClose);
      rl.question(text, answer => {
        rl.removeListener('close', onClose);
        resolve(answer);
      });
    });
  };

  return {
    ask: question,
    async askHidden(text) {
      output.write(text);
      muted = true;
      try {
        return await question('');
      } finally {
        muted = false;
        output.write('\n');
      }
    },
    close() {
      rl.close();
    }
  };
}

/** y/N question; anything but y or n (or an empty answer) asks again. End of input means no. */
export async function askYesNo(prompter: Prompter, question: string, logger: Logger = console): Promise<boolean> {
  for (;;) {
    const answer = await prompter.ask(question);
    if (answer === null) return false;
    const text = answer.trim().toLowerCase();
    if (text === 'y') return true;
    if (text === 'n' || text === '') return false;
    logger.log("Please enter 'y' or 'n'");
  }
}
