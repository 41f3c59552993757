/**
 * Line prompts for the interactive command loop
 */

import * as readline from 'readline';

export interface Prompt {
  /**
   * Show `question` and resolve with the next input line, or `null` once the
   * input has ended.
   */
  ask(question: string): Promise<string | null>;
  close(): void;
}

/**
 * Prompt over a readable/writable pair (stdin/stdout by default). Lines that
 * arrive before they are asked for are queued, so piped input is not lost.
 */
export class ReadlinePrompt implements Prompt {
  private readonly rl: readline.Interface;
  private readonly output: NodeJS.WritableStream;
  private readonly lines: string[] = [];
  private waiter: ((line: string | null) => void) | null = null;
  private ended = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
  ) {
    this.output = output;
    this.rl = readline.createInterface({ input, terminal: false });

    this.rl.on('line', line => {
      if (this.waiter) {
        const resolve = this.waiter;
        this.waiter = null;
        resolve(line);
      } else {
        this.lines.push(line);
      }
    });

    this.rl.on('close', () => {
      this.ended = true;
      if (this.waiter) {
        const resolve = this.waiter;
        this.waiter = null;
        resolve(null);
      }
    });
  }

  ask(question: string): Promise<string | null> {
    this.output.write(question);

    const queued = this.lines.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    return new Promise(resolve => {
      this.waiter = resolve;
    });
  }

  close(): void {
    this.rl.close();
  }
}
