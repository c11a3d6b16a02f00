import * as readline from 'readline';

/**
 * Line-based local input. Resolves `null` once input is exhausted.
 */
export interface LineSource {
  readLine(): Promise<string | null>;
  close?(): void;
}

/**
 * Options for ConsoleLineSource
 */
export interface ConsoleLineSourceOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Prompt written before each read (default "> ") */
  prompt?: string;
}

/**
 * Reads chat lines from a terminal (stdin by default)
 */
export class ConsoleLineSource implements LineSource {
  private rl: readline.Interface;
  private lines: AsyncIterator<string>;
  private exhausted = false;
  private inputClosed = false;

  constructor(options: ConsoleLineSourceOptions = {}) {
    this.rl = readline.createInterface({
      input: options.input ?? process.stdin,
      output: options.output ?? process.stdout,
      terminal: false,
    });
    this.rl.setPrompt(options.prompt ?? '> ');
    this.rl.once('close', () => {
      this.inputClosed = true;
    });
    // Created up front so lines typed before the first read are buffered
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async readLine(): Promise<string | null> {
    if (this.exhausted) {
      return null;
    }

    // Lines buffered before input ended are still drained
    if (!this.inputClosed) {
      this.rl.prompt();
    }
    const result = await this.lines.next();
    if (result.done) {
      this.exhausted = true;
      return null;
    }
    return result.value;
  }

  close(): void {
    this.exhausted = true;
    this.rl.close();
  }
}

/**
 * Feeds a fixed list of lines, then reports end of input
 */
export class ArrayLineSource implements LineSource {
  private index = 0;

  constructor(private readonly lines: readonly string[]) {}

  async readLine(): Promise<string | null> {
    if (this.index >= this.lines.length) {
      return null;
    }
    return this.lines[this.index++];
  }

  /** Lines not yet consumed */
  get remaining(): number {
    return this.lines.length - this.index;
  }
}
