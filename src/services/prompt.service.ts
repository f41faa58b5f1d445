import * as readline from 'readline';
import { Writable, type Readable } from 'stream';
import { ExitCode, ResetError } from '../errors.js';

export interface Prompter {
  readonly interactive: boolean;
  ask(question: string): Promise<string>;
  /** Ask without echoing what is typed */
  askHidden(question: string): Promise<string>;
  /** Yes/no question, "no" unless the answer is y or yes */
  confirm(question: string): Promise<boolean>;
  close(): void;
}

export function isYes(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

/**
 * Prompts on the terminal through a single readline interface.
 * Lines that arrive before a question is asked are queued, so piped answers work too.
 */
export class TerminalPrompter implements Prompter {
  private rl?: readline.Interface;
  private lines: string[] = [];
  private waiting: Array<(line: string | undefined) => void> = [];
  private closed = false;
  private muted = false;

  constructor(
    private readonly input: Readable & { isTTY?: boolean } = process.stdin,
    private readonly output: NodeJS.WritableStream & { isTTY?: boolean } = process.stdout
  ) {}

  /** Someone can both see the question and type an answer */
  get interactive(): boolean {
    return this.input.isTTY === true && this.output.isTTY === true;
  }

  private get terminal(): boolean {
    return this.input.isTTY === true;
  }

  private open(): readline.Interface {
    if (this.rl) return this.rl;

    // Echo of typed characters goes through here and is dropped while muted
    const echo = new Writable({
      write: (chunk: Buffer | string, _encoding, callback) => {
        if (!this.muted) this.output.write(chunk);
        callback();
      },
    });

    const rl = readline.createInterface({
      input: this.input,
      output: echo,
      terminal: this.terminal,
    });

    rl.on('line', (line) => {
      const next = this.waiting.shift();
      if (next) {
        next(line);
      } else {
        this.lines.push(line);
      }
    });

    rl.on('SIGINT', () => {
      this.output.write('\n');
      rl.close();
    });

    rl.on('close', () => {
      this.closed = true;
      for (const resolve of this.waiting.splice(0)) resolve(undefined);
    });

    this.rl = rl;
    return rl;
  }

  private async nextLine(): Promise<string> {
    this.open();
    const queued = this.lines.shift();
    if (queued !== undefined) return queued;

    const line = this.closed
      ? undefined
      : await new Promise<string | undefined>((resolve) => this.waiting.push(resolve));

    if (line === undefined) {
      throw new ResetError('No answer given, input was closed', ExitCode.UserAborted);
    }
    return line;
  }

  // The question becomes the readline prompt so line redraws keep it
  private showPrompt(question: string): void {
    const rl = this.open();
    rl.setPrompt(question);
    if (!this.closed) rl.prompt();
  }

  async ask(question: string): Promise<string> {
    this.showPrompt(question);
    return (await this.nextLine()).trim();
  }

  async askHidden(question: string): Promise<string> {
    this.showPrompt(question);
    this.muted = true;
    try {
      return await this.nextLine();
    } finally {
      this.muted = false;
      if (this.terminal) this.output.write('\n');
    }
  }

  async confirm(question: string): Promise<boolean> {
    return isYes(await this.ask(`${question} [y/N] `));
  }

  close(): void {
    if (!this.closed) this.rl?.close();
  }
}
