import { createInterface, Interface } from 'readline/promises';
import { AppError, UserInterruptError } from '../utils/errors';
import { TextOutput } from '../types/app';

export interface LinePrompter {
  /** Resolves with the typed line; rejects with UserInterruptError on Ctrl-C or end of input */
  question(query: string): Promise<string>;
  close(): void;
}

/**
 * Terminal prompter on top of readline.
 * readline swallows Ctrl-C while it owns the terminal, so the SIGINT is turned into an error here.
 */
export class ReadlinePrompter implements LinePrompter {
  private rl: Interface | null = null;
  private closed = false;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {}

  async question(query: string): Promise<string> {
    if (this.closed) {
      throw new UserInterruptError();
    }

    const rl = this.getInterface();
    const controller = new AbortController();
    const abort = (): void => controller.abort();
    rl.on('SIGINT', abort);
    rl.on('close', abort);

    try {
      return await rl.question(query, { signal: controller.signal });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new UserInterruptError();
      }
      throw error;
    } finally {
      rl.off('SIGINT', abort);
      rl.off('close', abort);
    }
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }

  private getInterface(): Interface {
    if (!this.rl) {
      const rl = createInterface({ input: this.input, output: this.output });
      rl.on('close', () => {
        this.closed = true;
      });
      this.rl = rl;
    }
    return this.rl;
  }
}

export type Validation<T> =
  | { ok: true; value: T }
  | { ok: false; message: string };

export interface PromptLoopOptions {
  output: TextOutput;
  /** Unbounded when omitted */
  maxAttempts?: number;
}

/**
 * Ask until `validate` accepts the answer.
 * Interrupts propagate from the prompter untouched.
 */
export async function promptUntilValid<T>(
  prompter: LinePrompter,
  query: string,
  validate: (answer: string) => Validation<T>,
  options: PromptLoopOptions,
): Promise<T> {
  const maxAttempts = options.maxAttempts ?? Number.POSITIVE_INFINITY;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const answer = await prompter.question(query);
    const result = validate(answer.trim());
    if (result.ok) {
      return result.value;
    }
    options.output.write(`${result.message}\n`);
  }

  throw new AppError(`No valid answer after ${maxAttempts} attempts`);
}
