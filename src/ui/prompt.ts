import readline from 'readline';
import type { ConsoleReporter, StreamName } from './console';

export type Confirmation = 'yes' | 'no' | 'eof';

export interface IPrompter {
  /**
   * Next line of input, or null once input has ended
   */
  readLine(): Promise<string | null>;

  close(): void;
}

export const isAffirmative = (answer: string): boolean => /^(y|yes)$/i.test(answer.trim());

/**
 * Ask a yes/no question that defaults to no. Warnings ask on stderr, beside
 * the text that explains them.
 */
export const confirm = async (
  prompter: IPrompter,
  reporter: ConsoleReporter,
  question: string,
  stream: StreamName = 'stdout',
): Promise<Confirmation> => {
  reporter.prompt(`${question} [y/N]: `, stream);
  const answer = await prompter.readLine();
  if (answer === null) {
    return 'eof';
  }
  return isAffirmative(answer) ? 'yes' : 'no';
};

/**
 * Reads answers line by line from stdin. One interface serves every prompt so
 * piped answers are not lost between questions.
 */
export class ReadlinePrompter implements IPrompter {
  private readonly input: NodeJS.ReadableStream;
  private lines?: AsyncIterator<string>;
  private rl?: readline.Interface;

  constructor(input: NodeJS.ReadableStream = process.stdin) {
    this.input = input;
  }

  async readLine(): Promise<string | null> {
    if (!this.lines) {
      this.rl = readline.createInterface({ input: this.input, terminal: false });
      this.lines = this.rl[Symbol.asyncIterator]();
    }
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }

  close(): void {
    this.rl?.close();
  }
}
