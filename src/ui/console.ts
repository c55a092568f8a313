import type { GlyphConfig } from '../config';

const SECTION_WIDTH = 70;

export interface TextSink {
  write(chunk: string): unknown;
}

export interface ConsoleStreams {
  stdout: TextSink;
  stderr: TextSink;
}

export type StreamName = keyof ConsoleStreams;

/**
 * Operator-facing output. Structured records go to the logger; this is only
 * what the person at the terminal reads.
 */
export class ConsoleReporter {
  readonly glyphs: GlyphConfig;
  private readonly streams: ConsoleStreams;

  constructor(glyphs: GlyphConfig, streams: ConsoleStreams = { stdout: process.stdout, stderr: process.stderr }) {
    this.glyphs = glyphs;
    this.streams = streams;
  }

  line(text = ''): void {
    this.streams.stdout.write(`${text}\n`);
  }

  lines(texts: readonly string[]): void {
    for (const text of texts) {
      this.line(text);
    }
  }

  error(text = ''): void {
    this.streams.stderr.write(`${text}\n`);
  }

  errors(texts: readonly string[]): void {
    for (const text of texts) {
      this.error(text);
    }
  }

  /** Prompt text, left on the same line as the answer */
  prompt(text: string, stream: StreamName = 'stdout'): void {
    this.streams[stream].write(text);
  }

  section(title: string): void {
    this.line();
    this.line(title);
    this.line(this.glyphs.separator.repeat(SECTION_WIDTH));
  }

  /** A checked section title, e.g. "✓ Complete" */
  done(title: string): void {
    this.section(`${this.glyphs.checkMark} ${title}`);
  }

  summary(text: string): void {
    this.line(`${this.glyphs.arrow} ${text}`);
  }
}
