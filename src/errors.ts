/**
 * Error types that the optimizer maps to exit codes and console messages.
 */

/**
 * A check that must pass before anything is queried or changed.
 * `lines` are printed to stderr as-is.
 */
export class PreconditionError extends Error {
  readonly lines: string[];
  readonly exitCode: number;

  constructor(lines: string[], exitCode = 1) {
    super(lines[0] ?? 'Precondition failed');
    this.name = 'PreconditionError';
    this.lines = lines;
    this.exitCode = exitCode;
  }
}

/**
 * The operator declined, or input ended, at a safety prompt.
 */
export class AbortedError extends Error {
  readonly lines: string[];

  constructor(lines: string[]) {
    super(lines.filter((line) => line !== '').join(' ') || 'Aborted.');
    this.name = 'AbortedError';
    this.lines = lines;
  }
}

export class CommandFailedError extends Error {
  readonly command: string;
  readonly status: number | null;
  readonly output: string;

  constructor(command: string, status: number | null, output: string) {
    const detail = output.trim() || (status === null ? 'could not be started' : `exit code ${status}`);
    super(`${command} failed: ${detail}`);
    this.name = 'CommandFailedError';
    this.command = command;
    this.status = status;
    this.output = output;
  }
}

export class BackupError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Could not create backup file: ${path}`, { cause });
    this.name = 'BackupError';
    this.path = path;
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
