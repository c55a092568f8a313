import { spawnSync, type SpawnSyncReturns } from 'child_process';
import type { Logger } from '../logger';
import type { CommandResult } from '../types/firmware';

/**
 * Blocking subprocess execution. Calls run strictly one after another.
 */
export interface ICommandRunner {
  /**
   * Run with captured output
   */
  run(command: string, args: string[]): CommandResult;

  /**
   * Run with the terminal attached so the tool's own progress stays visible
   */
  runInteractive(command: string, args: string[]): CommandResult;

  /**
   * Whether `name` resolves on PATH
   */
  commandExists(name: string): boolean;
}

const toResult = (spawned: SpawnSyncReturns<string>): CommandResult => {
  const stdout = spawned.stdout ?? '';
  const stderr = spawned.stderr ?? '';
  return {
    status: spawned.status,
    stdout,
    stderr,
    output: `${stdout}${stderr}`,
    error: spawned.error,
  };
};

export class SpawnCommandRunner implements ICommandRunner {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  run(command: string, args: string[]): CommandResult {
    this.logger.debug({ command, args }, 'Running command');
    const result = toResult(spawnSync(command, args, { encoding: 'utf-8' }));
    this.logCompletion(command, result);
    return result;
  }

  runInteractive(command: string, args: string[]): CommandResult {
    this.logger.debug({ command, args }, 'Running command interactively');
    const result = toResult(spawnSync(command, args, { encoding: 'utf-8', stdio: 'inherit' }));
    this.logCompletion(command, result);
    return result;
  }

  commandExists(name: string): boolean {
    // The name travels as a positional parameter, never through the script text.
    const result = spawnSync('sh', ['-c', 'command -v "$1"', 'sh', name], { encoding: 'utf-8' });
    return result.status === 0;
  }

  private logCompletion(command: string, result: CommandResult): void {
    if (result.error) {
      this.logger.warn({ command, error: result.error.message }, 'Command could not be started');
    } else {
      this.logger.debug({ command, status: result.status }, 'Command finished');
    }
  }
}
