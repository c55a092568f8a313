/**
 * Shared types for firmware pruning
 */

/**
 * A package-name pattern group subject to pruning and reinstallation.
 * `pattern` is an extended regular expression fragment understood by both
 * `pkg query -x` and JavaScript.
 */
export interface FirmwareFamily {
  id: string;
  pattern: string;
  description: string;
}

/**
 * Deduplicated, sorted package names
 */
export type PackageList = string[];

/**
 * Result of a finished subprocess.
 * `status` is null when the process could not be started or was killed.
 */
export interface CommandResult {
  status: number | null;
  stdout: string;
  stderr: string;
  /** stdout followed by stderr, the `2>&1` view of the run */
  output: string;
  error?: Error;
}

export interface RunOptions {
  dryRun: boolean;
}

export type RunOutcome = 'nothing-to-do' | 'dry-run' | 'aborted' | 'installed' | 'optimized';

export interface RunResult {
  exitCode: number;
  outcome: RunOutcome;
  backupFile?: string;
}
