import { APP_VERSION } from '../config';
import type { IBackupStorage } from '../config/backupStorage';
import { AbortedError, PreconditionError, errorMessage } from '../errors';
import type { Logger } from '../logger';
import type { ICommandRunner } from '../system/commandRunner';
import { checkTools, guardSsh, requireRoot } from '../system/preconditions';
import type { IFwgetClient } from '../tools/fwgetClient';
import type { IPkgClient } from '../tools/pkgClient';
import type { PackageList, RunOptions, RunResult } from '../types/firmware';
import type { ConsoleReporter } from '../ui/console';
import { confirm, type IPrompter } from '../ui/prompt';
import { groupByFamily } from './firmwareFamilies';

export interface FirmwareOptimizerDependencies {
  logger: Logger;
  runner: ICommandRunner;
  pkg: IPkgClient;
  fwget: IFwgetClient;
  backups: IBackupStorage;
  prompter: IPrompter;
  reporter: ConsoleReporter;
  env: Record<string, string | undefined>;
  stdinIsTTY: boolean;
  getUid: () => number | undefined;
  now?: () => Date;
}

/**
 * Per-run progress, used to tell the operator what state a failure left behind.
 */
interface RunState {
  dryRun: boolean;
  changing: boolean;
  backupFile?: string;
}

/**
 * Removes every installed package of the managed firmware families, then lets
 * fwget reinstall only what the detected hardware needs.
 */
export class FirmwareOptimizer {
  private readonly deps: FirmwareOptimizerDependencies;
  private readonly logger: Logger;
  private readonly reporter: ConsoleReporter;

  constructor(deps: FirmwareOptimizerDependencies) {
    this.deps = deps;
    this.logger = deps.logger;
    this.reporter = deps.reporter;
  }

  async run(options: RunOptions): Promise<RunResult> {
    const state: RunState = { dryRun: options.dryRun, changing: false };
    this.logger.info({ version: APP_VERSION, dryRun: options.dryRun }, 'Firmware optimization started');

    let result: RunResult;
    try {
      await this.checkPreconditions();
      result = await this.optimize(state);
    } catch (error) {
      result = this.handleError(error, state);
    }

    this.logger.info({ exitCode: result.exitCode, outcome: result.outcome }, 'Firmware optimization finished');
    return result;
  }

  private async checkPreconditions(): Promise<void> {
    const { runner, env, stdinIsTTY, prompter, getUid } = this.deps;
    requireRoot(getUid());
    checkTools(runner, this.logger);
    await guardSsh({ env, stdinIsTTY, prompter, reporter: this.reporter, logger: this.logger });
  }

  private async optimize(state: RunState): Promise<RunResult> {
    const { pkg, fwget } = this.deps;

    // Step 1
    this.reporter.section('Step 1: Hardware Firmware Requirements (fwget analysis)');
    const needed = fwget.listNeeded();
    if (needed.length > 0) {
      this.printList(needed, `${needed.length} firmware package(s) needed for current hardware`);
      this.logger.info({ count: needed.length, packages: needed }, 'Hardware firmware requirements');
    } else {
      this.reporter.line('No firmware requirements detected (or fwget produced no output)');
      this.logger.info('No firmware requirements detected');
    }

    // Step 2
    this.reporter.section('Step 2: Currently Installed Managed Firmware');
    let installed: PackageList;
    try {
      installed = pkg.listInstalledFirmware();
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Failed to query installed packages');
      this.reporter.errors([`Error: ${errorMessage(error)}`, 'Error: Failed to query installed packages']);
      return { exitCode: 1, outcome: 'aborted' };
    }

    if (installed.length === 0) {
      return this.installWithoutRemoval(needed, state);
    }

    this.printList(installed, `${installed.length} managed firmware package(s) currently installed`);
    this.logger.info(
      { count: installed.length, packages: installed, families: groupByFamily(installed) },
      'Installed managed firmware',
    );

    // Step 3
    this.reporter.section('Step 3: Planned Actions');
    if (state.dryRun) {
      this.reporter.lines([
        '[DRY RUN MODE - No changes will be made]',
        '',
        'Would execute:',
        '  1. Create backup of current package list',
        `  2. Remove ${installed.length} firmware package(s)`,
        '  3. Verify package database integrity',
        "  4. Run 'fwget' to reinstall hardware-required firmware",
        '  5. Verify firmware installation',
        '',
        'To apply these changes, run without --dry-run flag.',
      ]);
      this.logger.info('Dry run completed - no changes made');
      return { exitCode: 0, outcome: 'dry-run' };
    }

    this.reporter.lines([
      'This will:',
      '  1. Create backup of current package list',
      `  2. Remove ${installed.length} installed firmware package(s) listed above`,
      "  3. Run 'fwget' to reinstall only hardware-required firmware",
      '  4. Result: Smaller footprint, only necessary firmware installed',
      '',
    ]);

    const answer = await confirm(this.deps.prompter, this.reporter, 'Proceed with firmware optimization?');
    if (answer === 'eof') {
      this.logger.info('Input ended at confirmation');
      throw new AbortedError(['', 'EOF detected. Aborted.']);
    }
    if (answer === 'no') {
      this.reporter.line('Aborted. No changes made.');
      this.logger.info('User aborted operation');
      return { exitCode: 0, outcome: 'aborted' };
    }
    this.logger.info('User confirmed - proceeding with firmware optimization');

    return this.replaceFirmware(installed, state);
  }

  /**
   * Nothing managed is installed, so there is nothing to prune: either do
   * nothing or let fwget install what the hardware needs.
   */
  private installWithoutRemoval(needed: PackageList, state: RunState): RunResult {
    this.reporter.line('No managed firmware packages currently installed.');
    this.reporter.line();
    this.logger.info('No managed firmware packages installed');

    if (needed.length === 0) {
      this.reporter.done('No Firmware Management Needed');
      this.reporter.line('System has no firmware requirements and no managed firmware installed.');
      this.logger.info('No action needed - system has no firmware requirements');
      return { exitCode: 0, outcome: 'nothing-to-do' };
    }

    if (state.dryRun) {
      this.reporter.line('[DRY RUN] Would run: fwget');
      this.logger.info('Dry run: would install firmware');
      return { exitCode: 0, outcome: 'dry-run' };
    }

    this.reporter.line('Running fwget to install required firmware...');
    this.reporter.section('Installing Firmware');
    state.changing = true;
    try {
      this.deps.fwget.install();
    } catch (error) {
      this.reporter.error('Error: fwget failed');
      return this.failAfterChanges(error, state);
    }

    this.reporter.done('Complete');
    this.logger.info('Firmware installation completed successfully');
    return { exitCode: 0, outcome: 'installed' };
  }

  private replaceFirmware(installed: PackageList, state: RunState): RunResult {
    const { pkg, fwget, backups } = this.deps;

    this.reporter.section('Creating Backup');
    const backupFile = backups.writeBackup(installed, this.deps.now?.());
    state.backupFile = backupFile;
    this.reporter.line(`Backup created: ${backupFile}`);

    // Step 4
    this.reporter.section('Step 4: Removing Managed Firmware Packages');
    state.changing = true;
    try {
      pkg.remove(installed);
    } catch (error) {
      this.reporter.error('Error: Failed to remove packages');
      return this.failAfterChanges(error, state);
    }
    this.reporter.line();
    this.reporter.summary(`Successfully removed ${installed.length} package(s)`);

    if (!pkg.checkDatabase()) {
      this.reporter.errors([
        'Warning: Package database inconsistency detected',
        "You may want to run 'pkg check -d' manually to diagnose",
      ]);
    }

    // Step 5
    this.reporter.section('Step 5: Installing Hardware-Required Firmware');
    try {
      fwget.install();
    } catch (error) {
      this.reporter.errors(['', 'Warning: fwget encountered an error.', "Run 'fwget -v' manually for detailed information."]);
      return this.failAfterChanges(error, state);
    }

    // Step 6
    this.reporter.section('Step 6: Verifying Installation');
    const stillNeeded = fwget.listNeeded();
    if (stillNeeded.length > 0) {
      this.reporter.errors(['Warning: fwget reports some firmware still needed:', ...stillNeeded]);
      this.reporter.line();
      this.reporter.error('This may be normal if the firmware requires a reboot to activate.');
      this.logger.warn({ count: stillNeeded.length, packages: stillNeeded }, 'Firmware still reported as needed');
    } else {
      this.logger.info('All required firmware successfully installed');
    }

    this.reporter.done('Firmware Optimization Complete');
    const after = this.countInstalledAfter();
    this.reporter.lines([
      '',
      'Summary:',
      `  Before: ${installed.length} managed firmware package(s)`,
      `  After:  ${after} managed firmware package(s)`,
      `  Backup: ${backupFile}`,
      '',
      'Your system now has only hardware-required firmware installed.',
      '',
    ]);
    this.logger.info({ before: installed.length, after }, 'Optimization complete');

    return { exitCode: 0, outcome: 'optimized', backupFile };
  }

  private countInstalledAfter(): number | 'unknown' {
    try {
      return this.deps.pkg.listInstalledFirmware().length;
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Could not count installed firmware after optimization');
      return 'unknown';
    }
  }

  private printList(packages: PackageList, countLine: string): void {
    this.reporter.lines(packages);
    this.reporter.line();
    this.reporter.summary(countLine);
  }

  private failAfterChanges(error: unknown, state: RunState): RunResult {
    this.logger.error({ error: errorMessage(error) }, 'Firmware optimization failed');
    this.printRecoveryHint(state);
    return { exitCode: 1, outcome: 'aborted', backupFile: state.backupFile };
  }

  private printRecoveryHint(state: RunState): void {
    if (state.dryRun || !state.changing) {
      return;
    }
    this.reporter.errors(['', "Your system state may have changed. Consider running 'pkg check -d' to verify."]);
    if (state.backupFile) {
      this.reporter.error(`Package list backup available at: ${state.backupFile}`);
    }
  }

  private handleError(error: unknown, state: RunState): RunResult {
    if (error instanceof AbortedError) {
      this.reporter.errors(error.lines);
      return { exitCode: 0, outcome: 'aborted' };
    }

    if (error instanceof PreconditionError) {
      this.logger.error({ reason: error.message }, 'Precondition failed');
      this.reporter.errors(error.lines);
      return { exitCode: error.exitCode, outcome: 'aborted' };
    }

    this.logger.error({ error: errorMessage(error) }, 'Firmware optimization failed');
    this.reporter.error(`Error: ${errorMessage(error)}`);
    this.printRecoveryHint(state);
    return { exitCode: 1, outcome: 'aborted', backupFile: state.backupFile };
  }
}
