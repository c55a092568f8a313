import type { Logger } from '../logger';
import { managedFirmwarePattern } from '../domain/firmwareFamilies';
import { interpretInstalledQuery } from '../domain/pkgQuery';
import { CommandFailedError } from '../errors';
import type { ICommandRunner } from '../system/commandRunner';
import type { PackageList } from '../types/firmware';

export const PKG_COMMAND = 'pkg';

/**
 * Package manager operations on the managed firmware families.
 */
export interface IPkgClient {
  /**
   * Installed packages whose names match a managed family
   */
  listInstalledFirmware(): PackageList;

  /**
   * Remove packages without prompting; throws CommandFailedError on failure
   */
  remove(packages: PackageList): void;

  /**
   * Package database dependency check; true when consistent
   */
  checkDatabase(): boolean;
}

export class PkgClient implements IPkgClient {
  private readonly runner: ICommandRunner;
  private readonly logger: Logger;

  constructor(runner: ICommandRunner, logger: Logger) {
    this.runner = runner;
    this.logger = logger;
  }

  listInstalledFirmware(): PackageList {
    this.logger.debug('Querying installed firmware packages');
    // -x takes an extended regex; -e would treat the pattern as a query expression
    const result = this.runner.run(PKG_COMMAND, ['query', '-x', '%n', managedFirmwarePattern()]);
    const packages = interpretInstalledQuery(result);
    if (packages.length === 0) {
      this.logger.debug('No matching firmware packages found');
    }
    return packages;
  }

  remove(packages: PackageList): void {
    if (packages.length === 0) {
      return;
    }

    this.logger.info({ packages }, 'Removing packages');
    const result = this.runner.runInteractive(PKG_COMMAND, ['remove', '-y', ...packages]);
    if (result.status !== 0) {
      this.logger.error({ status: result.status }, 'Package removal failed');
      throw new CommandFailedError('pkg remove', result.status, result.error?.message ?? '');
    }
    this.logger.info({ count: packages.length }, 'Removed packages');
  }

  checkDatabase(): boolean {
    this.logger.debug('Verifying package database integrity');
    const result = this.runner.run(PKG_COMMAND, ['check', '-d']);
    if (result.status === 0) {
      this.logger.debug('Package database verification passed');
      return true;
    }
    this.logger.warn({ status: result.status, output: result.output.trim() }, 'Package database verification failed');
    return false;
  }
}
