import type { Logger } from '../logger';
import { parseFwgetDryRun } from '../domain/fwgetParser';
import { CommandFailedError } from '../errors';
import type { ICommandRunner } from '../system/commandRunner';
import type { PackageList } from '../types/firmware';

export const FWGET_COMMAND = 'fwget';

export interface IFwgetClient {
  /**
   * Firmware packages the detected hardware needs but that are not installed (`fwget -n`)
   */
  listNeeded(): PackageList;

  /**
   * Install the firmware the detected hardware needs
   */
  install(): void;
}

export class FwgetClient implements IFwgetClient {
  private readonly runner: ICommandRunner;
  private readonly logger: Logger;

  constructor(runner: ICommandRunner, logger: Logger) {
    this.runner = runner;
    this.logger = logger;
  }

  listNeeded(): PackageList {
    this.logger.debug('Running fwget dry-run to detect hardware requirements');
    const result = this.runner.run(FWGET_COMMAND, ['-n']);

    // fwget exits non-zero for several non-critical reasons; the output is still usable.
    if (result.status !== 0) {
      this.logger.debug({ status: result.status }, 'fwget -n returned a non-zero exit code');
    }

    if (!result.output.trim()) {
      this.logger.debug('fwget produced no output');
      return [];
    }

    return parseFwgetDryRun(result.output);
  }

  install(): void {
    this.logger.info('Running fwget to install required firmware');
    const result = this.runner.runInteractive(FWGET_COMMAND, []);
    if (result.status !== 0) {
      this.logger.error({ status: result.status }, 'fwget failed during installation');
      throw new CommandFailedError('fwget', result.status, result.error?.message ?? '');
    }
    this.logger.info('fwget completed successfully');
  }
}
