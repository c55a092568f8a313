import { CommandFailedError } from '../errors';
import type { CommandResult, PackageList } from '../types/firmware';
import { isManagedFirmware } from './firmwareFamilies';
import { normalizePackageList, splitLines } from './packageList';

/**
 * `pkg query -x` exits non-zero when no package matches, which is not an error here.
 * On success only stdout names a package; stderr may carry warnings.
 */
export const interpretInstalledQuery = (result: CommandResult): PackageList => {
  if (result.status === 0) {
    return normalizePackageList(splitLines(result.stdout).filter(isManagedFirmware));
  }

  const output = result.output.trim();
  if (result.status !== null && (output === '' || /no packages/i.test(output))) {
    return [];
  }

  throw new CommandFailedError('pkg query', result.status, output || result.error?.message || '');
};
