import fs from 'fs';
import path from 'path';
import { APP_NAME } from '../config';
import { BackupError, errorMessage } from '../errors';
import type { Logger } from '../logger';
import type { PackageList } from '../types/firmware';

/**
 * Package list snapshots kept for manual recovery. Nothing reads them back.
 */
export interface IBackupStorage {
  writeBackup(packages: PackageList, now?: Date): string;
}

export const backupFileName = (now: Date): string =>
  `${APP_NAME}-backup-${Math.floor(now.getTime() / 1000)}.txt`;

const ensureDir = (dir: string) => {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

export const createBackupStorage = (backupDir: string, logger: Logger): IBackupStorage => ({
  writeBackup: (packages: PackageList, now: Date = new Date()): string => {
    const file = path.join(backupDir, backupFileName(now));
    try {
      ensureDir(backupDir);
      fs.writeFileSync(file, packages.map((name) => `${name}\n`).join(''), { mode: 0o644 });
    } catch (error) {
      logger.error({ file, error: errorMessage(error) }, 'Failed to write backup');
      throw new BackupError(file, error);
    }
    logger.info({ file, count: packages.length }, 'Created package list backup');
    return file;
  },
});
