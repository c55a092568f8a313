import type { PackageList } from '../types/firmware';
import { normalizePackageList } from './packageList';

// Package lines in `fwget -n` output: optional indent, a +/- marker, whitespace, then the name.
const PACKAGE_LINE_RE = /^\s*[-+]\s+(\S+)/;

export const parseFwgetDryRun = (output: string): PackageList => {
  const names: string[] = [];
  for (const line of output.split(/\r?\n/)) {
    const match = PACKAGE_LINE_RE.exec(line);
    if (match) {
      names.push(match[1]);
    }
  }
  return normalizePackageList(names);
};
