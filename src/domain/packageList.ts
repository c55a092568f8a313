import type { PackageList } from '../types/firmware';

export const splitLines = (text: string): string[] =>
  text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

/**
 * Trim, drop blanks, dedupe and sort by code unit order. Idempotent.
 */
export const normalizePackageList = (names: Iterable<string>): PackageList => {
  const unique = new Set<string>();
  for (const name of names) {
    const trimmed = name.trim();
    if (trimmed) {
      unique.add(trimmed);
    }
  }
  return Array.from(unique).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
};
