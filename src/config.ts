import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

export const APP_NAME = 'fwprune';
export const APP_VERSION = '1.0.0';

export interface GlyphConfig {
  separator: string;
  checkMark: string;
  arrow: string;
}

export interface AppConfig {
  logFile: string;
  backupDir: string;
  glyphs: GlyphConfig;
}

const DEFAULT_LOG_FILE = `/var/log/${APP_NAME}.log`;
const DEFAULT_BACKUP_DIR = '/var/tmp';

const UNICODE_GLYPHS: GlyphConfig = { separator: '─', checkMark: '✓', arrow: '→' };
const ASCII_GLYPHS: GlyphConfig = { separator: '-', checkMark: '*', arrow: '->' };

type Env = Record<string, string | undefined>;

/**
 * The first non-empty locale variable wins, the same precedence the C library
 * uses for LC_CTYPE.
 */
export const isUtf8Locale = (env: Env): boolean => {
  const locale = env.LC_ALL || env.LC_CTYPE || env.LANG || '';
  return /utf-?8/i.test(locale);
};

export const resolveGlyphs = (env: Env): GlyphConfig =>
  isUtf8Locale(env) ? UNICODE_GLYPHS : ASCII_GLYPHS;

const resolvePath = (value: string | undefined, fallback: string): string => {
  const trimmed = value?.trim();
  return trimmed ? path.resolve(trimmed) : fallback;
};

export const loadConfig = (env: Env = process.env): AppConfig => ({
  logFile: resolvePath(env.LOG_FILE, DEFAULT_LOG_FILE),
  backupDir: resolvePath(env.BACKUP_DIR, DEFAULT_BACKUP_DIR),
  glyphs: resolveGlyphs(env),
});
