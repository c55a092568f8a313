import fs from 'fs';
import pino, { type Logger, type StreamEntry } from 'pino';
import pretty from 'pino-pretty';
import { APP_NAME } from './config';

export type { Logger } from 'pino';

export interface LoggerOptions {
  logFile: string;
  verbose: boolean;
}

/**
 * Returns an open append descriptor, or null when the log file is not writable
 * (non-root dry runs, read-only /var/log). The operation log is best effort.
 */
const openLogFile = (logFile: string): number | null => {
  try {
    return fs.openSync(logFile, 'a');
  } catch {
    return null;
  }
};

export const createLogger = ({ logFile, verbose }: LoggerOptions): Logger => {
  const level = verbose ? 'debug' : 'info';
  const streams: StreamEntry[] = [];

  const fd = openLogFile(logFile);
  if (fd !== null) {
    streams.push({ level, stream: pino.destination({ dest: fd, sync: true }) });
  }

  if (verbose) {
    streams.push({
      level,
      stream: pretty({
        colorize: process.stderr.isTTY === true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,name',
        destination: 2,
        sync: true,
      }),
    });
  }

  if (streams.length === 0) {
    return pino({ name: APP_NAME, enabled: false });
  }

  return pino({ name: APP_NAME, level }, pino.multistream(streams));
};
