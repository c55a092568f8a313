import { APP_NAME } from '../config';
import { AbortedError, PreconditionError } from '../errors';
import type { Logger } from '../logger';
import { FWGET_COMMAND } from '../tools/fwgetClient';
import { PKG_COMMAND } from '../tools/pkgClient';
import type { ConsoleReporter } from '../ui/console';
import { confirm, type IPrompter } from '../ui/prompt';
import type { ICommandRunner } from './commandRunner';

export const REQUIRED_TOOLS = [PKG_COMMAND, FWGET_COMMAND] as const;

const SSH_WARNING = [
  '',
  '┌─────────────────────────────────────────────────────────────┐',
  '│ WARNING: SSH Session Detected                               │',
  '├─────────────────────────────────────────────────────────────┤',
  '│ Removing network/WiFi firmware during an SSH session may    │',
  '│ cause connectivity loss. Recommendations:                   │',
  '│   • Run from local console, or                              │',
  '│   • Ensure alternative access (IPMI, physical access), or   │',
  '│   • Verify wired connection won\'t be affected               │',
  '└─────────────────────────────────────────────────────────────┘',
  '',
];

export const requireRoot = (uid: number | undefined): void => {
  if (uid !== 0) {
    throw new PreconditionError([
      'Error: This command requires root privileges.',
      `Please run: sudo ${APP_NAME}`,
    ]);
  }
};

export const checkTools = (runner: ICommandRunner, logger: Logger): void => {
  const missing = REQUIRED_TOOLS.filter((tool) => !runner.commandExists(tool));
  if (missing.length > 0) {
    logger.error({ missing }, 'Required tools missing');
    throw new PreconditionError([
      ...missing.map((tool) => `Error: Required command '${tool}' not found in PATH.`),
      '',
      'Please ensure all required tools are installed.',
    ]);
  }
  logger.debug('Tool check passed: pkg and fwget are available');
};

export const isSshSession = (env: Record<string, string | undefined>): boolean =>
  Boolean(env.SSH_TTY) || Boolean(env.SSH_CONNECTION);

export interface SshGuardContext {
  env: Record<string, string | undefined>;
  stdinIsTTY: boolean;
  prompter: IPrompter;
  reporter: ConsoleReporter;
  logger: Logger;
}

/**
 * Removing network firmware can cut the session that is running the removal.
 * Refuse non-interactive SSH runs and make interactive ones confirm.
 */
export const guardSsh = async ({ env, stdinIsTTY, prompter, reporter, logger }: SshGuardContext): Promise<void> => {
  if (!isSshSession(env)) {
    return;
  }

  if (!stdinIsTTY) {
    logger.error('Refusing to run over SSH without an interactive terminal');
    throw new PreconditionError([
      'Error: Running over SSH in non-interactive mode.',
      'This is too dangerous as network firmware removal may cut connectivity.',
      'Please run from an interactive SSH session or local console.',
    ]);
  }

  reporter.errors(SSH_WARNING);
  const answer = await confirm(prompter, reporter, 'Continue anyway?', 'stderr');

  if (answer === 'eof') {
    logger.info('Input ended at SSH warning');
    throw new AbortedError(['', 'EOF detected. Aborted.']);
  }
  if (answer === 'no') {
    logger.info('User aborted due to SSH warning');
    throw new AbortedError(['Aborted.']);
  }

  logger.info('User chose to continue despite SSH warning');
  reporter.line();
};
