import { Command, CommanderError } from 'commander';
import { APP_NAME, APP_VERSION, loadConfig } from './config';
import { createBackupStorage } from './config/backupStorage';
import { FirmwareOptimizer } from './domain/firmwareOptimizer';
import { MANAGED_FAMILIES } from './domain/firmwareFamilies';
import { createLogger, type Logger } from './logger';
import { SpawnCommandRunner, type ICommandRunner } from './system/commandRunner';
import { FwgetClient } from './tools/fwgetClient';
import { PkgClient } from './tools/pkgClient';
import { ConsoleReporter, type ConsoleStreams } from './ui/console';
import { ReadlinePrompter, type IPrompter } from './ui/prompt';

export interface CliOptions {
  dryRun: boolean;
  verbose: boolean;
}

export type ParsedCli = { kind: 'run'; options: CliOptions } | { kind: 'exit'; exitCode: number };

const helpFooter = (logFile: string, backupDir: string): string => `
Without options, ${APP_NAME} will:
  1. Query fwget to identify hardware-required firmware
  2. List currently installed firmware from managed families
  3. Prompt for confirmation
  4. Create backup of package list
  5. Remove managed firmware packages
  6. Run fwget to install only hardware-required firmware
  7. Verify installation success

Managed families:
${MANAGED_FAMILIES.map((family) => `  ${family.pattern.padEnd(38)}${family.description}`).join('\n')}

Examples:
  ${APP_NAME} --dry-run         # Preview changes without modification
  sudo ${APP_NAME}              # Execute firmware optimization
  sudo ${APP_NAME} --verbose    # Run with detailed logging

Files:
  ${logFile}    Operation log (when writable)
  ${backupDir}/${APP_NAME}-backup-*.txt    Package backups
`;

const buildProgram = (streams: ConsoleStreams, logFile: string, backupDir: string): Command =>
  new Command()
    .name(APP_NAME)
    .description(
      `${APP_NAME} version ${APP_VERSION}\n\n` +
        'Optimize firmware installation by removing unused firmware packages and\n' +
        'reinstalling only what the current hardware requires.',
    )
    .option('--dry-run', 'Show what would be changed without modifying the system')
    .option('-v, --verbose', 'Enable verbose output and logging')
    .helpOption('-h, --help', 'Display this help message')
    .addHelpText('after', helpFooter(logFile, backupDir))
    .allowExcessArguments(false)
    .showHelpAfterError(`Try '${APP_NAME} --help' for more information.`)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => {
        streams.stdout.write(str);
      },
      writeErr: (str) => {
        streams.stderr.write(str);
      },
    });

export const parseCliArgs = (
  argv: string[],
  streams: ConsoleStreams,
  paths: { logFile: string; backupDir: string } = loadConfig(),
): ParsedCli => {
  const program = buildProgram(streams, paths.logFile, paths.backupDir);
  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return { kind: 'exit', exitCode: error.exitCode };
    }
    throw error;
  }

  const opts = program.opts<{ dryRun?: boolean; verbose?: boolean }>();
  return { kind: 'run', options: { dryRun: opts.dryRun === true, verbose: opts.verbose === true } };
};

/**
 * Process-level collaborators, replaceable in tests.
 */
export interface CliRuntime {
  env: Record<string, string | undefined>;
  streams: ConsoleStreams;
  stdinIsTTY: boolean;
  getUid: () => number | undefined;
  logger?: Logger;
  runner?: ICommandRunner;
  prompter?: IPrompter;
  now?: () => Date;
}

const defaultRuntime = (): CliRuntime => ({
  env: process.env,
  streams: { stdout: process.stdout, stderr: process.stderr },
  stdinIsTTY: process.stdin.isTTY === true,
  getUid: () => process.getuid?.(),
});

export const runCli = async (argv: string[], overrides: Partial<CliRuntime> = {}): Promise<number> => {
  const runtime: CliRuntime = { ...defaultRuntime(), ...overrides };
  const config = loadConfig(runtime.env);

  const parsed = parseCliArgs(argv, runtime.streams, config);
  if (parsed.kind === 'exit') {
    return parsed.exitCode;
  }

  const logger = runtime.logger ?? createLogger({ logFile: config.logFile, verbose: parsed.options.verbose });
  const runner = runtime.runner ?? new SpawnCommandRunner(logger);
  const prompter = runtime.prompter ?? new ReadlinePrompter();

  const optimizer = new FirmwareOptimizer({
    logger,
    runner,
    pkg: new PkgClient(runner, logger),
    fwget: new FwgetClient(runner, logger),
    backups: createBackupStorage(config.backupDir, logger),
    prompter,
    reporter: new ConsoleReporter(config.glyphs, runtime.streams),
    env: runtime.env,
    stdinIsTTY: runtime.stdinIsTTY,
    getUid: runtime.getUid,
    now: runtime.now,
  });

  try {
    const result = await optimizer.run({ dryRun: parsed.options.dryRun });
    return result.exitCode;
  } finally {
    prompter.close();
  }
};
