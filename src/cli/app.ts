import yargs from 'yargs';

import { profilesFilePath } from '../config/index.js';
import type { Scope } from '../config/schema.js';
import { describeError, GitUsrError } from '../core/errors.js';
import { configureLogger, error as logError, setLevel } from '../core/logger.js';
import { printCompletion } from './commands/completion.js';
import * as profileCommands from './commands/profile/index.js';
import { consoleOutput, createCliContext, type CliContext, type Output } from './context.js';
import { usageText, versionBanner } from './help.js';
import { readPackageVersion } from './version.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const HELP_FLAGS = new Set(['--help', '-h']);
const VERSION_FLAGS = new Set(['--version', '-v']);

function clampVerbose(value: number): number {
  if (value < 0) return 0;
  if (value > 3) return 3;
  return Math.floor(value);
}

function normalizeVerbose(value: unknown): number | undefined {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return undefined;
  }
  return clampVerbose(value);
}

function scopeOf(global: boolean): Scope {
  return global ? 'global' : 'local';
}

export function handleCommandError(error: unknown, out: Output): number {
  out.error(`✗ ${describeError(error)}`);
  if (error instanceof GitUsrError && error.hint) {
    out.error(error.hint);
  }
  logError('cli', describeError(error), error instanceof Error ? { name: error.name, stack: error.stack } : undefined);
  return EXIT_FAILURE;
}

/** A leading `--help` or `--version` acts like the matching command. */
export function normalizeArgv(argv: string[]): string[] {
  const [first] = argv;
  if (first === undefined) return argv;
  if (HELP_FLAGS.has(first)) return ['help'];
  if (VERSION_FLAGS.has(first)) return ['version'];
  return argv;
}

export async function runCli(argv: string[], ctx: CliContext): Promise<number> {
  let exitCode = EXIT_OK;
  let usageFailed = false;

  configureLogger({ level: ctx.settings.verbose, file: ctx.settings.logFile });

  // yargs still calls the handler after a custom fail callback has run.
  const guard = async (action: () => void | Promise<void>): Promise<void> => {
    if (usageFailed) return;
    try {
      await action();
    } catch (error) {
      exitCode = handleCommandError(error, ctx.out);
    }
  };

  const showHelp = () => {
    ctx.out.log(usageText(profilesFilePath({ configDir: ctx.settings.configDir })));
  };

  const parser = yargs(normalizeArgv(argv))
    .scriptName('git-usr')
    .help(false)
    .version(false)
    .exitProcess(false)
    .strict()
    .fail((msg, err) => {
      if (usageFailed) return;
      ctx.out.error(`✗ ${msg || describeError(err)}`);
      usageFailed = true;
      showHelp();
      exitCode = EXIT_USAGE;
    })
    .option('global', {
      type: 'boolean',
      default: false,
      description: 'Apply to the global git config'
    })
    .option('json', {
      type: 'boolean',
      default: false,
      description: 'Output JSON where supported'
    })
    .option('verbose', {
      type: 'number',
      description: 'Verbose output level (0-3)',
      coerce: normalizeVerbose
    })
    .middleware((args) => {
      if (typeof args.verbose === 'number') {
        setLevel(args.verbose);
      }
    })
    .command(
      '$0 [profile]',
      'Switch to a profile',
      (y) => y.positional('profile', { type: 'string', describe: 'Profile to switch to' }),
      async (args) => {
        const profile = args.profile;
        await guard(() =>
          profile ? profileCommands.switchProfile(ctx, profile, scopeOf(args.global)) : showHelp()
        );
      }
    )
    .command(
      'list',
      'List all profiles',
      (y) => y,
      async (args) => {
        await guard(() => profileCommands.list(ctx, { json: args.json }));
      }
    )
    .command(
      'current',
      'Show current git config',
      (y) => y,
      async (args) => {
        await guard(() =>
          profileCommands.current(ctx, { json: args.json, scope: args.global ? 'global' : undefined })
        );
      }
    )
    .command(
      'add <profile> [name] [email]',
      'Add or update a profile',
      (y) =>
        y
          .positional('profile', { type: 'string', demandOption: true })
          .positional('name', { type: 'string', describe: 'Display name' })
          .positional('email', { type: 'string', describe: 'Email address' }),
      async (args) => {
        await guard(() => profileCommands.add(ctx, args.profile, args.name, args.email));
      }
    )
    .command(
      'remove <profile>',
      'Remove a profile',
      (y) => y.positional('profile', { type: 'string', demandOption: true }),
      async (args) => {
        await guard(() => profileCommands.remove(ctx, args.profile));
      }
    )
    .command(
      'completion <shell>',
      'Generate completion script',
      (y) => y.positional('shell', { type: 'string', demandOption: true }),
      async (args) => {
        await guard(() => printCompletion(ctx, args.shell));
      }
    )
    .command(
      'help',
      'Show help',
      (y) => y,
      () => guard(showHelp)
    )
    .command(
      'version',
      'Show version information',
      (y) => y,
      () => guard(() => ctx.out.log(versionBanner(readPackageVersion())))
    );

  await parser.parseAsync();
  return exitCode;
}

export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let ctx: CliContext;
  try {
    ctx = createCliContext(env);
  } catch (error) {
    return handleCommandError(error, consoleOutput);
  }
  return runCli(argv, ctx);
}
