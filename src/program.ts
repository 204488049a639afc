/**
 * sync-launcher command-line program
 *
 * Commands:
 * - run (default): pin the project directory, check Python, prepare the venv,
 *   pull the configured branch, install requirements and run main.py
 * - status: show whether the project is ready to launch
 */

import { Command, Option } from 'commander';
import type { GlobalOptions, CommandContext, PausePolicy } from './types.js';
import { runCommand, statusCommand } from './commands/index.js';
import { PAUSE_POLICIES, type LauncherCliOverrides } from './config/index.js';
import { printResult, error } from './utils/output.js';
import { logger } from './utils/logger.js';

/**
 * Command handlers and process exit, replaceable for tests
 */
export interface ProgramDeps {
  run?: typeof runCommand;
  status?: typeof statusCommand;
  exit?: (code: number) => void;
}

const VERSION = '0.1.0';

/**
 * Options shared by commands that read the launcher configuration
 */
interface LaunchFlags {
  dir?: string;
  branch?: string;
  remote?: string;
  venv?: string;
  requirements?: string;
  entry?: string;
  python?: string[];
  pause?: PausePolicy | false;
  dryRun?: boolean;
  skipUpdate?: boolean;
  skipInstall?: boolean;
}

/**
 * Create the command context from parsed options
 */
function createContext(options: GlobalOptions): CommandContext {
  if (options.verbose) {
    logger.setConfig({ level: 'debug' });
  }
  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
  };
}

function toOverrides(flags: LaunchFlags, entryArgs: string[] = []): LauncherCliOverrides {
  return {
    dir: flags.dir,
    branch: flags.branch,
    remote: flags.remote,
    venv: flags.venv,
    requirements: flags.requirements,
    entry: flags.entry,
    python: flags.python,
    // --no-pause sets the flag to false
    pause: flags.pause === false ? 'never' : flags.pause,
    entryArgs,
  };
}

function addConfigOptions(command: Command): Command {
  return command
    .addOption(new Option('-d, --dir <path>', 'Project directory containing main.py'))
    .addOption(new Option('-b, --branch <name>', 'Branch to fetch and check out (e.g. main, dev)'))
    .addOption(new Option('--remote <name>', 'Git remote to fetch from'))
    .addOption(new Option('--venv <dir>', 'Virtual environment directory'))
    .addOption(new Option('--requirements <file>', 'Dependency manifest'))
    .addOption(new Option('--entry <file>', 'Sync program entry point'))
    .addOption(new Option('--python <commands...>', 'Interpreter commands to try, in order'));
}

/**
 * Build the CLI program
 */
export function createProgram(deps: ProgramDeps = {}): Command {
  const run = deps.run ?? runCommand;
  const status = deps.status ?? statusCommand;
  const exit = deps.exit ?? ((code: number) => process.exit(code));

  const program = new Command()
    .name('sync-launcher')
    .description('Update, install and run the Jira to Todoist sync')
    .version(VERSION)
    // Global options available to all commands
    .addOption(
      new Option('--json', 'Output JSON for CI/automation')
        .default(false)
    )
    .addOption(
      new Option('-v, --verbose', 'Enable verbose logging')
        .default(false)
    )
    // Commander's own exits (help, version, usage errors) go through exit too
    .exitOverride((err) => {
      exit(err.exitCode);
      throw err;
    });

  /**
   * run command - the default
   */
  addConfigOptions(
    program
      .command('run', { isDefault: true })
      .description('Prepare the environment and run the sync program')
  )
    .addOption(new Option('--pause <policy>', 'When to wait for Enter before exiting').choices([...PAUSE_POLICIES]))
    .option('--no-pause', 'Never wait for Enter before exiting')
    .option('--dry-run', 'Show the commands without running them', false)
    .option('--skip-update', 'Do not fetch or check out the branch', false)
    .option('--skip-install', 'Do not install requirements', false)
    .argument('[args...]', 'Arguments passed to the sync program (after --)')
    .action(async (args: string[], cmdOpts: LaunchFlags) => {
      const globalOpts = program.opts<GlobalOptions>();
      const ctx = createContext(globalOpts);

      try {
        const result = await run(ctx, {
          overrides: toOverrides(cmdOpts, args),
          dryRun: cmdOpts.dryRun,
          skipUpdate: cmdOpts.skipUpdate,
          skipInstall: cmdOpts.skipInstall,
        });

        if (ctx.outputFormat === 'json') {
          printResult(result, ctx.outputFormat);
        }

        exit(result.success ? 0 : 1);
      } catch (err) {
        error(`Launch failed: ${err instanceof Error ? err.message : String(err)}`);
        exit(1);
      }
    });

  /**
   * status command - Show readiness
   */
  addConfigOptions(
    program
      .command('status')
      .description('Show interpreter, venv, git and sync config status')
  ).action(async (cmdOpts: LaunchFlags) => {
    const globalOpts = program.opts<GlobalOptions>();
    const ctx = createContext(globalOpts);

    try {
      const result = await status(ctx, { overrides: toOverrides(cmdOpts) });

      if (ctx.outputFormat === 'json') {
        printResult(result, ctx.outputFormat);
      }

      exit(result.success ? 0 : 1);
    } catch (err) {
      error(`Status failed: ${err instanceof Error ? err.message : String(err)}`);
      exit(1);
    }
  });

  return program;
}
