/**
 * run command - Update, install and launch the sync program
 */

import type { CommandContext, CommandResult, LaunchReport, PausePolicy } from '../types.js';
import {
  info,
  success,
  error as errorOutput,
  verbose,
  header,
  dryRunNotice,
  printLaunchReport,
} from '../utils/output.js';
import {
  resolveLauncherConfig,
  type LauncherCliOverrides,
  type LauncherConfigResolution,
} from '../config/index.js';
import {
  runBootstrap,
  formatError,
  isLauncherError,
  isInteractiveTTY,
  shouldPause,
  waitForEnter,
  type ProcessRunner,
} from '../bootstrap/index.js';

export interface RunCommandOptions {
  /** Settings given on the command line */
  overrides?: LauncherCliOverrides;
  /** Show the commands without running them */
  dryRun?: boolean;
  /** Skip git fetch/checkout/pull */
  skipUpdate?: boolean;
  /** Skip pip install */
  skipInstall?: boolean;
}

/**
 * Collaborators that tests replace
 */
export interface RunCommandDeps {
  runner?: ProcessRunner;
  chdir?: (dir: string) => void;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  platform?: NodeJS.Platform;
  interactive?: boolean;
  pause?: () => Promise<void>;
}

async function maybePause(
  ctx: CommandContext,
  policy: PausePolicy,
  succeeded: boolean,
  deps: RunCommandDeps
): Promise<void> {
  const interactive = ctx.outputFormat === 'human' && (deps.interactive ?? isInteractiveTTY());
  if (shouldPause(policy, succeeded, interactive)) {
    await (deps.pause ?? waitForEnter)();
  }
}

/**
 * Execute the run command
 * Runs the bootstrap pipeline and reports the outcome
 */
export async function runCommand(
  ctx: CommandContext,
  options: RunCommandOptions = {},
  deps: RunCommandDeps = {}
): Promise<CommandResult<LaunchReport>> {
  const { options: globalOpts, outputFormat } = ctx;
  const overrides = options.overrides ?? {};

  verbose('Executing run command', globalOpts.verbose);

  let resolution: LauncherConfigResolution;
  try {
    resolution = resolveLauncherConfig({ cli: overrides, env: deps.env, cwd: deps.cwd });
  } catch (err) {
    if (!isLauncherError(err)) {
      throw err;
    }
    if (outputFormat === 'human') {
      errorOutput(formatError(err));
    }
    await maybePause(ctx, overrides.pause ?? 'on-failure', false, deps);
    return {
      success: false,
      message: err.message,
      errors: err.details ? [err.details] : undefined,
    };
  }

  const { config } = resolution;
  verbose(`Config file: ${resolution.configFile ?? '(none)'}`, globalOpts.verbose);
  verbose(`Interpreters: ${config.interpreters.join(', ')} (via ${resolution.sources.interpreters})`, globalOpts.verbose);

  if (outputFormat === 'human') {
    header('Jira to Todoist Sync');
    info(`Project: ${config.root}`);
    info(`Branch: ${config.remote}/${config.branch}`);
    if (options.dryRun) {
      dryRunNotice();
    }
  }

  const report = await runBootstrap({
    config,
    runner: deps.runner,
    dryRun: options.dryRun,
    skipUpdate: options.skipUpdate,
    skipInstall: options.skipInstall,
    stdio: outputFormat === 'json' ? 'stderr' : 'inherit',
    baseEnv: deps.env,
    platform: deps.platform,
    chdir: deps.chdir,
    onStepStart: (step) => {
      if (outputFormat === 'human') {
        info(`${step.title}...`);
      }
    },
  });

  const failed = report.steps.find((step) => step.status === 'failed');

  if (outputFormat === 'human') {
    if (options.dryRun || globalOpts.verbose) {
      printLaunchReport(report, outputFormat);
    }
    if (report.success) {
      success(report.message);
    } else {
      errorOutput(report.message);
      if (failed?.error?.details) {
        console.log(failed.error.details);
      }
    }
  }

  await maybePause(ctx, config.pause, report.success, deps);

  return {
    success: report.success,
    message: report.message,
    data: report,
    errors: failed?.error?.details ? [failed.error.details] : undefined,
  };
}
