/**
 * Bootstrap pipeline
 *
 * Runs the launcher steps in a fixed order. Each step reports a result
 * instead of throwing; the pipeline stops at the first failed step and
 * leaves the remaining steps pending.
 */

import type {
  CommandRecord,
  LauncherConfig,
  LaunchReport,
  StepId,
  StepReport,
} from '../types.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { LauncherError, SyncExecutionError, isLauncherError } from './errors.js';
import { SpawnRunner, DryRunRunner, type ProcessRunner, type StdioMode } from './process.js';
import { probeInterpreter, type InterpreterInfo, type ProbeExec } from './interpreter.js';
import { getVenvPaths, ensureVenv, activateVenv, type VenvPaths } from './venv.js';
import { updateSource } from './git.js';
import { installDependencies } from './dependencies.js';
import { runSyncProgram } from './exec-sync.js';
import { pinWorkingDirectory } from './workdir.js';

/** Message printed after a complete run */
export const SUCCESS_MESSAGE = 'Sync completed successfully.';

/**
 * Options for a pipeline run
 */
export interface BootstrapOptions {
  config: LauncherConfig;
  /** Command runner (defaults to spawning real processes) */
  runner?: ProcessRunner;
  /** Record commands without running them */
  dryRun?: boolean;
  /** Skip fetch/checkout/pull */
  skipUpdate?: boolean;
  /** Skip pip install */
  skipInstall?: boolean;
  /** How child output is handled (stderr keeps stdout clean for JSON) */
  stdio?: StdioMode;
  platform?: NodeJS.Platform;
  /** Environment the venv activation starts from */
  baseEnv?: NodeJS.ProcessEnv;
  chdir?: (dir: string) => void;
  logger?: Logger;
  /** Called before each step starts */
  onStepStart?: (step: { id: StepId; title: string }) => void;
  /** Clock used for step durations */
  now?: () => number;
}

/**
 * State handed from one step to the next
 */
interface StepState {
  root: string;
  env: NodeJS.ProcessEnv;
  interpreter?: InterpreterInfo;
  venv?: VenvPaths;
  syncExitCode?: number;
}

/**
 * Result of a single step
 */
export type StepOutcome =
  | { ok: true; status: 'ok' | 'skipped'; detail?: string }
  | { ok: false; error: LauncherError };

interface PipelineStep {
  id: StepId;
  title: string;
  run(state: StepState, exec: ProbeExec): Promise<StepOutcome>;
}

/**
 * Step titles, in execution order
 */
export const STEP_TITLES: Record<StepId, string> = {
  workdir: 'Pin working directory',
  python: 'Check Python interpreter',
  venv: 'Prepare virtual environment',
  update: 'Update source from remote',
  install: 'Install dependencies',
  run: 'Run sync program',
};

function skipped(detail: string): StepOutcome {
  return { ok: true, status: 'skipped', detail };
}

function done(detail?: string): StepOutcome {
  return { ok: true, status: 'ok', detail };
}

/**
 * Build the ordered step list for a run
 */
function buildSteps(options: BootstrapOptions): PipelineStep[] {
  const { config } = options;
  const platform = options.platform ?? process.platform;
  const stdio = options.stdio ?? 'inherit';
  const dryRun = options.dryRun ?? false;

  return [
    {
      id: 'workdir',
      title: STEP_TITLES.workdir,
      async run(state) {
        state.root = pinWorkingDirectory(config.root, options.chdir);
        return done(state.root);
      },
    },
    {
      id: 'python',
      title: STEP_TITLES.python,
      async run(state, exec) {
        const found = await probeInterpreter(config.interpreters, exec, { cwd: state.root, env: state.env });
        state.interpreter = found;
        return done(found.version ? `${found.command} (${found.version})` : found.command);
      },
    },
    {
      id: 'venv',
      title: STEP_TITLES.venv,
      async run(state, exec) {
        const interpreter = state.interpreter?.command ?? config.interpreters[0] ?? 'python';
        const paths = getVenvPaths(state.root, config.venvDir, platform);
        const { created } = await ensureVenv(interpreter, paths, exec, {
          cwd: state.root,
          env: state.env,
          stdio,
        });
        state.env = activateVenv(paths, { baseEnv: state.env, platform, verify: !dryRun });
        state.venv = paths;
        const action = created ? (dryRun ? 'Would create' : 'Created') : 'Using existing';
        return done(`${action} ${paths.dir}`);
      },
    },
    {
      id: 'update',
      title: STEP_TITLES.update,
      async run(state, exec) {
        if (options.skipUpdate) {
          return skipped('Skipped (--skip-update)');
        }
        await updateSource(exec, {
          remote: config.remote,
          branch: config.branch,
          cwd: state.root,
          env: state.env,
          stdio,
        });
        return done(`${config.remote}/${config.branch}`);
      },
    },
    {
      id: 'install',
      title: STEP_TITLES.install,
      async run(state, exec) {
        if (options.skipInstall) {
          return skipped('Skipped (--skip-install)');
        }
        await installDependencies(exec, {
          python: venvPython(state, config, platform),
          requirementsFile: config.requirementsFile,
          cwd: state.root,
          env: state.env,
          stdio,
        });
        return done(config.requirementsFile);
      },
    },
    {
      id: 'run',
      title: STEP_TITLES.run,
      async run(state, exec) {
        try {
          await runSyncProgram(exec, {
            python: venvPython(state, config, platform),
            entryPoint: config.entryPoint,
            extraArgs: config.entryArgs,
            cwd: state.root,
            env: state.env,
            stdio,
          });
        } catch (error) {
          if (error instanceof SyncExecutionError) {
            state.syncExitCode = error.exitCode;
          }
          throw error;
        }
        state.syncExitCode = 0;
        return done(`${config.entryPoint} exited with code 0`);
      },
    },
  ];
}

function venvPython(state: StepState, config: LauncherConfig, platform: NodeJS.Platform): string {
  return (state.venv ?? getVenvPaths(state.root, config.venvDir, platform)).python;
}

function toLauncherError(error: unknown, step: StepId): LauncherError {
  if (isLauncherError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new LauncherError(`Unexpected error: ${message}`, 'UNEXPECTED_ERROR', step);
}

/**
 * Run the bootstrap pipeline
 *
 * Never throws for step failures; inspect the report's exitCode instead.
 */
export async function runBootstrap(options: BootstrapOptions): Promise<LaunchReport> {
  const log = options.logger ?? defaultLogger;
  const now = options.now ?? Date.now;
  const dryRun = options.dryRun ?? false;
  const runner: ProcessRunner = options.runner ?? (dryRun ? new DryRunRunner() : new SpawnRunner());

  const steps = buildSteps(options);
  const reports: StepReport[] = steps.map((step) => ({
    id: step.id,
    title: step.title,
    status: 'pending',
    commands: [],
  }));

  const state: StepState = {
    root: options.config.root,
    env: { ...(options.baseEnv ?? process.env) },
  };

  log.debug('Starting bootstrap', {
    root: options.config.root,
    branch: options.config.branch,
    remote: options.config.remote,
    dryRun,
  });

  for (const [index, step] of steps.entries()) {
    const report = reports[index];
    const stepLog = log.child({ step: step.id });
    const commands: CommandRecord[] = report.commands;

    const exec: ProbeExec = async (command, args, runOptions) => {
      const record: CommandRecord = { command, args: [...args] };
      commands.push(record);
      stepLog.debug('Running command', { command, args, cwd: runOptions.cwd });
      const result = await runner.run(command, args, runOptions);
      record.exitCode = result.exitCode;
      stepLog.debug('Command finished', { command, exitCode: result.exitCode });
      return result;
    };

    options.onStepStart?.({ id: step.id, title: step.title });
    const startedAt = now();

    let outcome: StepOutcome;
    try {
      outcome = await step.run(state, exec);
    } catch (error) {
      outcome = { ok: false, error: toLauncherError(error, step.id) };
    }
    report.durationMs = now() - startedAt;

    if (!outcome.ok) {
      report.status = 'failed';
      report.error = {
        code: outcome.error.code,
        message: outcome.error.message,
        details: outcome.error.details,
      };
      stepLog.debug('Step failed', { code: outcome.error.code, details: outcome.error.details });

      return {
        success: false,
        exitCode: 1,
        message: outcome.error.message,
        dryRun,
        failedStep: step.id,
        steps: reports,
        syncExitCode: state.syncExitCode,
      };
    }

    report.status = outcome.status;
    report.detail = outcome.detail;
    stepLog.debug('Step finished', { status: outcome.status, durationMs: report.durationMs });
  }

  return {
    success: true,
    exitCode: 0,
    message: SUCCESS_MESSAGE,
    dryRun,
    steps: reports,
    syncExitCode: state.syncExitCode,
  };
}
