/**
 * status command - Show whether the project is ready to launch
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import type { CommandContext, CommandResult, ConfigSource } from '../types.js';
import { printStatus, error as errorOutput, verbose } from '../utils/output.js';
import { redactPatterns } from '../utils/logger.js';
import {
  resolveLauncherConfig,
  type LauncherCliOverrides,
  type LauncherConfigResolution,
} from '../config/index.js';
import {
  SpawnRunner,
  findInterpreter,
  getVenvPaths,
  getCurrentBranch,
  getRemoteUrl,
  inspectSyncConfig,
  formatError,
  isLauncherError,
  type ProcessRunner,
} from '../bootstrap/index.js';

export interface LauncherStatus {
  root: string;
  configFile?: string;
  branch: string;
  branchSource: ConfigSource;
  remote: string;
  remoteUrl?: string;
  currentBranch?: string;
  interpreter?: string;
  interpreterVersion?: string;
  venv: string;
  venvPresent: boolean;
  venvInterpreterPresent: boolean;
  requirementsPresent: boolean;
  entryPoint: string;
  entryPointPresent: boolean;
  syncConfigPresent: boolean;
  syncConfigMissingKeys: string[];
  syncDebug: boolean;
  runnable: boolean;
}

export interface StatusCommandOptions {
  overrides?: LauncherCliOverrides;
}

export interface StatusCommandDeps {
  runner?: ProcessRunner;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  platform?: NodeJS.Platform;
}

/**
 * Execute the status command
 * Only runs read-only probes (python --version, git rev-parse, git remote get-url)
 */
export async function statusCommand(
  ctx: CommandContext,
  options: StatusCommandOptions = {},
  deps: StatusCommandDeps = {}
): Promise<CommandResult<LauncherStatus>> {
  const { options: globalOpts, outputFormat } = ctx;

  verbose('Executing status command', globalOpts.verbose);

  let resolution: LauncherConfigResolution;
  try {
    resolution = resolveLauncherConfig({ cli: options.overrides, env: deps.env, cwd: deps.cwd });
  } catch (err) {
    if (!isLauncherError(err)) {
      throw err;
    }
    if (outputFormat === 'human') {
      errorOutput(formatError(err));
    }
    return { success: false, message: err.message, errors: err.details ? [err.details] : undefined };
  }

  const { config, sources } = resolution;
  const runner = deps.runner ?? new SpawnRunner();
  const exec = runner.run.bind(runner);
  const env = deps.env ?? process.env;

  const interpreter = existsSync(config.root)
    ? await findInterpreter(config.interpreters, exec, { cwd: config.root, env })
    : null;
  const venv = getVenvPaths(config.root, config.venvDir, deps.platform);
  const currentBranch = existsSync(config.root) ? await getCurrentBranch(exec, config.root) : undefined;
  const remoteUrl = existsSync(config.root) ? await getRemoteUrl(exec, config.root, config.remote) : undefined;
  const syncConfig = inspectSyncConfig(config.root, config.syncConfigFile);
  const entryPointPresent = existsSync(resolve(config.root, config.entryPoint));

  const status: LauncherStatus = {
    root: config.root,
    configFile: resolution.configFile,
    branch: config.branch,
    branchSource: sources.branch,
    remote: config.remote,
    remoteUrl: remoteUrl ? redactPatterns(remoteUrl) : undefined,
    currentBranch,
    interpreter: interpreter?.command,
    interpreterVersion: interpreter?.version,
    venv: venv.dir,
    venvPresent: existsSync(venv.dir),
    venvInterpreterPresent: existsSync(venv.python),
    requirementsPresent: existsSync(resolve(config.root, config.requirementsFile)),
    entryPoint: config.entryPoint,
    entryPointPresent,
    syncConfigPresent: syncConfig.present,
    syncConfigMissingKeys: syncConfig.missingKeys,
    syncDebug: syncConfig.debug,
    runnable: interpreter !== null && entryPointPresent,
  };

  const errors: string[] = [];
  if (!interpreter) {
    errors.push('Python is not installed or not in PATH.');
  }
  if (!entryPointPresent) {
    errors.push(`Entry point not found: ${resolve(config.root, config.entryPoint)}`);
  }
  if (syncConfig.error) {
    errors.push(`${syncConfig.path}: ${syncConfig.error}`);
  }

  if (outputFormat === 'human') {
    printStatus({ ...status }, outputFormat);
    console.log('');
    errors.forEach((message) => errorOutput(message));
  }

  return {
    success: status.runnable,
    message: status.runnable ? 'Ready to launch' : 'Not ready to launch',
    data: status,
    errors: errors.length > 0 ? errors : undefined,
  };
}
