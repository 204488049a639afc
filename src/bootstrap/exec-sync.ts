/**
 * Exec Sync - Launch the Jira to Todoist sync program
 *
 * This is the final step in the bootstrap flow. After the venv is active
 * and dependencies are installed, the entry point is run with the venv
 * interpreter in the launcher's stdio mode, and its exit status is surfaced.
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import type { ProbeExec } from './interpreter.js';
import { SpawnError, type StdioMode } from './process.js';
import { SyncExecutionError } from './errors.js';

/**
 * Options for executing the sync program
 */
export interface ExecSyncOptions {
  /** Interpreter of the activated venv */
  python: string;
  /** Entry point, relative to cwd */
  entryPoint: string;
  /** Additional arguments to pass to the entry point */
  extraArgs?: string[];
  cwd: string;
  env?: NodeJS.ProcessEnv;
  stdio?: StdioMode;
}

/**
 * Build the interpreter arguments for the entry point
 */
export function buildSyncArgs(options: Pick<ExecSyncOptions, 'entryPoint' | 'extraArgs'>): string[] {
  const args = [options.entryPoint];
  if (options.extraArgs) {
    args.push(...options.extraArgs);
  }
  return args;
}

/**
 * Run the sync program and wait for it to exit
 *
 * @throws SyncExecutionError if the entry point is missing, cannot be launched or exits non-zero
 */
export async function runSyncProgram(exec: ProbeExec, options: ExecSyncOptions): Promise<void> {
  const entryPath = resolve(options.cwd, options.entryPoint);
  if (!existsSync(entryPath)) {
    throw new SyncExecutionError(options.entryPoint, undefined, `Entry point not found: ${entryPath}`);
  }

  let exitCode: number;
  try {
    const result = await exec(options.python, buildSyncArgs(options), {
      cwd: options.cwd,
      env: options.env,
      stdio: options.stdio,
    });
    exitCode = result.exitCode;
  } catch (error) {
    if (error instanceof SpawnError) {
      throw new SyncExecutionError(options.entryPoint, undefined, error.message);
    }
    throw error;
  }

  if (exitCode !== 0) {
    throw new SyncExecutionError(options.entryPoint, exitCode);
  }
}
