/**
 * Dependency installation into the active venv
 */

import type { ProbeExec } from './interpreter.js';
import { SpawnError, tailOutput, type StdioMode } from './process.js';
import { DependencyInstallError } from './errors.js';

export interface InstallOptions {
  /** Interpreter of the activated venv */
  python: string;
  /** Manifest path, relative to cwd */
  requirementsFile: string;
  cwd: string;
  env?: NodeJS.ProcessEnv;
  stdio?: StdioMode;
}

/**
 * pip arguments for installing a manifest
 */
export function buildInstallArgs(requirementsFile: string): string[] {
  return ['-m', 'pip', 'install', '-r', requirementsFile];
}

/**
 * Install the dependency manifest with pip
 *
 * @throws DependencyInstallError when pip cannot be launched or exits non-zero
 */
export async function installDependencies(exec: ProbeExec, options: InstallOptions): Promise<void> {
  try {
    const result = await exec(options.python, buildInstallArgs(options.requirementsFile), {
      cwd: options.cwd,
      env: options.env,
      stdio: options.stdio,
    });
    if (result.exitCode !== 0) {
      throw new DependencyInstallError(
        options.requirementsFile,
        result.exitCode,
        tailOutput(result.stderr) ?? `pip exited with code ${result.exitCode}`
      );
    }
  } catch (error) {
    if (error instanceof SpawnError) {
      throw new DependencyInstallError(options.requirementsFile, undefined, error.message);
    }
    throw error;
  }
}
