/**
 * Git utilities for the source update step
 * Fetches the configured branch, checks it out and fast-forwards it
 */

import type { ProbeExec } from './interpreter.js';
import { SpawnError, tailOutput, type StdioMode } from './process.js';
import { GitOperationError } from './errors.js';

/**
 * Options for updating the working tree
 */
export interface UpdateSourceOptions {
  /** Remote name, e.g. "origin" */
  remote: string;
  /** Branch to check out, e.g. "main" or "dev" */
  branch: string;
  /** Repository directory */
  cwd: string;
  env?: NodeJS.ProcessEnv;
  stdio?: StdioMode;
}

/**
 * The git invocations performed by updateSource, in order
 */
export function buildUpdateCommands(remote: string, branch: string): string[][] {
  return [
    ['fetch', remote, branch],
    ['checkout', branch],
    ['pull', '--ff-only', remote, branch],
  ];
}

/**
 * Execute a git command, converting any failure into GitOperationError
 */
async function execGit(exec: ProbeExec, args: string[], options: UpdateSourceOptions): Promise<void> {
  const command = `git ${args.join(' ')}`;
  try {
    const result = await exec('git', args, {
      cwd: options.cwd,
      env: options.env,
      stdio: options.stdio,
    });
    if (result.exitCode !== 0) {
      throw new GitOperationError(
        command,
        result.exitCode,
        tailOutput(result.stderr) ?? `Command: ${command} (exit code ${result.exitCode})`
      );
    }
  } catch (error) {
    if (error instanceof SpawnError) {
      throw new GitOperationError(
        command,
        undefined,
        error.notFound ? 'Git is not installed or not available in PATH' : error.message
      );
    }
    throw error;
  }
}

/**
 * Bring the working tree up to date with `<remote>/<branch>`
 *
 * @throws GitOperationError on the first failing git command
 */
export async function updateSource(exec: ProbeExec, options: UpdateSourceOptions): Promise<void> {
  for (const args of buildUpdateCommands(options.remote, options.branch)) {
    await execGit(exec, args, options);
  }
}

/**
 * Run a read-only git query, returning trimmed stdout or undefined on any failure
 */
async function queryGit(exec: ProbeExec, args: string[], cwd: string): Promise<string | undefined> {
  try {
    const result = await exec('git', args, { cwd, stdio: 'capture' });
    const out = result.stdout.trim();
    return result.exitCode === 0 && out.length > 0 ? out : undefined;
  } catch (error) {
    if (error instanceof SpawnError) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Get the current branch name
 *
 * @returns Branch name or undefined outside a repository or without git
 */
export function getCurrentBranch(exec: ProbeExec, cwd: string): Promise<string | undefined> {
  return queryGit(exec, ['rev-parse', '--abbrev-ref', 'HEAD'], cwd);
}

/**
 * Get the URL of a remote
 *
 * @returns Remote URL or undefined if the remote is not configured
 */
export function getRemoteUrl(exec: ProbeExec, cwd: string, remote: string): Promise<string | undefined> {
  return queryGit(exec, ['remote', 'get-url', remote], cwd);
}
