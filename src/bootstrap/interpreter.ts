/**
 * Python interpreter discovery
 */

import type { ProcessRunner, RunOptions, RunResult } from './process.js';
import { SpawnError } from './process.js';
import { InterpreterNotFoundError } from './errors.js';

/**
 * Interpreter found on PATH
 */
export interface InterpreterInfo {
  /** Command that answered, e.g. "python3" */
  command: string;
  /** Version banner, e.g. "Python 3.12.1" */
  version: string;
}

/**
 * Run function used by the probe (a ProcessRunner's run, possibly wrapped)
 */
export type ProbeExec = ProcessRunner['run'];

/**
 * Default interpreter candidates, in probe order
 */
export const DEFAULT_INTERPRETERS: readonly string[] = ['python', 'python3'];

/**
 * Extract the version banner from `python --version` output
 * Python 2 prints it on stderr, Python 3 on stdout
 */
export function parseVersionBanner(result: RunResult): string {
  const banner = (result.stdout.trim() || result.stderr.trim()).split(/\r?\n/)[0];
  return banner ?? '';
}

/**
 * Find the first interpreter that answers `--version` with exit code 0
 *
 * @param candidates - Commands to try, in order
 * @param exec - Command runner
 * @param options - cwd/env for the probe (output is always captured)
 * @returns Interpreter info, or null when none answered
 */
export async function findInterpreter(
  candidates: readonly string[],
  exec: ProbeExec,
  options: Omit<RunOptions, 'stdio'>
): Promise<InterpreterInfo | null> {
  for (const command of candidates) {
    let result: RunResult;
    try {
      result = await exec(command, ['--version'], { ...options, stdio: 'capture' });
    } catch (error) {
      if (error instanceof SpawnError) {
        continue;
      }
      throw error;
    }

    if (result.exitCode === 0) {
      return { command, version: parseVersionBanner(result) };
    }
  }
  return null;
}

/**
 * Like findInterpreter, but fails the step when nothing answers
 *
 * @throws InterpreterNotFoundError
 */
export async function probeInterpreter(
  candidates: readonly string[],
  exec: ProbeExec,
  options: Omit<RunOptions, 'stdio'>
): Promise<InterpreterInfo> {
  const found = await findInterpreter(candidates, exec, options);
  if (!found) {
    throw new InterpreterNotFoundError([...candidates]);
  }
  return found;
}
