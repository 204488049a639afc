/**
 * Virtual environment management
 *
 * "Activation" for a child process means what the venv activate scripts do
 * to the shell: set VIRTUAL_ENV, put the venv bin directory first on PATH
 * and drop PYTHONHOME.
 */

import { existsSync } from 'node:fs';
import { posix, win32 } from 'node:path';
import type { ProbeExec } from './interpreter.js';
import { SpawnError, tailOutput, type StdioMode } from './process.js';
import { VenvError } from './errors.js';

/**
 * Resolved locations inside a virtual environment
 */
export interface VenvPaths {
  /** Absolute venv directory */
  dir: string;
  /** Directory holding the venv executables (bin or Scripts) */
  binDir: string;
  /** Interpreter inside the venv */
  python: string;
}

/**
 * Result of ensuring a venv exists
 */
export interface EnsureVenvResult {
  paths: VenvPaths;
  /** Whether the venv was created by this run */
  created: boolean;
}

function pathApi(platform: NodeJS.Platform): typeof posix {
  return platform === 'win32' ? win32 : posix;
}

/**
 * Compute venv paths for a platform
 */
export function getVenvPaths(
  root: string,
  venvDir: string,
  platform: NodeJS.Platform = process.platform
): VenvPaths {
  const p = pathApi(platform);
  const dir = p.resolve(root, venvDir);
  const binDir = platform === 'win32' ? p.join(dir, 'Scripts') : p.join(dir, 'bin');
  const python = p.join(binDir, platform === 'win32' ? 'python.exe' : 'python');
  return { dir, binDir, python };
}

/**
 * Create the venv with `<interpreter> -m venv <dir>` unless the directory exists
 *
 * @throws VenvError (create) when the interpreter cannot build the venv
 */
export async function ensureVenv(
  interpreter: string,
  paths: VenvPaths,
  exec: ProbeExec,
  options: { cwd: string; env?: NodeJS.ProcessEnv; stdio?: StdioMode; exists?: (path: string) => boolean }
): Promise<EnsureVenvResult> {
  const exists = options.exists ?? existsSync;
  if (exists(paths.dir)) {
    return { paths, created: false };
  }

  try {
    const result = await exec(interpreter, ['-m', 'venv', paths.dir], {
      cwd: options.cwd,
      env: options.env,
      stdio: options.stdio,
    });
    if (result.exitCode !== 0) {
      throw new VenvError('create', paths.dir, tailOutput(result.stderr) ?? `exit code ${result.exitCode}`);
    }
  } catch (error) {
    if (error instanceof SpawnError) {
      throw new VenvError('create', paths.dir, error.message);
    }
    throw error;
  }

  return { paths, created: true };
}

/**
 * Find the key used for PATH in an environment (Windows uses "Path")
 */
function findPathKey(env: NodeJS.ProcessEnv, platform: NodeJS.Platform): string {
  if (platform !== 'win32') {
    return 'PATH';
  }
  return Object.keys(env).find((key) => key.toUpperCase() === 'PATH') ?? 'Path';
}

/**
 * Build the environment of an activated venv
 */
export function buildVenvEnvironment(
  paths: VenvPaths,
  baseEnv: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...baseEnv };
  const pathKey = findPathKey(env, platform);
  const current = env[pathKey];

  env[pathKey] = current ? `${paths.binDir}${pathApi(platform).delimiter}${current}` : paths.binDir;
  env.VIRTUAL_ENV = paths.dir;
  delete env.PYTHONHOME;

  return env;
}

/**
 * Activate an existing venv for child processes
 *
 * @param verify - Check the venv interpreter exists (skipped in dry-run)
 * @throws VenvError (broken) if the venv has no interpreter
 */
export function activateVenv(
  paths: VenvPaths,
  options: {
    baseEnv?: NodeJS.ProcessEnv;
    platform?: NodeJS.Platform;
    verify?: boolean;
    exists?: (path: string) => boolean;
  } = {}
): NodeJS.ProcessEnv {
  const exists = options.exists ?? existsSync;
  if ((options.verify ?? true) && !exists(paths.python)) {
    throw new VenvError('broken', paths.dir, `Interpreter not found: ${paths.python}`);
  }
  return buildVenvEnvironment(paths, options.baseEnv, options.platform);
}
