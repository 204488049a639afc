/**
 * Working directory pinning
 * All relative paths (venv, requirements.txt, main.py) resolve against the project root
 */

import { statSync } from 'node:fs';
import { resolve } from 'node:path';
import { WorkingDirectoryError } from './errors.js';

/**
 * Resolve the project root to an absolute directory and switch to it
 *
 * @param root - Project root (absolute or relative to the current directory)
 * @param chdir - Directory switcher (process.chdir outside of tests)
 * @returns Absolute path of the pinned directory
 * @throws WorkingDirectoryError if the path is missing or not a directory
 */
export function pinWorkingDirectory(
  root: string,
  chdir: (dir: string) => void = (dir) => process.chdir(dir)
): string {
  const absolute = resolve(root);

  let isDirectory = false;
  try {
    isDirectory = statSync(absolute).isDirectory();
  } catch {
    isDirectory = false;
  }

  if (!isDirectory) {
    throw new WorkingDirectoryError(absolute);
  }

  chdir(absolute);
  return absolute;
}
