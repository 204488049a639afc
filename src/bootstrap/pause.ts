/**
 * Pause before exit
 *
 * When the launcher is started from a desktop shortcut the console window
 * closes as soon as the process ends, so the operator is asked to press
 * Enter first.
 */

import { createInterface } from 'node:readline';
import type { PausePolicy } from '../types.js';

/**
 * Check if running in an interactive TTY environment
 */
export function isInteractiveTTY(): boolean {
  return Boolean(
    process.stdin.isTTY &&
    process.stdout.isTTY &&
    !process.env.CI &&
    !process.env.CONTINUOUS_INTEGRATION
  );
}

/**
 * Decide whether to wait for the operator
 */
export function shouldPause(policy: PausePolicy, succeeded: boolean, interactive: boolean): boolean {
  if (!interactive) {
    return false;
  }
  switch (policy) {
    case 'always':
      return true;
    case 'on-failure':
      return !succeeded;
    case 'never':
      return false;
  }
}

/**
 * Wait until the operator presses Enter
 */
export function waitForEnter(message = 'Press Enter to continue...'): Promise<void> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(message, () => {
      rl.close();
      resolve();
    });
  });
}
