/**
 * Command exports
 */

export { runCommand, type RunCommandOptions, type RunCommandDeps } from './run.js';
export { statusCommand, type StatusCommandOptions, type StatusCommandDeps, type LauncherStatus } from './status.js';
