/**
 * Bootstrap module exports
 * Provides the launcher pipeline and the utilities behind each step
 */

// Error types
export {
  LauncherError,
  WorkingDirectoryError,
  InterpreterNotFoundError,
  VenvError,
  GitOperationError,
  DependencyInstallError,
  SyncExecutionError,
  ConfigError,
  isLauncherError,
  formatError,
} from './errors.js';

// Process execution
export {
  type RunOptions,
  type RunResult,
  type ProcessRunner,
  type StdioMode,
  type SpawnRunnerOptions,
  MAX_CAPTURED_CHARS,
  appendBounded,
  SpawnError,
  SpawnRunner,
  DryRunRunner,
  tailOutput,
} from './process.js';

// Step utilities
export { pinWorkingDirectory } from './workdir.js';
export {
  type InterpreterInfo,
  type ProbeExec,
  DEFAULT_INTERPRETERS,
  parseVersionBanner,
  findInterpreter,
  probeInterpreter,
} from './interpreter.js';
export {
  type VenvPaths,
  type EnsureVenvResult,
  getVenvPaths,
  ensureVenv,
  buildVenvEnvironment,
  activateVenv,
} from './venv.js';
export {
  type UpdateSourceOptions,
  buildUpdateCommands,
  updateSource,
  getCurrentBranch,
  getRemoteUrl,
} from './git.js';
export { type InstallOptions, buildInstallArgs, installDependencies } from './dependencies.js';
export { type ExecSyncOptions, buildSyncArgs, runSyncProgram } from './exec-sync.js';

// Pipeline
export {
  type BootstrapOptions,
  type StepOutcome,
  SUCCESS_MESSAGE,
  STEP_TITLES,
  runBootstrap,
} from './pipeline.js';

// Pause before exit
export { isInteractiveTTY, shouldPause, waitForEnter } from './pause.js';

// Sync program config inspection
export { type SyncConfigStatus, REQUIRED_SYNC_KEYS, inspectSyncConfig } from './sync-config.js';
