/**
 * Shared types and interfaces for the sync-launcher CLI
 */

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
}

/**
 * Output format for command results
 */
export type OutputFormat = 'human' | 'json';

/**
 * Command execution context
 */
export interface CommandContext {
  options: GlobalOptions;
  outputFormat: OutputFormat;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}

// ============================================================================
// Launcher Configuration Types
// ============================================================================

/**
 * When to wait for the operator before the process exits
 */
export type PausePolicy = 'on-failure' | 'always' | 'never';

/**
 * Where a resolved setting came from
 */
export type ConfigSource = 'cli' | 'env' | 'file' | 'default';

/**
 * Fully resolved launcher configuration
 */
export interface LauncherConfig {
  /** Absolute project root (location of main.py and requirements.txt) */
  root: string;
  /** Branch to fetch and check out */
  branch: string;
  /** Git remote name */
  remote: string;
  /** Virtual environment directory, relative to root */
  venvDir: string;
  /** Dependency manifest, relative to root */
  requirementsFile: string;
  /** Sync program entry point, relative to root */
  entryPoint: string;
  /** Arguments passed to the entry point */
  entryArgs: string[];
  /** Interpreter commands to probe, in order */
  interpreters: string[];
  /** Pause policy before exit */
  pause: PausePolicy;
  /** Config file read by the sync program itself, relative to root */
  syncConfigFile: string;
}

/**
 * Keys of LauncherConfig that can be overridden from a file
 */
export type FileConfigKey = Exclude<keyof LauncherConfig, 'root'>;

/**
 * Shape of launcher.yaml after validation
 */
export type FileConfig = Partial<Pick<LauncherConfig, FileConfigKey>>;

// ============================================================================
// Pipeline Types
// ============================================================================

/**
 * Identifiers of the bootstrap steps, in execution order
 */
export type StepId = 'workdir' | 'python' | 'venv' | 'update' | 'install' | 'run';

/**
 * Status of a single step in a launch report
 */
export type StepStatus = 'ok' | 'failed' | 'skipped' | 'pending';

/**
 * A command line the pipeline ran (or would run in dry-run mode)
 */
export interface CommandRecord {
  command: string;
  args: string[];
  exitCode?: number;
}

/**
 * Outcome of one step, as reported to the operator
 */
export interface StepReport {
  id: StepId;
  title: string;
  status: StepStatus;
  durationMs?: number;
  detail?: string;
  commands: CommandRecord[];
  error?: {
    code: string;
    message: string;
    details?: string;
  };
}

/**
 * Summary of a whole launcher run
 */
export interface LaunchReport {
  success: boolean;
  exitCode: 0 | 1;
  message: string;
  dryRun: boolean;
  failedStep?: StepId;
  steps: StepReport[];
  /** Exit code of the sync program, when it ran */
  syncExitCode?: number;
}
