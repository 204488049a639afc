/**
 * Custom error classes for the bootstrap pipeline
 * Each failure category maps to one step and a fixed operator message
 */

import type { StepId } from '../types.js';

/**
 * Base error class for launcher failures
 */
export class LauncherError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly step?: StepId,
    public readonly suggestion?: string,
    public readonly details?: string
  ) {
    super(message);
    this.name = 'LauncherError';
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.details) {
      msg += `\n\n${this.details}`;
    }
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

/**
 * Error thrown when the project root does not exist or is not a directory
 */
export class WorkingDirectoryError extends LauncherError {
  constructor(public readonly path: string) {
    super(
      `Working directory not found: ${path}`,
      'WORKDIR_NOT_FOUND',
      'workdir',
      'Pass an existing project directory with --dir'
    );
    this.name = 'WorkingDirectoryError';
  }
}

/**
 * Error thrown when no Python interpreter answers on PATH
 */
export class InterpreterNotFoundError extends LauncherError {
  constructor(public readonly candidates: string[]) {
    super(
      'Python is not installed or not in PATH.',
      'PYTHON_NOT_FOUND',
      'python',
      'Install Python from https://www.python.org/downloads/ and make sure it is on PATH',
      `Tried: ${candidates.join(', ')}`
    );
    this.name = 'InterpreterNotFoundError';
  }
}

/**
 * Error thrown when the virtual environment cannot be created or used
 */
export class VenvError extends LauncherError {
  constructor(
    public readonly reason: 'create' | 'broken',
    public readonly venvPath: string,
    details?: string
  ) {
    super(
      reason === 'create'
        ? 'Failed to create virtual environment.'
        : 'Failed to activate virtual environment.',
      reason === 'create' ? 'VENV_CREATE_FAILED' : 'VENV_BROKEN',
      'venv',
      reason === 'create'
        ? 'Check that the venv module is available for this interpreter'
        : `Delete ${venvPath} and run again to recreate it`,
      details
    );
    this.name = 'VenvError';
  }
}

/**
 * Error thrown when fetch, checkout or pull fails
 */
export class GitOperationError extends LauncherError {
  constructor(
    public readonly command: string,
    public readonly exitCode?: number,
    details?: string
  ) {
    super(
      'Git operation failed.',
      'GIT_OPERATION_FAILED',
      'update',
      'Check network access to the remote and that the working tree has no conflicting changes',
      details ?? `Command: ${command}`
    );
    this.name = 'GitOperationError';
  }
}

/**
 * Error thrown when pip cannot install the dependency manifest
 */
export class DependencyInstallError extends LauncherError {
  constructor(
    public readonly requirementsFile: string,
    public readonly exitCode?: number,
    details?: string
  ) {
    super(
      'Dependency installation failed.',
      'DEPENDENCY_INSTALL_FAILED',
      'install',
      `Check ${requirementsFile} and your network connection`,
      details
    );
    this.name = 'DependencyInstallError';
  }
}

/**
 * Error thrown when the sync program is missing or exits non-zero
 */
export class SyncExecutionError extends LauncherError {
  constructor(
    public readonly entryPoint: string,
    public readonly exitCode?: number,
    details?: string
  ) {
    super(
      'Script execution failed.',
      'SYNC_EXECUTION_FAILED',
      'run',
      undefined,
      details ?? (exitCode !== undefined ? `${entryPoint} exited with code ${exitCode}` : undefined)
    );
    this.name = 'SyncExecutionError';
  }
}

/**
 * Error thrown when launcher.yaml cannot be read, parsed or validated
 */
export class ConfigError extends LauncherError {
  constructor(
    message: string,
    code: 'CONFIG_PARSE_ERROR' | 'CONFIG_INVALID' | 'CONFIG_READ_ERROR',
    public readonly configPath: string,
    public readonly issues: string[] = []
  ) {
    super(
      message,
      code,
      undefined,
      `Fix ${configPath} or remove it to use the defaults`,
      issues.length > 0 ? issues.map((issue) => `  - ${issue}`).join('\n') : undefined
    );
    this.name = 'ConfigError';
  }
}

/**
 * Type guard to check if an error is a LauncherError
 */
export function isLauncherError(error: unknown): error is LauncherError {
  return error instanceof LauncherError;
}

/**
 * Format any error into a user-friendly message
 */
export function formatError(error: unknown): string {
  if (isLauncherError(error)) {
    return error.toUserMessage();
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}
