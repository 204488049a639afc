/**
 * Child process execution for bootstrap steps
 *
 * Every external command the launcher runs (python, git, pip, the sync
 * program) goes through a ProcessRunner so the pipeline can be driven by
 * an in-memory fake in tests and by a recorder in dry-run mode.
 */

import { spawn, type SpawnOptions } from 'node:child_process';
import type { CommandRecord } from '../types.js';

/**
 * How a child's output is handled
 *
 * inherit: child writes straight to the terminal
 * capture: stdout/stderr are collected and returned
 * stderr: both streams are forwarded to the launcher's stderr (keeping
 *   stdout free for JSON) and their tails are returned
 */
export type StdioMode = 'inherit' | 'capture' | 'stderr';

/**
 * Options for a single command invocation
 */
export interface RunOptions {
  /** Working directory for the child */
  cwd: string;
  /** Environment for the child (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  stdio?: StdioMode;
}

/**
 * Result of a command that was spawned successfully
 */
export interface RunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs external commands. Resolves with the exit status and rejects only
 * when the command could not be started at all (e.g. ENOENT).
 */
export interface ProcessRunner {
  run(command: string, args: string[], options: RunOptions): Promise<RunResult>;
}

/**
 * Error raised when a command cannot be spawned
 */
export class SpawnError extends Error {
  constructor(
    public readonly command: string,
    public readonly code?: string,
    cause?: Error
  ) {
    super(`Failed to launch ${command}: ${cause?.message ?? 'unknown error'}`);
    this.name = 'SpawnError';
  }

  /** True when the executable was not found on PATH */
  get notFound(): boolean {
    return this.code === 'ENOENT';
  }
}

function errnoCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** Characters of each output stream kept in memory per command */
export const MAX_CAPTURED_CHARS = 64 * 1024;

export interface SpawnRunnerOptions {
  /** Limit for each returned stream; older output is dropped */
  maxCapturedChars?: number;
  /** Destination for forwarded output in stderr mode (defaults to process.stderr) */
  forwardTo?: NodeJS.WritableStream;
}

/**
 * Append a chunk, keeping only the last `limit` characters
 */
export function appendBounded(buffer: string, chunk: string, limit: number): string {
  const next = buffer + chunk;
  return next.length > limit ? next.slice(next.length - limit) : next;
}

/**
 * ProcessRunner backed by node:child_process.spawn
 *
 * Commands are spawned without a shell so paths containing spaces reach
 * the child as single arguments.
 */
export class SpawnRunner implements ProcessRunner {
  private readonly maxCapturedChars: number;
  private readonly forwardTo?: NodeJS.WritableStream;

  constructor(options: SpawnRunnerOptions = {}) {
    this.maxCapturedChars = options.maxCapturedChars ?? MAX_CAPTURED_CHARS;
    this.forwardTo = options.forwardTo;
  }

  run(command: string, args: string[], options: RunOptions): Promise<RunResult> {
    const mode = options.stdio ?? 'inherit';
    const spawnOptions: SpawnOptions = {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: mode === 'inherit' ? 'inherit' : ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    };
    const forward = mode === 'stderr' ? (this.forwardTo ?? process.stderr) : undefined;
    const limit = this.maxCapturedChars;

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, spawnOptions);
      let stdout = '';
      let stderr = '';

      child.stdout?.setEncoding('utf-8');
      child.stderr?.setEncoding('utf-8');
      child.stdout?.on('data', (chunk: string) => {
        forward?.write(chunk);
        stdout = appendBounded(stdout, chunk, limit);
      });
      child.stderr?.on('data', (chunk: string) => {
        forward?.write(chunk);
        stderr = appendBounded(stderr, chunk, limit);
      });

      child.on('error', (error) => {
        reject(new SpawnError(command, errnoCode(error), error));
      });

      child.on('close', (code, signal) => {
        // Killed by a signal counts as a failure
        const exitCode = code ?? (signal ? 1 : 0);
        resolve({ exitCode, stdout, stderr });
      });
    });
  }
}

/**
 * ProcessRunner that records commands instead of running them.
 * Every command "succeeds" with empty output.
 */
export class DryRunRunner implements ProcessRunner {
  readonly planned: CommandRecord[] = [];

  run(command: string, args: string[]): Promise<RunResult> {
    this.planned.push({ command, args: [...args] });
    return Promise.resolve({ exitCode: 0, stdout: '', stderr: '' });
  }
}

/**
 * Last non-empty lines of captured output, for error details
 */
export function tailOutput(output: string, lines = 10): string | undefined {
  const kept = output
    .split(/\r?\n/)
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0);
  if (kept.length === 0) {
    return undefined;
  }
  return kept.slice(-lines).join('\n');
}
