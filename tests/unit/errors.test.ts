/**
 * Unit Tests: Launcher Errors
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  InterpreterNotFoundError,
  SyncExecutionError,
  WorkingDirectoryError,
  formatError,
  isLauncherError,
} from '../../src/bootstrap/errors.js';

describe('LauncherError.toUserMessage', () => {
  it('should include details and suggestion', () => {
    const error = new InterpreterNotFoundError(['python', 'python3']);

    expect(error.toUserMessage()).toBe(
      [
        'Error: Python is not installed or not in PATH.',
        '',
        'Tried: python, python3',
        '',
        'Suggestion: Install Python from https://www.python.org/downloads/ and make sure it is on PATH',
      ].join('\n')
    );
  });

  it('should omit the suggestion when there is none', () => {
    const error = new SyncExecutionError('main.py', 3);

    expect(error.toUserMessage()).toBe('Error: Script execution failed.\n\nmain.py exited with code 3');
  });
});

describe('step errors', () => {
  it('should tie each error to its step', () => {
    expect(new WorkingDirectoryError('/missing').step).toBe('workdir');
    expect(new InterpreterNotFoundError([]).step).toBe('python');
    expect(new SyncExecutionError('main.py', 1).step).toBe('run');
  });

  it('should list config issues as details', () => {
    const error = new ConfigError('Invalid launcher config: launcher.yaml', 'CONFIG_INVALID', 'launcher.yaml', [
      'Unknown key: foo',
      'pause must be one of: on-failure, always, never',
    ]);

    expect(error.details).toBe('  - Unknown key: foo\n  - pause must be one of: on-failure, always, never');
    expect(error.suggestion).toBe('Fix launcher.yaml or remove it to use the defaults');
  });
});

describe('formatError', () => {
  it('should use the user message for launcher errors', () => {
    const error = new WorkingDirectoryError('/missing');

    expect(isLauncherError(error)).toBe(true);
    expect(formatError(error)).toBe(
      'Error: Working directory not found: /missing\n\nSuggestion: Pass an existing project directory with --dir'
    );
  });

  it('should format plain errors and other values', () => {
    expect(formatError(new Error('boom'))).toBe('Error: boom');
    expect(formatError('boom')).toBe('Error: boom');
  });
});
