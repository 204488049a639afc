/**
 * Unit Tests: Bootstrap Pipeline
 *
 * Covers:
 * - Step ordering and short-circuit on the first failure
 * - Exit codes and operator messages per failure category
 * - Venv creation vs reuse and activation environment
 * - Skip flags and dry-run planning
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { runBootstrap, type BootstrapOptions } from '../../src/bootstrap/pipeline.js';
import { createLogger } from '../../src/utils/logger.js';
import type { LauncherConfig } from '../../src/types.js';
import { FakeRunner, createTempDir, cleanupTempDir, touch } from '../helpers/fake-runner.js';

// =============================================================================
// Test Fixtures
// =============================================================================

const silent = createLogger({ level: 'error', write: () => {} });

function baseConfig(root: string): LauncherConfig {
  return {
    root,
    branch: 'main',
    remote: 'origin',
    venvDir: 'venv',
    requirementsFile: 'requirements.txt',
    entryPoint: 'main.py',
    entryArgs: [],
    interpreters: ['python', 'python3'],
    pause: 'on-failure',
    syncConfigFile: 'config.json',
  };
}

function launch(
  config: LauncherConfig,
  runner: FakeRunner | undefined,
  extra: Partial<BootstrapOptions> = {}
) {
  return runBootstrap({
    config,
    runner,
    platform: 'linux',
    baseEnv: { PATH: '/usr/bin' },
    chdir: () => {},
    logger: silent,
    ...extra,
  });
}

// =============================================================================
// Tests
// =============================================================================

describe('runBootstrap', () => {
  let root: string;
  let venvDir: string;
  let venvPython: string;

  beforeEach(() => {
    root = createTempDir();
    venvDir = join(root, 'venv');
    venvPython = join(venvDir, 'bin', 'python');
    touch(join(root, 'main.py'), 'print("sync")\n');
  });

  afterEach(() => {
    cleanupTempDir(root);
  });

  describe('successful run', () => {
    it('should run every step in order and exit 0', async () => {
      touch(venvPython);
      const runner = new FakeRunner().on('python', ['--version'], { stdout: 'Python 3.12.1\n' });

      const report = await launch(baseConfig(root), runner);

      expect(report.success).toBe(true);
      expect(report.exitCode).toBe(0);
      expect(report.message).toBe('Sync completed successfully.');
      expect(report.syncExitCode).toBe(0);
      expect(report.failedStep).toBeUndefined();
      expect(runner.commandLines).toEqual([
        'python --version',
        'git fetch origin main',
        'git checkout main',
        'git pull --ff-only origin main',
        `${venvPython} -m pip install -r requirements.txt`,
        `${venvPython} main.py`,
      ]);
      expect(report.steps.map((step) => step.status)).toEqual(['ok', 'ok', 'ok', 'ok', 'ok', 'ok']);
    });

    it('should describe the interpreter and reused venv', async () => {
      touch(venvPython);
      const runner = new FakeRunner().on('python', ['--version'], { stdout: 'Python 3.12.1\n' });

      const report = await launch(baseConfig(root), runner);

      expect(report.steps[0].detail).toBe(root);
      expect(report.steps[1].detail).toBe('python (Python 3.12.1)');
      expect(report.steps[2].detail).toBe(`Using existing ${venvDir}`);
      expect(report.steps[3].detail).toBe('origin/main');
    });

    it('should run pip and the sync program inside the activated venv', async () => {
      touch(venvPython);
      const runner = new FakeRunner();

      await launch(baseConfig(root), runner);

      const pip = runner.calls[4];
      expect(pip.options.cwd).toBe(root);
      expect(pip.options.stdio).toBe('inherit');
      expect(pip.options.env?.VIRTUAL_ENV).toBe(venvDir);
      expect(pip.options.env?.PATH).toBe(`${join(venvDir, 'bin')}:/usr/bin`);

      const sync = runner.calls[5];
      expect(sync.options.env?.VIRTUAL_ENV).toBe(venvDir);
    });

    it('should probe the interpreter with captured output', async () => {
      touch(venvPython);
      const runner = new FakeRunner();

      await launch(baseConfig(root), runner);

      expect(runner.calls[0].options.stdio).toBe('capture');
    });

    it('should pass entry arguments to the sync program', async () => {
      touch(venvPython);
      const runner = new FakeRunner();

      await launch({ ...baseConfig(root), entryArgs: ['--once'] }, runner);

      expect(runner.commandLines[5]).toBe(`${venvPython} main.py --once`);
    });

    it('should use the configured branch and remote', async () => {
      touch(venvPython);
      const runner = new FakeRunner();

      await launch({ ...baseConfig(root), branch: 'dev', remote: 'upstream' }, runner);

      expect(runner.commandLines.slice(1, 4)).toEqual([
        'git fetch upstream dev',
        'git checkout dev',
        'git pull --ff-only upstream dev',
      ]);
    });

    it('should pin the working directory before anything else', async () => {
      touch(venvPython);
      const chdir = vi.fn();

      await launch(baseConfig(root), new FakeRunner(), { chdir });

      expect(chdir).toHaveBeenCalledWith(root);
    });

    it('should announce each step in order', async () => {
      touch(venvPython);
      const started: string[] = [];

      await launch(baseConfig(root), new FakeRunner(), {
        onStepStart: (step) => started.push(step.id),
      });

      expect(started).toEqual(['workdir', 'python', 'venv', 'update', 'install', 'run']);
    });

    it('should record step durations from the clock', async () => {
      touch(venvPython);
      let tick = 0;

      const report = await launch(baseConfig(root), new FakeRunner(), {
        now: () => (tick += 5),
      });

      expect(report.steps.map((step) => step.durationMs)).toEqual([5, 5, 5, 5, 5, 5]);
    });
  });

  describe('interpreter probe', () => {
    it('should exit 1 without running later steps when no interpreter is found', async () => {
      const runner = new FakeRunner().on('python', undefined, 'ENOENT').on('python3', undefined, 'ENOENT');

      const report = await launch(baseConfig(root), runner);

      expect(report.exitCode).toBe(1);
      expect(report.message).toBe('Python is not installed or not in PATH.');
      expect(report.failedStep).toBe('python');
      expect(runner.commandLines).toEqual(['python --version', 'python3 --version']);
      expect(report.steps.map((step) => step.status)).toEqual([
        'ok',
        'failed',
        'pending',
        'pending',
        'pending',
        'pending',
      ]);
      expect(report.steps[1].error).toEqual({
        code: 'PYTHON_NOT_FOUND',
        message: 'Python is not installed or not in PATH.',
        details: 'Tried: python, python3',
      });
    });

    it('should fall back to the next candidate when one exits non-zero', async () => {
      const runner = new FakeRunner()
        .on('python', ['--version'], { exitCode: 9009 })
        .on('python3', ['--version'], { stdout: 'Python 3.11.4\n' })
        .on('python3', ['-m', 'venv'], {}, () => touch(venvPython));

      const report = await launch(baseConfig(root), runner);

      expect(report.exitCode).toBe(0);
      expect(report.steps[1].detail).toBe('python3 (Python 3.11.4)');
      expect(runner.commandLines[2]).toBe(`python3 -m venv ${venvDir}`);
    });
  });

  describe('virtual environment', () => {
    it('should create the venv when the directory is missing', async () => {
      const runner = new FakeRunner().on('python', ['-m', 'venv'], {}, () => touch(venvPython));

      const report = await launch(baseConfig(root), runner);

      expect(report.exitCode).toBe(0);
      expect(runner.commandLines[1]).toBe(`python -m venv ${venvDir}`);
      expect(report.steps[2].detail).toBe(`Created ${venvDir}`);
    });

    it('should skip creation when the venv already exists', async () => {
      touch(venvPython);
      const runner = new FakeRunner();

      await launch(baseConfig(root), runner);

      expect(runner.commandLines.some((line) => line.includes('-m venv'))).toBe(false);
    });

    it('should report a creation failure and stop', async () => {
      const runner = new FakeRunner().on('python', ['-m', 'venv'], {
        exitCode: 1,
        stderr: 'Error: ensurepip is not available\n',
      });

      const report = await launch(baseConfig(root), runner);

      expect(report.exitCode).toBe(1);
      expect(report.message).toBe('Failed to create virtual environment.');
      expect(report.failedStep).toBe('venv');
      expect(report.steps[2].error?.details).toBe('Error: ensurepip is not available');
      expect(runner.commandLines).toHaveLength(2);
    });

    it('should report a venv without an interpreter as broken', async () => {
      const runner = new FakeRunner();

      const report = await launch(baseConfig(root), runner);

      expect(report.failedStep).toBe('venv');
      expect(report.message).toBe('Failed to activate virtual environment.');
      expect(report.steps[2].error?.code).toBe('VENV_BROKEN');
    });
  });

  describe('source update', () => {
    beforeEach(() => {
      touch(venvPython);
    });

    it('should stop before installing when fetch fails', async () => {
      const runner = new FakeRunner().on('git', ['fetch'], {
        exitCode: 128,
        stderr: 'fatal: unable to access remote\n',
      });

      const report = await launch(baseConfig(root), runner);

      expect(report.exitCode).toBe(1);
      expect(report.message).toBe('Git operation failed.');
      expect(report.failedStep).toBe('update');
      expect(report.steps[3].error?.details).toBe('fatal: unable to access remote');
      expect(runner.commandLines).toEqual(['python --version', 'git fetch origin main']);
      expect(report.steps[4].status).toBe('pending');
      expect(report.steps[5].status).toBe('pending');
    });

    it('should stop before pulling when checkout fails', async () => {
      const runner = new FakeRunner().on('git', ['checkout'], { exitCode: 1 });

      const report = await launch(baseConfig(root), runner);

      expect(report.message).toBe('Git operation failed.');
      expect(runner.commandLines.at(-1)).toBe('git checkout main');
      expect(report.steps[3].error?.details).toBe('Command: git checkout main (exit code 1)');
    });

    it('should treat a missing git executable as a git failure', async () => {
      const runner = new FakeRunner().on('git', undefined, 'ENOENT');

      const report = await launch(baseConfig(root), runner);

      expect(report.message).toBe('Git operation failed.');
      expect(report.steps[3].error?.details).toBe('Git is not installed or not available in PATH');
    });
  });

  describe('dependency installation', () => {
    it('should not run the sync program when pip fails', async () => {
      touch(venvPython);
      const runner = new FakeRunner().on(venvPython, ['-m', 'pip'], {
        exitCode: 1,
        stderr: 'ERROR: No matching distribution found\n',
      });

      const report = await launch(baseConfig(root), runner);

      expect(report.exitCode).toBe(1);
      expect(report.message).toBe('Dependency installation failed.');
      expect(report.failedStep).toBe('install');
      expect(report.steps[4].error?.details).toBe('ERROR: No matching distribution found');
      expect(runner.commandLines.at(-1)).toBe(`${venvPython} -m pip install -r requirements.txt`);
    });
  });

  describe('sync program', () => {
    beforeEach(() => {
      touch(venvPython);
    });

    it('should exit 1 when the sync program exits non-zero', async () => {
      const runner = new FakeRunner().on(venvPython, ['main.py'], { exitCode: 3 });

      const report = await launch(baseConfig(root), runner);

      expect(report.exitCode).toBe(1);
      expect(report.message).toBe('Script execution failed.');
      expect(report.failedStep).toBe('run');
      expect(report.syncExitCode).toBe(3);
      expect(report.steps[5].error?.details).toBe('main.py exited with code 3');
    });

    it('should fail the run step when the entry point is missing', async () => {
      rmSync(join(root, 'main.py'));
      const runner = new FakeRunner();

      const report = await launch(baseConfig(root), runner);

      expect(report.message).toBe('Script execution failed.');
      expect(report.steps[5].error?.details).toBe(`Entry point not found: ${join(root, 'main.py')}`);
      expect(runner.commandLines.at(-1)).toBe(`${venvPython} -m pip install -r requirements.txt`);
    });
  });

  describe('working directory', () => {
    it('should fail before running any command when the root is missing', async () => {
      const missing = join(root, 'missing');
      const runner = new FakeRunner();
      const chdir = vi.fn();

      const report = await launch({ ...baseConfig(root), root: missing }, runner, { chdir });

      expect(report.failedStep).toBe('workdir');
      expect(report.message).toBe(`Working directory not found: ${missing}`);
      expect(runner.calls).toHaveLength(0);
      expect(chdir).not.toHaveBeenCalled();
    });
  });

  describe('skip flags', () => {
    it('should mark update and install as skipped', async () => {
      touch(venvPython);
      const runner = new FakeRunner();

      const report = await launch(baseConfig(root), runner, { skipUpdate: true, skipInstall: true });

      expect(report.exitCode).toBe(0);
      expect(report.steps[3].status).toBe('skipped');
      expect(report.steps[4].status).toBe('skipped');
      expect(runner.commandLines).toEqual(['python --version', `${venvPython} main.py`]);
    });
  });

  describe('dry run', () => {
    it('should plan every command without touching the filesystem', async () => {
      const report = await launch(baseConfig(root), undefined, { dryRun: true });

      expect(report.success).toBe(true);
      expect(report.dryRun).toBe(true);
      expect(report.steps[2].detail).toBe(`Would create ${venvDir}`);
      expect(report.steps[2].commands).toEqual([
        { command: 'python', args: ['-m', 'venv', venvDir], exitCode: 0 },
      ]);
      expect(report.steps[5].commands).toEqual([
        { command: venvPython, args: ['main.py'], exitCode: 0 },
      ]);
      expect(existsSync(venvDir)).toBe(false);
    });
  });

  describe('unexpected errors', () => {
    it('should convert unknown errors into a failed step', async () => {
      touch(venvPython);
      const runner = new FakeRunner().on('git', ['fetch'], new Error('boom'));

      const report = await launch(baseConfig(root), runner);

      expect(report.exitCode).toBe(1);
      expect(report.message).toBe('Unexpected error: boom');
      expect(report.steps[3].error?.code).toBe('UNEXPECTED_ERROR');
    });
  });
});
