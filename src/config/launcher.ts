/**
 * Launcher configuration resolution
 *
 * Supports resolving settings from:
 * - CLI flags (--branch, --remote, --python, ...)
 * - Environment variables (SYNC_LAUNCHER_DIR, SYNC_LAUNCHER_BRANCH, SYNC_LAUNCHER_REMOTE, SYNC_LAUNCHER_PYTHON)
 * - launcher.yaml in the project root
 * - Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type {
  ConfigSource,
  FileConfig,
  FileConfigKey,
  LauncherConfig,
  PausePolicy,
} from '../types.js';
import { ConfigError } from '../bootstrap/errors.js';
import { DEFAULT_INTERPRETERS } from '../bootstrap/interpreter.js';

/** Config file names looked up in the project root, in order */
export const CONFIG_FILE_NAMES = ['launcher.yaml', 'launcher.yml'] as const;

/** Environment variable names */
export const ENV_DIR = 'SYNC_LAUNCHER_DIR';
export const ENV_BRANCH = 'SYNC_LAUNCHER_BRANCH';
export const ENV_REMOTE = 'SYNC_LAUNCHER_REMOTE';
export const ENV_PYTHON = 'SYNC_LAUNCHER_PYTHON';

export const PAUSE_POLICIES: readonly PausePolicy[] = ['on-failure', 'always', 'never'];

/**
 * Built-in defaults (root defaults to the current directory)
 */
export const DEFAULT_CONFIG: Omit<LauncherConfig, 'root'> = {
  branch: 'main',
  remote: 'origin',
  venvDir: 'venv',
  requirementsFile: 'requirements.txt',
  entryPoint: 'main.py',
  entryArgs: [],
  interpreters: [...DEFAULT_INTERPRETERS],
  pause: 'on-failure',
  syncConfigFile: 'config.json',
};

/**
 * Values given on the command line
 */
export interface LauncherCliOverrides {
  dir?: string;
  branch?: string;
  remote?: string;
  venv?: string;
  requirements?: string;
  entry?: string;
  python?: string[];
  pause?: PausePolicy;
  entryArgs?: string[];
}

/**
 * Options for configuration resolution
 */
export interface LauncherResolveOptions {
  cli?: LauncherCliOverrides;
  /** Environment to read (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Base for a relative --dir (defaults to process.cwd()) */
  cwd?: string;
}

/**
 * Result of configuration resolution
 */
export interface LauncherConfigResolution {
  config: LauncherConfig;
  /** Where each value came from */
  sources: Record<keyof LauncherConfig, ConfigSource>;
  /** Config file that was loaded, if any */
  configFile?: string;
}

// =============================================================================
// File loading
// =============================================================================

const STRING_KEYS = ['branch', 'remote', 'venvDir', 'requirementsFile', 'entryPoint', 'syncConfigFile'] as const;
const LIST_KEYS = ['interpreters', 'entryArgs'] as const;
const KNOWN_KEYS: ReadonlySet<string> = new Set<FileConfigKey>([...STRING_KEYS, ...LIST_KEYS, 'pause']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPausePolicy(value: unknown): value is PausePolicy {
  return typeof value === 'string' && PAUSE_POLICIES.some((policy) => policy === value);
}

/**
 * Validate a parsed config document
 *
 * @param raw - Parsed YAML (null for an empty file)
 * @param sourcePath - Path for error messages
 * @throws ConfigError listing every issue found
 */
export function validateFileConfig(raw: unknown, sourcePath: string): FileConfig {
  if (raw === null || raw === undefined) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new ConfigError(`Invalid launcher config: ${sourcePath}`, 'CONFIG_INVALID', sourcePath, [
      'Top level must be a mapping',
    ]);
  }

  const issues: string[] = [];
  const config: FileConfig = {};

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      issues.push(`Unknown key: ${key}`);
    }
  }

  for (const key of STRING_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value === 'string' && value.trim().length > 0) {
      config[key] = value.trim();
    } else {
      issues.push(`${key} must be a non-empty string`);
    }
  }

  for (const key of LIST_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
      if (key === 'interpreters' && value.length === 0) {
        issues.push('interpreters must list at least one command');
      } else {
        config[key] = [...value];
      }
    } else {
      issues.push(`${key} must be a list of strings`);
    }
  }

  if (raw.pause !== undefined) {
    if (isPausePolicy(raw.pause)) {
      config.pause = raw.pause;
    } else {
      issues.push(`pause must be one of: ${PAUSE_POLICIES.join(', ')}`);
    }
  }

  if (issues.length > 0) {
    throw new ConfigError(`Invalid launcher config: ${sourcePath}`, 'CONFIG_INVALID', sourcePath, issues);
  }

  return config;
}

/**
 * Find the launcher config file in a directory
 */
export function findConfigFile(root: string): string | undefined {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = resolve(root, name);
    if (existsSync(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Load and validate a launcher config file
 *
 * @throws ConfigError if the file cannot be read, parsed or validated
 */
export function loadFileConfig(path: string): FileConfig {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Failed to read launcher config: ${err instanceof Error ? err.message : String(err)}`,
      'CONFIG_READ_ERROR',
      path
    );
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new ConfigError(
      `Failed to parse launcher config: ${err instanceof Error ? err.message : String(err)}`,
      'CONFIG_PARSE_ERROR',
      path
    );
  }

  return validateFileConfig(parsed, path);
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Split an interpreter list from the environment ("python3.12, python3" or "py python")
 */
export function parseInterpreterList(value: string): string[] {
  return value
    .split(/[\s,]+/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

/**
 * Pick the highest-priority defined value and record its source
 */
function pick<K extends keyof LauncherConfig>(
  key: K,
  candidates: Array<[ConfigSource, LauncherConfig[K] | undefined]>,
  sources: Partial<Record<keyof LauncherConfig, ConfigSource>>
): LauncherConfig[K] {
  for (const [source, value] of candidates) {
    if (value !== undefined) {
      sources[key] = source;
      return value;
    }
  }
  throw new Error(`No value for ${key}`);
}

/**
 * Resolve the launcher configuration from all sources
 *
 * Priority (highest to lowest): CLI flag, environment variable, config file, default
 *
 * @throws ConfigError if launcher.yaml exists but is invalid
 */
export function resolveLauncherConfig(options: LauncherResolveOptions = {}): LauncherConfigResolution {
  const cli = options.cli ?? {};
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const sources: Partial<Record<keyof LauncherConfig, ConfigSource>> = {};

  const root = resolve(
    cwd,
    pick('root', [
      ['cli', nonEmpty(cli.dir)],
      ['env', nonEmpty(env[ENV_DIR])],
      ['default', cwd],
    ], sources)
  );

  const configFile = findConfigFile(root);
  const file = configFile ? loadFileConfig(configFile) : {};

  const envPythonList = parseInterpreterList(env[ENV_PYTHON] ?? '');
  const envPython = envPythonList.length > 0 ? envPythonList : undefined;
  const cliPython = cli.python && cli.python.length > 0 ? cli.python : undefined;

  const config: LauncherConfig = {
    root,
    branch: pick('branch', [
      ['cli', nonEmpty(cli.branch)],
      ['env', nonEmpty(env[ENV_BRANCH])],
      ['file', file.branch],
      ['default', DEFAULT_CONFIG.branch],
    ], sources),
    remote: pick('remote', [
      ['cli', nonEmpty(cli.remote)],
      ['env', nonEmpty(env[ENV_REMOTE])],
      ['file', file.remote],
      ['default', DEFAULT_CONFIG.remote],
    ], sources),
    venvDir: pick('venvDir', [
      ['cli', nonEmpty(cli.venv)],
      ['file', file.venvDir],
      ['default', DEFAULT_CONFIG.venvDir],
    ], sources),
    requirementsFile: pick('requirementsFile', [
      ['cli', nonEmpty(cli.requirements)],
      ['file', file.requirementsFile],
      ['default', DEFAULT_CONFIG.requirementsFile],
    ], sources),
    entryPoint: pick('entryPoint', [
      ['cli', nonEmpty(cli.entry)],
      ['file', file.entryPoint],
      ['default', DEFAULT_CONFIG.entryPoint],
    ], sources),
    entryArgs: pick('entryArgs', [
      ['cli', cli.entryArgs && cli.entryArgs.length > 0 ? cli.entryArgs : undefined],
      ['file', file.entryArgs],
      ['default', [...DEFAULT_CONFIG.entryArgs]],
    ], sources),
    interpreters: pick('interpreters', [
      ['cli', cliPython],
      ['env', envPython],
      ['file', file.interpreters],
      ['default', [...DEFAULT_CONFIG.interpreters]],
    ], sources),
    pause: pick('pause', [
      ['cli', cli.pause],
      ['file', file.pause],
      ['default', DEFAULT_CONFIG.pause],
    ], sources),
    syncConfigFile: pick('syncConfigFile', [
      ['file', file.syncConfigFile],
      ['default', DEFAULT_CONFIG.syncConfigFile],
    ], sources),
  };

  return {
    config,
    sources: {
      root: sources.root ?? 'default',
      branch: sources.branch ?? 'default',
      remote: sources.remote ?? 'default',
      venvDir: sources.venvDir ?? 'default',
      requirementsFile: sources.requirementsFile ?? 'default',
      entryPoint: sources.entryPoint ?? 'default',
      entryArgs: sources.entryArgs ?? 'default',
      interpreters: sources.interpreters ?? 'default',
      pause: sources.pause ?? 'default',
      syncConfigFile: sources.syncConfigFile ?? 'default',
    },
    configFile,
  };
}
