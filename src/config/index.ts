/**
 * Configuration module exports
 */

export {
  CONFIG_FILE_NAMES,
  DEFAULT_CONFIG,
  PAUSE_POLICIES,
  ENV_DIR,
  ENV_BRANCH,
  ENV_REMOTE,
  ENV_PYTHON,
  type LauncherCliOverrides,
  type LauncherResolveOptions,
  type LauncherConfigResolution,
  findConfigFile,
  loadFileConfig,
  validateFileConfig,
  parseInterpreterList,
  resolveLauncherConfig,
} from './launcher.js';
