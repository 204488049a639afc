/**
 * sync-launcher library entrypoint
 *
 * The CLI lives in cli.ts; this module exposes the pipeline for embedding
 * and scripting.
 */

export * from './types.js';
export * from './bootstrap/index.js';
export * from './config/index.js';
export { runCommand, statusCommand, type LauncherStatus } from './commands/index.js';
export { Logger, createLogger, logger, type LogLevel, type LoggerConfig } from './utils/logger.js';
export { createProgram, type ProgramDeps } from './program.js';
