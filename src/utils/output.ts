/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat, LaunchReport, StepReport, CommandRecord } from '../types.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(
  result: CommandResult<T>,
  format: OutputFormat
): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  // Human-readable format
  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\nErrors:'));
    result.errors.forEach((err) => {
      console.log(chalk.red('  •'), err);
    });
  }
}

/**
 * Print the per-step summary of a launcher run
 */
export function printLaunchReport(report: LaunchReport, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  header(report.dryRun ? 'Launch Plan' : 'Launch Summary');
  for (const step of report.steps) {
    console.log(`  ${getStepIcon(step.status)} ${step.title}${formatDuration(step)}`);
    if (step.detail) {
      console.log(chalk.gray(`      ${step.detail}`));
    }
    if (report.dryRun) {
      for (const cmd of step.commands) {
        console.log(chalk.cyan(`      $ ${formatCommand(cmd)}`));
      }
    }
  }
  console.log('');
}

/**
 * Print a status table
 */
export function printStatus(
  status: Record<string, unknown>,
  format: OutputFormat
): void {
  if (format === 'json') {
    console.log(JSON.stringify(status, null, 2));
    return;
  }

  console.log(chalk.bold('\nLauncher Status:\n'));
  for (const [key, value] of Object.entries(status)) {
    const label = formatLabel(key);
    console.log(`  ${chalk.gray(label + ':')} ${formatValue(value)}`);
  }
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.log(chalk.red('✗'), message);
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // Keep JSON output clean: verbose/debug output should never go to stdout.
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

/**
 * Print dry-run notice
 */
export function dryRunNotice(): void {
  console.log(chalk.yellow.bold('\n[DRY RUN] No commands will be executed\n'));
}

/**
 * Render a recorded command as a shell-like line
 */
export function formatCommand(record: CommandRecord): string {
  return [record.command, ...record.args]
    .map((part) => (/\s/.test(part) ? `"${part}"` : part))
    .join(' ');
}

// Helper functions

function getStepIcon(status: StepReport['status']): string {
  switch (status) {
    case 'ok':
      return chalk.green('✓');
    case 'failed':
      return chalk.red('✗');
    case 'skipped':
      return chalk.yellow('-');
    case 'pending':
      return chalk.gray('·');
  }
}

function formatDuration(step: StepReport): string {
  if (step.durationMs === undefined) {
    return '';
  }
  return chalk.gray(` (${step.durationMs}ms)`);
}

function formatValue(value: unknown): string {
  if (value === undefined || value === null) {
    return chalk.gray('(none)');
  }
  if (typeof value === 'boolean') {
    return value ? chalk.green('yes') : chalk.yellow('no');
  }
  if (typeof value === 'string') {
    return value.length > 60 ? value.slice(0, 60) + '...' : value;
  }
  if (Array.isArray(value)) {
    return value.length === 0 ? chalk.gray('(none)') : value.map(String).join(', ');
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

function formatLabel(key: string): string {
  // Convert camelCase to Title Case with spaces
  return key
    .replace(/([A-Z])/g, ' $1')
    .replace(/^./, (str) => str.toUpperCase())
    .trim();
}
