/**
 * Shared CLI option helpers for attack-correlator commands.
 *
 * Option registration, value parsing and chalk-coloured message printing
 * used across all commands.
 */

import type { Command } from 'commander';
import chalk from 'chalk';

import type { RunnerMode } from '../matching/runner.js';

// ---------------------------------------------------------------------------
// Option registration helpers
// ---------------------------------------------------------------------------

/**
 * Add the -k/--top option. Without it the configured TOP_K applies.
 */
export function addTopOption(cmd: Command): Command {
  return cmd.option('-k, --top <n>', 'Number of techniques to return (default: TOP_K or 3)');
}

/**
 * Add the --offline and --data options that select the local corpus.
 */
export function addCorpusOptions(cmd: Command): Command {
  return cmd
    .option('--offline', 'Match against the snapshot stored by "sync" instead of the live feed')
    .option('--data <path>', 'ATT&CK snapshot or STIX bundle file to match against');
}

/**
 * Add the --verbose flag to a command.
 */
export function addVerboseOption(cmd: Command): Command {
  return cmd.option('--verbose', 'Verbose output');
}

// ---------------------------------------------------------------------------
// Value parsing
// ---------------------------------------------------------------------------

/**
 * Parse a positive integer option value. Prints an error and exits on
 * anything else.
 *
 * @example parseTopK('5') => 5
 */
export function parseTopK(value: string): number {
  const trimmed = value.trim();
  const n = Number(trimmed);

  if (trimmed === '' || !Number.isInteger(n) || n < 1) {
    console.error(chalk.red(`Error: --top must be a positive integer, got "${value}"`));
    process.exit(1);
  }

  return n;
}

const VALID_MODES = new Set<string>(['latest', 'queue']);

function isRunnerMode(value: string): value is RunnerMode {
  return VALID_MODES.has(value);
}

/**
 * Parse the interactive scheduling mode.
 */
export function parseMode(value: string): RunnerMode {
  const mode = value.trim().toLowerCase();

  if (!isRunnerMode(mode)) {
    console.error(chalk.red(`Error: Unknown mode "${value}". Valid modes: latest, queue`));
    process.exit(1);
  }

  return mode;
}

// ---------------------------------------------------------------------------
// Message display
// ---------------------------------------------------------------------------

/**
 * Print a user-friendly error message with optional details.
 */
export function printError(message: string, detail?: string): void {
  console.error(chalk.red(`\nError: ${message}`));
  if (detail) {
    console.error(chalk.gray(`  ${detail}`));
  }
  console.error('');
}

export function printInfo(message: string): void {
  console.error(chalk.cyan(`  ${message}`));
}

export function printSuccess(message: string): void {
  console.error(chalk.green(`  ${message}`));
}

export function printWarning(message: string): void {
  console.error(chalk.yellow(`  ${message}`));
}
