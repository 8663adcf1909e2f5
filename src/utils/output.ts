/**
 * Output formatting utilities for consistent CLI output
 *
 * stdout carries only the outcome line (or the JSON result); failures,
 * verbose traces and logs go to stderr.
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(result: CommandResult<T>, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (result.success) {
    success(result.message);
  } else {
    error(result.message);
  }
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(chalk.green('[OK]'), message);
}

/**
 * Print a dry-run preview
 */
export function dryRun(message: string): void {
  console.log(chalk.yellow('[DRY-RUN]'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.error(chalk.red('[FAIL]'), message);
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
