/**
 * Output formatting utilities
 *
 * Report lines go to stdout uncolored; everything else goes to stderr.
 */

import chalk from 'chalk';

/**
 * Print report lines to stdout
 */
export function printLines(lines: readonly string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.error(chalk.yellow('⚠'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    console.error(chalk.gray('[verbose]'), message);
  }
}
