/**
 * csafkit - Diagnostics output
 */

import chalk from 'chalk';

export interface Diagnostic {
  path: string;
  message: string;
}

/**
 * Print warnings to stderr
 */
export function logWarnings(warnings: readonly Diagnostic[]): void {
  for (const warning of warnings) {
    console.error(chalk.yellow(`warning: ${warning.path}: ${warning.message}`));
  }
}

export function logError(message: string): void {
  console.error(chalk.red(`error: ${message}`));
}
