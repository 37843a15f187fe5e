/**
 * Output Formatter
 * 
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}
