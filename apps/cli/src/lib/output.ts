/**
 * Output Formatter
 *
 * Consistent CLI output formatting. Messages about the run go to
 * stderr; stdout is kept for listings and rendered media.
 */

import chalk from 'chalk';

export function printSuccess(message: string): void {
  console.error(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.error(chalk.yellow('!'), message);
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}
