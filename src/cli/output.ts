import chalk from 'chalk';

/**
 * Output utilities for consistent CLI formatting.
 * Warnings and errors go to stderr so the report on stdout stays clean.
 */

export function info(message: string): void {
  console.log(chalk.cyan(message));
}

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function warn(message: string): void {
  console.error(chalk.yellow(message));
}

export function error(message: string): void {
  console.error(chalk.red(message));
}

export function dim(message: string): void {
  console.log(chalk.dim(message));
}

export function blank(): void {
  console.log('');
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log('');
  console.log(chalk.bold.cyan(title));
  console.log(chalk.dim('='.repeat(title.length)));
}

export function keyValue(key: string, value: string): void {
  console.log(`${chalk.dim(key + ':')} ${value}`);
}

export function list(lines: readonly string[], emptyMessage = '(none)'): void {
  if (lines.length === 0) {
    dim(`  ${emptyMessage}`);
    return;
  }
  for (const line of lines) {
    console.log(`  ${line}`);
  }
}
