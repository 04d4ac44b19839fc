/**
 * Terminal output helpers for the CLI.
 */

import chalk from 'chalk';
import ora from 'ora';
import type { Violation } from '../types/models.js';
import type { JsonObject } from '../types/utils.js';

const RULE = '─'.repeat(50);

export function error(message: string, suggestion?: string): void {
  console.log(`${chalk.red('✖')} ${message}`);
  if (suggestion) {
    console.log(`  ${chalk.yellow('→')} ${chalk.dim(suggestion)}`);
  }
}

export function warn(message: string): void {
  console.log(`${chalk.yellow('⚠')} ${message}`);
}

export function info(message: string): void {
  console.log(`${chalk.blue('ℹ')} ${message}`);
}

export function spinner(text: string): ReturnType<typeof ora> {
  return ora({ text, color: 'cyan', spinner: 'dots' }).start();
}

/**
 * Print a statement between rules.
 */
export function statement(sql: string): void {
  console.log(chalk.gray(RULE));
  console.log(chalk.cyan(sql));
  console.log(chalk.gray(RULE));
}

export function violations(items: readonly Violation[]): void {
  for (const item of items) {
    if (item.fatal) {
      error(`${item.kind}: ${item.detail}`);
    } else {
      warn(`${item.kind}: ${item.detail}`);
    }
  }
}

export function rows(items: readonly JsonObject[], format: 'json' | 'table'): void {
  if (format === 'json') {
    console.log(JSON.stringify(items, null, 2));
  } else {
    console.table(items);
  }
}

export function section(title: string): void {
  console.log('');
  console.log(chalk.cyan.bold(`▶ ${title}`));
  console.log(chalk.gray(RULE));
}

export function row(label: string, value: string, ok: boolean = true): void {
  const icon = ok ? chalk.green('✔') : chalk.red('✖');
  console.log(`  ${icon} ${chalk.bold(label)}: ${chalk.cyan(value)}`);
}

export function newline(): void {
  console.log('');
}
