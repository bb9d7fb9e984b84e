/**
 * Output Formatter
 *
 * Terminal output helpers shared by the commands.
 */

import chalk from 'chalk';
import type { Provenance } from '@mediapeek/media';

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

export type CheckStatus = 'pass' | 'warn' | 'fail';

const STATUS_MARK: Record<CheckStatus, string> = {
  pass: chalk.green('✓'),
  warn: chalk.yellow('!'),
  fail: chalk.red('✗'),
};

export function printCheck(status: CheckStatus, label: string, detail: string): void {
  console.log(`${STATUS_MARK[status]} ${chalk.bold(label)} ${chalk.gray(detail)}`);
}

export function provenanceLabel(provenance: Provenance): string {
  return provenance === 'probed'
    ? chalk.green('probed with ffprobe')
    : chalk.yellow('estimated from the file name');
}
