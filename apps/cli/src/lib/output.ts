/**
 * Output Formatter
 * 
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import type { QueueSummary } from '@tinythis/processing';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printKeyValue(key: string, value: string): void {
  console.log(`  ${chalk.gray(key + ':')} ${value}`);
}

/**
 * One-line aggregate of a run
 */
export function formatSummary(summary: QueueSummary): string {
  const parts = [
    `${summary.succeeded} succeeded`,
    `${summary.failed} failed`,
    `${summary.cancelled} cancelled`,
  ];
  if (summary.pending > 0) {
    parts.push(`${summary.pending} not started`);
  }
  return parts.join(', ');
}
