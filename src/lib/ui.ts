/**
 * Terminal chrome: banners, phase headers, spinners and final summaries
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';

const RULE_WIDTH = 60;

export function printBanner(title: string, subtitle?: string): void {
  console.log(chalk.bold.cyan('\n' + '═'.repeat(RULE_WIDTH)));
  console.log(chalk.bold.cyan(`🚀 ${title}`));
  if (subtitle) {
    console.log(chalk.cyan(`   ${subtitle}`));
  }
  console.log(chalk.bold.cyan('═'.repeat(RULE_WIDTH)) + '\n');
}

export function printPhaseHeader(index: number, total: number, title: string): void {
  console.log(chalk.bold.white(`\n▸ Phase ${index}/${total}: ${title}`));
}

/**
 * Spinner for a long-running step. Silent when stdout is not a terminal.
 */
export function startSpinner(text: string): Ora {
  return ora({ text, isSilent: !process.stdout.isTTY }).start();
}

export function printSuccess(title: string, lines: string[] = []): void {
  console.log('\n' + chalk.bold.green('═'.repeat(RULE_WIDTH)));
  console.log(chalk.bold.green(`✨ ${title}`));
  console.log(chalk.bold.green('═'.repeat(RULE_WIDTH)));
  for (const line of lines) {
    console.log(`  ${line}`);
  }
  console.log();
}

export function printFailure(title: string, lines: string[] = []): void {
  console.log('\n' + chalk.bold.red('═'.repeat(RULE_WIDTH)));
  console.log(chalk.bold.red(`❌ ${title}`));
  console.log(chalk.bold.red('═'.repeat(RULE_WIDTH)));
  for (const line of lines) {
    console.log(`  ${line}`);
  }
  console.log();
}

export function printIncomplete(title: string, lines: string[] = []): void {
  console.log('\n' + chalk.bold.yellow('═'.repeat(RULE_WIDTH)));
  console.log(chalk.bold.yellow(`⚠️  ${title}`));
  console.log(chalk.bold.yellow('═'.repeat(RULE_WIDTH)));
  for (const line of lines) {
    console.log(`  ${line}`);
  }
  console.log();
}

/**
 * Shown exactly once; credentials are never passed to the logger
 */
export function printCredentials(title: string, entries: Array<[string, string]>): void {
  console.log(chalk.bold.magenta(`\n🔑 ${title}`));
  for (const [label, value] of entries) {
    console.log(`   ${chalk.gray(label.padEnd(10))} ${chalk.bold(value)}`);
  }
  console.log(chalk.yellow('   Save these now. They are not shown again.\n'));
}
