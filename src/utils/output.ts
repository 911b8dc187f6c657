/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';
import type { ApplyRecord, ApplySummary, MissingEntry, SyncIntent } from '../sync/types.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(
  result: CommandResult<T>,
  format: OutputFormat
): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, jsonReplacer, 2));
    return;
  }

  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\nErrors:'));
    result.errors.forEach((err) => {
      console.log(chalk.red('  •'), err);
    });
  }
}

/**
 * Errors serialize to their message; JSON.stringify would drop them to {}
 */
function jsonReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

/**
 * Print a plan in a human-readable format
 */
export function printPlan(intents: SyncIntent[], missing: MissingEntry[]): void {
  for (const entry of missing) {
    warn(entry.message);
  }

  if (intents.length === 0) {
    console.log(chalk.gray('No changes detected'));
    return;
  }

  console.log(chalk.bold(`\n${intents.length} change(s) planned:\n`));

  for (const intent of intents) {
    const color = getActionColor(intent.action);
    console.log(color(`${getActionIcon(intent.action)} ${intent.description}`));
    if (intent.changes && intent.changes.length > 0) {
      console.log(chalk.gray(`    fields: ${intent.changes.join(', ')}`));
    }
  }
}

/**
 * Print apply records, one line per intent
 */
export function printRecords(records: ApplyRecord[]): void {
  for (const record of records) {
    const label = `${record.intent.action} ${record.intent.description}`;
    switch (record.status) {
      case 'applied':
        console.log(chalk.green('  ✓'), label);
        break;
      case 'unchanged':
        console.log(chalk.gray('  ='), chalk.gray(label));
        break;
      case 'planned':
        console.log(chalk.cyan('  ○'), label);
        break;
      case 'skipped':
        console.log(chalk.yellow('  ⚠'), label, chalk.yellow(`(${record.reason ?? 'skipped'})`));
        break;
      case 'failed':
        console.log(chalk.red('  ✗'), label, chalk.red(record.message ?? ''));
        break;
    }
  }
}

/**
 * Print the apply summary table
 */
export function printSummary(summary: ApplySummary): void {
  console.log(chalk.bold('\nSummary:\n'));
  for (const [key, value] of Object.entries(summary)) {
    if (value === 0 && key === 'planned') continue;
    console.log(`  ${chalk.gray(formatLabel(key) + ':')} ${value}`);
  }
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.log(chalk.red('✗'), message);
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

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

/**
 * Print dry-run notice
 */
export function dryRunNotice(): void {
  console.log(chalk.yellow.bold('\n[DRY RUN] No changes will be applied\n'));
}

// Helper functions

function getActionIcon(action: SyncIntent['action']): string {
  switch (action) {
    case 'create':
      return '+';
    case 'delete':
      return '-';
    case 'update':
      return '~';
  }
}

function getActionColor(action: SyncIntent['action']): typeof chalk.green {
  switch (action) {
    case 'create':
      return chalk.green;
    case 'delete':
      return chalk.red;
    case 'update':
      return chalk.yellow;
  }
}

export function formatLabel(key: string): string {
  // Convert camelCase to Title Case with spaces
  return key
    .replace(/([A-Z])/g, ' $1')
    .replace(/^./, (str) => str.toUpperCase())
    .trim();
}
