/**
 * CLI output utilities
 * Handles formatted output, spinners, and the run summary
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { StatsSnapshot } from '../jobs/stats.js';
import type { JobReport } from '../types/job.js';

/**
 * Output theme colors
 */
export const theme = {
  primary: chalk.cyan,
  secondary: chalk.gray,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,
  highlight: chalk.bold.white,
  dim: chalk.dim,
};

/**
 * Spinner instance for progress display
 */
let spinner: Ora | null = null;

/**
 * Start a spinner with a message
 *
 * @param message - Initial message
 * @returns Spinner instance
 */
export function startSpinner(message: string): Ora {
  if (spinner) {
    spinner.stop();
  }
  spinner = ora({
    text: message,
    spinner: 'dots',
  }).start();
  return spinner;
}

/**
 * Stop spinner with success
 */
export function succeedSpinner(message?: string): void {
  if (spinner) {
    spinner.succeed(message);
    spinner = null;
  }
}

/**
 * Stop spinner with failure
 */
export function failSpinner(message?: string): void {
  if (spinner) {
    spinner.fail(message);
    spinner = null;
  }
}

/**
 * Print a header
 *
 * @param title - Header title
 */
export function printHeader(title: string): void {
  console.log();
  console.log(theme.primary.bold(`=== ${title} ===`));
  console.log();
}

/**
 * Print a section header
 *
 * @param title - Section title
 */
export function printSection(title: string): void {
  console.log();
  console.log(theme.highlight(`--- ${title} ---`));
}

export function printSuccess(message: string): void {
  console.log(theme.success(`[OK] ${message}`));
}

export function printWarning(message: string): void {
  console.log(theme.warning(`[WARN] ${message}`));
}

export function printError(message: string): void {
  console.log(theme.error(`[ERROR] ${message}`));
}

export function printInfo(message: string): void {
  console.log(theme.info(`[INFO] ${message}`));
}

export function printDebug(message: string): void {
  console.log(theme.dim(`[DEBUG] ${message}`));
}

/**
 * Print a key-value pair
 *
 * @param key - Key
 * @param value - Value
 */
export function printKeyValue(key: string, value: string | number | boolean): void {
  console.log(`  ${theme.secondary(key + ':')} ${value}`);
}

/**
 * Print a list item
 *
 * @param item - List item
 * @param indent - Indentation level
 */
export function printListItem(item: string, indent: number = 0): void {
  const prefix = '  '.repeat(indent) + '- ';
  console.log(theme.secondary(prefix) + item);
}

/**
 * Print a table
 *
 * @param headers - Table headers
 * @param rows - Table rows
 */
export function printTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((h, i) => {
    const maxRow = Math.max(0, ...rows.map((r) => (r[i] || '').length));
    return Math.max(h.length, maxRow);
  });

  const headerLine = headers.map((h, i) => h.padEnd(widths[i] ?? h.length)).join('  ');
  console.log(theme.highlight(headerLine));
  console.log(theme.dim('-'.repeat(headerLine.length)));

  for (const row of rows) {
    const rowLine = row.map((cell, i) => (cell || '').padEnd(widths[i] ?? 0)).join('  ');
    console.log(rowLine);
  }
}

/**
 * Format the aggregate run summary as plain lines
 */
export function formatSummaryLines(stats: StatsSnapshot): string[] {
  return [
    `Projects created: ${stats.created}`,
    `Projects already existed: ${stats.exists}`,
    `Repos scanned successfully: ${stats.scanned}`,
    `Repos scanned as configuration only: ${stats.configOnly}`,
    `Empty repos skipped: ${stats.empty}`,
    `Failures: ${stats.failed}`,
  ];
}

/**
 * Print the aggregate run summary and the failed jobs, if any
 *
 * @param stats - Final counters
 * @param reports - Per-job reports from the runner
 */
export function printRunSummary(stats: StatsSnapshot, reports: JobReport[]): void {
  printHeader('Summary');
  for (const line of formatSummaryLines(stats)) {
    console.log(`  ${line}`);
  }

  const failed = reports.filter((r) => r.outcome === 'failed');
  if (failed.length > 0) {
    printSection('Failed repositories');
    for (const report of failed) {
      printListItem(`${report.job.projectKey}: ${report.error ?? 'unknown error'}`, 1);
    }
  }

  console.log();
  printInfo('All repos processed.');
}
