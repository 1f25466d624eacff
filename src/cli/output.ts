/**
 * CLI output utilities
 * Handles formatted diagnostics, spinners, and report rendering
 *
 * Diagnostics are written to stderr; stdout only carries the scan document
 * or the report.
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { ScanResult, ScanSummary } from '../types/scan.js';

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

let verbose = false;

/**
 * Enable or disable [DEBUG] lines
 */
export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export function isVerbose(): boolean {
  return verbose;
}

/**
 * Write a diagnostic line without breaking an active spinner
 */
function writeLine(line: string): void {
  if (spinner?.isSpinning) {
    spinner.clear();
    console.error(line);
    spinner.render();
    return;
  }
  console.error(line);
}

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
 * Update spinner message
 *
 * @param message - New message
 */
export function updateSpinner(message: string): void {
  if (spinner) {
    spinner.text = message;
  }
}

/**
 * Stop spinner with success
 *
 * @param message - Success message
 */
export function succeedSpinner(message?: string): void {
  if (spinner) {
    spinner.succeed(message);
    spinner = null;
  }
}

/**
 * Stop spinner with failure
 *
 * @param message - Failure message
 */
export function failSpinner(message?: string): void {
  if (spinner) {
    spinner.fail(message);
    spinner = null;
  }
}

/**
 * Stop spinner without status
 */
export function stopSpinner(): void {
  if (spinner) {
    spinner.stop();
    spinner = null;
  }
}

/**
 * Print a section header
 *
 * @param title - Section title
 */
export function printSection(title: string): void {
  writeLine('');
  writeLine(theme.highlight(`--- ${title} ---`));
}

export function printSuccess(message: string): void {
  writeLine(theme.success(`[OK] ${message}`));
}

export function printWarning(message: string): void {
  writeLine(theme.warning(`[WARN] ${message}`));
}

export function printError(message: string): void {
  writeLine(theme.error(`[ERROR] ${message}`));
}

export function printInfo(message: string): void {
  writeLine(theme.info(`[INFO] ${message}`));
}

/**
 * Print a debug message, only in verbose mode
 */
export function printDebug(message: string): void {
  if (verbose) {
    writeLine(theme.dim(`[DEBUG] ${message}`));
  }
}

/**
 * Print a key-value pair
 *
 * @param key - Key
 * @param value - Value
 */
export function printKeyValue(key: string, value: string | number | boolean): void {
  writeLine(`  ${theme.secondary(key + ':')} ${value}`);
}

/**
 * Print scan totals and the distribution of failures, versions and server OS
 *
 * @param summary - Scan summary
 */
export function printScanSummary(summary: ScanSummary): void {
  printSection('Scan Summary');
  printKeyValue('Sites', summary.total);
  printKeyValue('Available', summary.available);
  printKeyValue('Failed', summary.failed);

  const failures = Object.entries(summary.failuresByKind).filter(([, count]) => count > 0);
  for (const [kind, count] of failures) {
    printKeyValue(`  ${kind}`, count);
  }

  printDistribution('Versions', summary.versions);
  printDistribution('Server OS', summary.serverOs);
}

function printDistribution(title: string, counts: Record<string, number>): void {
  const entries = Object.entries(counts).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  if (entries.length === 0) {
    return;
  }
  printSection(title);
  for (const [value, count] of entries) {
    printKeyValue(value, count);
  }
}

/**
 * Lay out rows as aligned plain-text columns
 *
 * @param headers - Table headers
 * @param rows - Table rows
 * @returns Table text, one line per row, with a newline at the end
 */
export function formatTable(headers: string[], rows: string[][]): string {
  // Calculate column widths
  const widths = headers.map((h, i) => {
    const maxRow = Math.max(0, ...rows.map((r) => (r[i] || '').length));
    return Math.max(h.length, maxRow);
  });

  const render = (cells: string[]): string =>
    cells
      .map((cell, i) => (cell || '').padEnd(widths[i]))
      .join('  ')
      .trimEnd();

  const headerLine = render(headers);
  const lines = [headerLine, '-'.repeat(headerLine.length), ...rows.map(render)];
  return `${lines.join('\n')}\n`;
}

/**
 * Human-readable scan listing used by --format pp
 *
 * @param result - Scan result
 */
export function formatScanTable(result: ScanResult): string {
  const rows = result.map((outcome) => {
    if (outcome.type === 'success') {
      const { metadata } = outcome;
      return [
        outcome.descriptor.title,
        'up',
        metadata.version,
        metadata.serverOs,
        [...metadata.supportedLanguages].join(' '),
      ];
    }
    const detail = outcome.error.status !== undefined ? `${outcome.error.kind} ${outcome.error.status}` : outcome.error.kind;
    return [outcome.descriptor.title, `down (${detail})`, '', '', ''];
  });

  return formatTable(['TITLE', 'STATUS', 'VERSION', 'OS', 'LANGUAGES'], rows);
}
