/**
 * CLI Output Utilities
 *
 * Provides structured output support for JSON and human-readable formats.
 * @module @faultline/cli/output
 */

import chalk from 'chalk';
import { errorMessage, isValidationError } from '@faultline/shared';
import type { ExecutionEventKind, ReportOutcome, SummaryStatus } from '@faultline/shared';

/**
 * Output format type
 */
export type OutputFormat = 'json' | 'table' | 'plain';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'table', 'plain'] as const;

/**
 * Check if a value names an output format
 */
export function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Global output format setting (can be overridden per command)
 */
let globalOutputFormat: OutputFormat = 'table';

/**
 * Sets the global output format
 */
export function setOutputFormat(format: OutputFormat): void {
  globalOutputFormat = format;
}

/**
 * Gets the current output format
 */
export function getOutputFormat(): OutputFormat {
  return globalOutputFormat;
}

/**
 * Outputs data in the specified format
 */
export function output(data: unknown, format?: OutputFormat): void {
  const fmt = format ?? globalOutputFormat;

  if (fmt !== 'json' && typeof data === 'string') {
    console.log(data);
  } else {
    console.log(JSON.stringify(data, null, 2));
  }
}

/**
 * Outputs a success message
 */
export function success(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ success: true, message }));
  } else {
    console.log(chalk.green('✓') + ' ' + message);
  }
}

/**
 * Outputs an error message
 */
export function error(message: string, details?: unknown): void {
  if (globalOutputFormat === 'json') {
    console.error(JSON.stringify({ success: false, error: message, details }));
  } else {
    console.error(chalk.red('✗') + ' ' + message);
    if (details) {
      console.error(chalk.gray(JSON.stringify(details, null, 2)));
    }
  }
}

/**
 * Reports a failed command with the error's details and exits with status 1
 */
export function fail(message: string, err: unknown): never {
  error(`${message}: ${errorMessage(err)}`, isValidationError(err) ? err.details : undefined);
  process.exit(1);
}

/**
 * Outputs a warning message
 */
export function warn(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ warning: message }));
  } else {
    console.log(chalk.yellow('⚠') + ' ' + message);
  }
}

/**
 * Outputs an info message
 */
export function info(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ info: message }));
  } else {
    console.log(chalk.blue('ℹ') + ' ' + message);
  }
}

/**
 * Table column
 */
export interface TableColumn {
  key: string;
  header: string;
  width?: number;
}

/**
 * Formats a table from an array of rows
 */
export function table(data: Array<Record<string, unknown>>, columns?: TableColumn[]): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify(data, null, 2));
    return;
  }

  const first = data[0];
  if (!first) {
    console.log(chalk.gray('No data to display'));
    return;
  }

  // Auto-detect columns if not provided
  const cols = columns ?? Object.keys(first).map((key) => ({
    key,
    header: key.charAt(0).toUpperCase() + key.slice(1),
    width: undefined,
  }));

  const widths = cols.map((col) => {
    const maxDataWidth = Math.max(...data.map((row) => String(row[col.key] ?? '').length));
    return col.width ?? Math.max(col.header.length, maxDataWidth, 4);
  });

  const header = cols.map((col, i) => col.header.padEnd(widths[i] ?? 0)).join('  ');
  console.log(chalk.bold(header));
  console.log(widths.map((w) => '─'.repeat(w)).join('──'));

  for (const row of data) {
    const line = cols
      .map((col, i) => truncate(String(row[col.key] ?? ''), widths[i] ?? 0).padEnd(widths[i] ?? 0))
      .join('  ');
    console.log(line);
  }
}

/**
 * Formats key-value pairs for display
 */
export function keyValue(data: Record<string, unknown>): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify(data, null, 2));
    return;
  }

  const maxKeyLength = Math.max(...Object.keys(data).map((k) => k.length));

  for (const [key, value] of Object.entries(data)) {
    console.log(`${chalk.bold(key.padEnd(maxKeyLength))}  ${formatValue(value)}`);
  }
}

/**
 * Formats a single value for display
 */
function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return chalk.gray('(none)');
  }
  if (typeof value === 'boolean') {
    return value ? chalk.green('true') : chalk.red('false');
  }
  if (typeof value === 'number') {
    return chalk.cyan(String(value));
  }
  if (value instanceof Date) {
    return chalk.yellow(value.toISOString());
  }
  if (typeof value === 'object') {
    return chalk.gray(JSON.stringify(value));
  }
  return String(value);
}

/**
 * Formats a status badge for a run outcome, summary status or event kind
 */
export function statusBadge(status: ReportOutcome | SummaryStatus | ExecutionEventKind): string {
  switch (status) {
    case 'succeeded':
    case 'success':
    case 'ready':
      return chalk.green('●') + ' ' + chalk.green(status);
    case 'pending':
      return chalk.yellow('◐') + ' ' + chalk.yellow(status);
    case 'chaos-occurred':
      return chalk.magenta('●') + ' ' + chalk.magenta(status);
    case 'failed':
    case 'error':
      return chalk.red('●') + ' ' + chalk.red(status);
    case 'unavailable':
      return chalk.gray('○') + ' ' + chalk.gray(status);
    case 'info':
      return chalk.blue('●') + ' ' + status;
  }
}

/**
 * Formats a millisecond offset as seconds, e.g. `+1.250s`
 */
export function formatOffset(ms: number): string {
  return `+${(ms / 1000).toFixed(3)}s`;
}

/**
 * Truncates a string to a maximum length
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  if (maxLength <= 3) return str.slice(0, maxLength);
  return str.slice(0, maxLength - 3) + '...';
}
