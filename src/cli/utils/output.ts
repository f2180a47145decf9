/**
 * Output formatting utilities for the seqtrack CLI
 *
 * Provides consistent output formatting for table display,
 * JSON output, and colored terminal messages.
 */

import { MetricFlag, Status } from '../../types';

/**
 * ANSI color codes for terminal output
 */
const COLORS = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
} as const;

/**
 * Output options interface
 */
export interface OutputOptions {
  json: boolean;
  verbose: boolean;
}

/**
 * Global output options set by the CLI
 */
let globalOutputOptions: OutputOptions = {
  json: false,
  verbose: false,
};

/**
 * Set global output options from CLI flags
 */
export function setOutputOptions(options: OutputOptions): void {
  globalOutputOptions = { ...options };
}

export function isJsonOutput(): boolean {
  return globalOutputOptions.json;
}

/**
 * Format data as a pretty-printed JSON string
 */
export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Render a cell value: objects as JSON, null as empty
 */
export function formatCell(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Calculate the display width of a string (handling ANSI codes)
 */
function getDisplayWidth(str: string): number {
  const stripped = str.replace(/\x1b\[[0-9;]*m/g, '');
  return stripped.length;
}

/**
 * Pad a string to a specific width (handling ANSI codes)
 */
function padString(str: string, width: number): string {
  const currentWidth = getDisplayWidth(str);
  if (currentWidth >= width) {
    return str;
  }
  return str + ' '.repeat(width - currentWidth);
}

/**
 * Truncate a string to max width with ellipsis
 */
function truncate(str: string, maxWidth: number): string {
  if (getDisplayWidth(str) <= maxWidth) {
    return str;
  }
  return str.slice(0, maxWidth - 3) + '...';
}

/**
 * Format an array of records as an ASCII table
 *
 * @param columns - Record keys to display, in order
 * @returns Formatted table, or "(no results)" for no rows
 */
export function formatTable(
  rows: Record<string, unknown>[],
  columns: string[],
  options: {
    maxWidth?: number;
    headers?: Record<string, string>;
  } = {}
): string {
  const { maxWidth = 40, headers = {} } = options;

  if (rows.length === 0) {
    return '(no results)';
  }

  const label = (col: string): string => headers[col] ?? col.toUpperCase();
  const cellsByRow = rows.map((row) => columns.map((col) => truncate(formatCell(row[col]), maxWidth)));

  const widths = columns.map((col, index) =>
    Math.max(Math.min(label(col).length, maxWidth), ...cellsByRow.map((cells) => getDisplayWidth(cells[index])))
  );

  const lines: string[] = [];
  lines.push(columns.map((col, index) => COLORS.bold + padString(label(col), widths[index]) + COLORS.reset).join('  '));
  lines.push(COLORS.dim + widths.map((width) => '-'.repeat(width)).join('  ') + COLORS.reset);
  for (const cells of cellsByRow) {
    lines.push(cells.map((cell, index) => padString(cell, widths[index])).join('  '));
  }

  return lines.join('\n');
}

/**
 * Output a success message in green
 */
export function success(message: string): void {
  console.log(`${COLORS.green}${message}${COLORS.reset}`);
}

/**
 * Output an error message in red
 */
export function error(message: string): void {
  console.error(`${COLORS.red}Error: ${message}${COLORS.reset}`);
}

/**
 * Output an info message in blue
 */
export function info(message: string): void {
  console.log(`${COLORS.blue}${message}${COLORS.reset}`);
}

/**
 * Output a warning message in yellow, on stderr
 */
export function warn(message: string): void {
  console.error(`${COLORS.yellow}Warning: ${message}${COLORS.reset}`);
}

/**
 * Output a verbose/debug message in gray (only if verbose mode is enabled)
 */
export function verbose(message: string): void {
  if (globalOutputOptions.verbose) {
    console.error(`${COLORS.gray}[verbose] ${message}${COLORS.reset}`);
  }
}

/**
 * Output a single record as JSON or as `key: value` lines
 */
export function outputRecord(record: Record<string, unknown>): void {
  if (globalOutputOptions.json) {
    console.log(formatJson(record));
    return;
  }
  for (const [key, value] of Object.entries(record)) {
    console.log(`${COLORS.bold}${key}:${COLORS.reset} ${formatCell(value)}`);
  }
}

/**
 * Output records as JSON or as a table
 */
export function outputList(
  rows: Record<string, unknown>[],
  columns: string[],
  tableOptions?: { maxWidth?: number; headers?: Record<string, string> }
): void {
  if (globalOutputOptions.json) {
    console.log(formatJson(rows));
    return;
  }
  console.log(formatTable(rows, columns, tableOptions));
}

const STATUS_COLORS: Record<string, string> = {
  [Status.PENDING]: COLORS.gray,
  [Status.RUNNING]: COLORS.yellow,
  [Status.COMPLETED]: COLORS.green,
  [Status.FAILED]: COLORS.red,
  [Status.OUT_OF_MEMORY]: COLORS.red,
  [Status.CANCELLED]: COLORS.dim,
  [MetricFlag.PASS]: COLORS.green,
  [MetricFlag.WARNING]: COLORS.yellow,
  [MetricFlag.MISSING]: COLORS.gray,
  [MetricFlag.NOT_APPLICABLE]: COLORS.dim,
};

/**
 * Format a status or QC flag with its color
 */
export function formatStatus(status: string): string {
  const color = STATUS_COLORS[status] ?? COLORS.reset;
  return `${color}${status}${COLORS.reset}`;
}
