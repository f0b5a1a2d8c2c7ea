/**
 * Console output utilities
 *
 * Standard output carries routed data, so every log line, table and spinner
 * goes to stderr.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { LinesiftError } from '@linesift/shared';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface OutputOptions {
  /** Lowest level that is printed (default: info) */
  level?: LogLevel;
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Work out the log level from --quiet and the environment
 */
export function resolveOutputOptions(
  quiet: boolean | undefined,
  env: NodeJS.ProcessEnv = process.env
): OutputOptions {
  if (quiet) {
    return { level: 'warn' };
  }
  const fromEnv = env.LINESIFT_LOG_LEVEL?.toLowerCase();
  return { level: isLogLevel(fromEnv) ? fromEnv : 'info' };
}

function enabled(level: LogLevel, options: OutputOptions): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[options.level ?? 'info'];
}

/**
 * Whether informational output is shown
 */
export function infoEnabled(options: OutputOptions): boolean {
  return enabled('info', options);
}

/**
 * Print debug message
 */
export function debug(message: string, options: OutputOptions = {}): void {
  if (enabled('debug', options)) {
    console.error(chalk.gray('·'), chalk.gray(message));
  }
}

/**
 * Print info message
 */
export function info(message: string, options: OutputOptions = {}): void {
  if (enabled('info', options)) {
    console.error(chalk.blue('ℹ'), message);
  }
}

/**
 * Print success message
 */
export function success(message: string, options: OutputOptions = {}): void {
  if (enabled('info', options)) {
    console.error(chalk.green('✓'), message);
  }
}

/**
 * Print warning message
 */
export function warning(message: string, options: OutputOptions = {}): void {
  if (enabled('warn', options)) {
    console.error(chalk.yellow('⚠'), message);
  }
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

/**
 * Print an error with its details indented beneath it
 */
export function reportError(failure: LinesiftError): void {
  error(failure.message);
  for (const detail of failure.details) {
    console.error(chalk.gray(`    - ${detail}`));
  }
}

/**
 * Create a table with headers and rows
 */
export function createTable(headers: string[], rows: string[][]): Table.Table {
  const table = new Table({
    head: headers.map((h) => chalk.cyan(h)),
    style: {
      head: [],
      border: ['grey'],
    },
  });

  rows.forEach((row) => table.push(row));
  return table;
}

/**
 * Format duration in milliseconds to human readable
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;

  const sec = ms / 1000;
  if (sec < 60) return `${sec.toFixed(1)}s`;

  const min = Math.floor(sec / 60);
  const hour = Math.floor(min / 60);
  if (min < 60) return `${min}m ${Math.floor(sec % 60)}s`;
  return `${hour}h ${min % 60}m`;
}

/**
 * Format key-value pairs
 */
export function formatKeyValue(data: Record<string, string | number>): string {
  const maxKeyLength = Math.max(...Object.keys(data).map((k) => k.length));
  return Object.entries(data)
    .map(([key, value]) => {
      const paddedKey = key.padEnd(maxKeyLength);
      return `  ${chalk.cyan(paddedKey)}: ${value}`;
    })
    .join('\n');
}
