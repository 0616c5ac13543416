/**
 * CLI UI - Terminal colors and tables
 */

import chalk from 'chalk';
import type { ReportStyle } from '../consistency/report.js';

export const colors = {
  primary: chalk.cyan,
  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,
  muted: chalk.dim,
  highlight: chalk.bold.white,
};

export const reportStyle: ReportStyle = {
  error: colors.error,
  warning: colors.warning,
  dim: colors.muted,
};

export function formatError(message: string): string {
  return colors.error('✗ Error: ') + message;
}

export function formatSuccess(message: string): string {
  return colors.success('✓ ') + message;
}

export function formatTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? '').length)));

  const lines = [colors.highlight(headers.map((h, i) => h.padEnd(widths[i])).join(' │ '))];
  lines.push(colors.muted(widths.map((w) => '─'.repeat(w)).join('─┼─')));

  for (const row of rows) {
    lines.push(row.map((cell, i) => (cell ?? '').padEnd(widths[i])).join(' │ ').trimEnd());
  }

  return lines.join('\n');
}
