/**
 * Consistency Report Formatting
 */

import type { ConsistencyIssue, ConsistencyReport } from './types.js';

/**
 * Styling hooks; the CLI passes chalk functions, tests pass nothing
 */
export interface ReportStyle {
  error: (text: string) => string;
  warning: (text: string) => string;
  dim: (text: string) => string;
}

const plain = (text: string): string => text;

const PLAIN_STYLE: ReportStyle = { error: plain, warning: plain, dim: plain };

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

export function formatIssue(issue: ConsistencyIssue, style: ReportStyle = PLAIN_STYLE): string {
  const label = issue.severity === 'error' ? style.error('error  ') : style.warning('warning');
  const location = issue.path
    ? style.dim(issue.line !== undefined ? ` (${issue.path}:${issue.line})` : ` (${issue.path})`)
    : '';
  return `${label} ${issue.code}: ${issue.message}${location}`;
}

/**
 * One line per issue followed by a summary line
 */
export function formatReport(report: ConsistencyReport, style: ReportStyle = PLAIN_STYLE): string {
  const lines = report.issues.map((issue) => formatIssue(issue, style));

  const summary =
    `${plural(report.errors, 'error')}, ${plural(report.warnings, 'warning')} ` +
    `(${plural(report.skillsChecked, 'skill')}, ${plural(report.referencesChecked, 'reference')} checked)`;

  lines.push(report.ok ? summary : style.error(summary));
  return lines.join('\n');
}
