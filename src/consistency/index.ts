/**
 * Consistency Checker - Module exports
 */

export * from './types.js';
export { ConsistencyChecker, buildReport } from './checker.js';
export type { ConsistencyCheckerOptions } from './checker.js';
export { formatIssue, formatReport } from './report.js';
export type { ReportStyle } from './report.js';
