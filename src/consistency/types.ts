/**
 * Consistency Types
 */

import type { IssueCode } from '../base/config/types.js';

export type IssueSeverity = 'error' | 'warning';

export interface ConsistencyIssue {
  code: IssueCode;
  severity: IssueSeverity;
  message: string;
  /** Skill the issue belongs to; absent for registry-wide issues */
  skill?: string;
  /** File the issue points at, relative to the corpus root */
  path?: string;
  /** 1-based line, for registry rows */
  line?: number;
}

export interface ConsistencyReport {
  /** Issues sorted by skill, then code */
  issues: ConsistencyIssue[];
  errors: number;
  warnings: number;
  /** True when no error-severity issue exists */
  ok: boolean;
  skillsChecked: number;
  referencesChecked: number;
}
