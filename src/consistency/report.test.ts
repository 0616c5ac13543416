/**
 * Consistency Report Formatting Tests
 */

import { describe, it, expect } from '@jest/globals';
import { formatIssue, formatReport } from './report.js';
import type { ConsistencyReport } from './types.js';

const REPORT: ConsistencyReport = {
  issues: [
    {
      code: 'DuplicateRegistryEntry',
      severity: 'error',
      skill: 'api-testing',
      path: 'skills/README.md',
      line: 4,
      message: 'Skill "api-testing" is listed more than once (first on line 3)',
    },
    {
      code: 'OrphanReference',
      severity: 'warning',
      skill: 'api-testing',
      path: 'skills/api-testing/references/pact.md',
      message: 'Reference skills/api-testing/references/pact.md is not named by its manifest',
    },
  ],
  errors: 1,
  warnings: 1,
  ok: false,
  skillsChecked: 1,
  referencesChecked: 0,
};

describe('formatIssue', () => {
  it('should include the line for registry issues', () => {
    expect(formatIssue(REPORT.issues[0])).toBe(
      'error   DuplicateRegistryEntry: Skill "api-testing" is listed more than once (first on line 3) (skills/README.md:4)'
    );
  });

  it('should omit the location when there is no path', () => {
    expect(formatIssue({ code: 'PathEscape', severity: 'error', message: 'escape' })).toBe('error   PathEscape: escape');
  });
});

describe('formatReport', () => {
  it('should end with a summary line', () => {
    const lines = formatReport(REPORT).split('\n');

    expect(lines).toHaveLength(3);
    expect(lines[1]).toBe(
      'warning OrphanReference: Reference skills/api-testing/references/pact.md is not named by its manifest ' +
        '(skills/api-testing/references/pact.md)'
    );
    expect(lines[2]).toBe('1 error, 1 warning (1 skill, 0 references checked)');
  });

  it('should apply the style hooks', () => {
    const style = {
      error: (text: string) => `<${text}>`,
      warning: (text: string) => `{${text}}`,
      dim: (text: string) => text,
    };
    const lines = formatReport(REPORT, style).split('\n');

    expect(lines[0].startsWith('<error  > DuplicateRegistryEntry')).toBe(true);
    expect(lines[1].startsWith('{warning} OrphanReference')).toBe(true);
    expect(lines[2]).toBe('<1 error, 1 warning (1 skill, 0 references checked)>');
  });
});
