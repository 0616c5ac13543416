/**
 * CLI Runner Tests
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach } from '@jest/globals';
import chalk from 'chalk';
import { run, EXIT_FAILURE, EXIT_OK, EXIT_USAGE, type CliIO } from './run.js';
import { USAGE } from './args.js';
import {
  createTestCorpus,
  writeReference,
  writeRegistry,
  writeSkill,
  type TestCorpus,
} from '../test-utils.js';

interface CapturedIO extends CliIO {
  stdout: string[];
  stderr: string[];
}

function captureIO(): CapturedIO {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (text) => stdout.push(text),
    err: (text) => stderr.push(text),
  };
}

describe('run', () => {
  let corpus: TestCorpus;
  let io: CapturedIO;

  const runIn = (argv: string[], cwd: string = corpus.root): Promise<number> =>
    run(argv, { cwd, io, homeDir: corpus.homeDir, env: {} });

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(async () => {
    corpus = await createTestCorpus('skillbook-cli-');
    io = captureIO();
    await writeRegistry(corpus.root, [['api-testing', 'Use when writing contract tests']]);
    await writeSkill(corpus.root, 'api-testing', {
      description: 'Use when writing contract tests',
      seeAlso: ['references/pact.md'],
      body: '# API Testing',
    });
    await writeReference(corpus.root, 'api-testing', 'references/pact.md', '# Pact\n');
  });

  afterEach(async () => {
    await corpus.cleanup();
  });

  it('should print usage for --help', async () => {
    expect(await runIn(['--help'])).toBe(EXIT_OK);
    expect(io.stdout).toEqual([USAGE]);
  });

  it('should exit with a usage error for bad arguments', async () => {
    expect(await runIn([])).toBe(EXIT_USAGE);
    expect(io.stderr).toEqual(['✗ Error: Missing command', USAGE]);
  });

  it('should report a clean corpus', async () => {
    expect(await runIn(['check'])).toBe(EXIT_OK);
    expect(io.stdout).toEqual(['✓ 0 errors, 0 warnings (1 skill, 1 reference checked)']);
  });

  it('should pass warnings unless --strict is set', async () => {
    await writeReference(corpus.root, 'api-testing', 'references/extra.md', '# Extra\n');
    const orphan = 'skills/api-testing/references/extra.md';
    const expected = [
      `warning OrphanReference: Reference ${orphan} is not named by its manifest (${orphan})`,
      '0 errors, 1 warning (1 skill, 1 reference checked)',
    ].join('\n');

    expect(await runIn(['check'])).toBe(EXIT_OK);
    expect(io.stdout).toEqual([expected]);

    expect(await runIn(['check', '--strict'])).toBe(EXIT_FAILURE);
  });

  it('should fail check on errors', async () => {
    await writeRegistry(corpus.root, [
      ['api-testing', 'Use when writing contract tests'],
      ['api-observability', 'Use when adding health checks'],
    ]);

    expect(await runIn(['check', '--json'])).toBe(EXIT_FAILURE);
    const report = JSON.parse(io.stdout[0]);
    expect(report.ok).toBe(false);
    expect(report.issues[0].code).toBe('MissingManifest');
  });

  it('should list registry entries as JSON', async () => {
    expect(await runIn(['list', '--json'])).toBe(EXIT_OK);
    expect(JSON.parse(io.stdout[0])).toEqual([
      { name: 'api-testing', description: 'Use when writing contract tests', line: 5 },
    ]);
  });

  it('should list registry entries as a table', async () => {
    expect(await runIn(['list'])).toBe(EXIT_OK);
    const lines = io.stdout[0].split('\n');
    expect(lines[2]).toBe('api-testing │ Use when writing contract tests');
  });

  it('should rank skills', async () => {
    expect(await runIn(['find', 'contract', 'tests'])).toBe(EXIT_OK);
    const lines = io.stdout[0].split('\n');
    expect(lines[2]).toBe('1 │ api-testing │ 0.67  │ Use when writing contract tests');
  });

  it('should say when nothing matches', async () => {
    expect(await runIn(['find', 'kubernetes'])).toBe(EXIT_OK);
    expect(io.stdout).toEqual(['No matching skills.']);
  });

  it('should show a manifest as JSON without the raw text', async () => {
    expect(await runIn(['show', 'api-testing', '--json'])).toBe(EXIT_OK);
    const manifest = JSON.parse(io.stdout[0]);
    expect(manifest.name).toBe('api-testing');
    expect(manifest.references).toEqual(['references/pact.md']);
    expect(manifest.raw).toBeUndefined();
  });

  it('should print a reference document', async () => {
    expect(await runIn(['ref', 'api-testing', 'references/pact.md'])).toBe(EXIT_OK);
    expect(io.stdout).toEqual(['# Pact\n']);
  });

  it('should print loader errors and exit with failure', async () => {
    expect(await runIn(['ref', 'api-testing', '../other/SKILL.md'])).toBe(EXIT_FAILURE);
    expect(io.stderr).toEqual([
      '✗ Error: Reference "../other/SKILL.md" of skill "api-testing" is not allowed: path contains ".." segments',
    ]);
  });

  it('should resolve --root against the working directory', async () => {
    expect(await runIn(['list', '--json', '--root', 'corpus'], corpus.tempDir)).toBe(EXIT_OK);
    expect(JSON.parse(io.stdout[0])).toHaveLength(1);
  });

  it('should find the corpus root from a subdirectory', async () => {
    const skillDir = `${corpus.root}/skills/api-testing`;
    expect(await runIn(['list', '--json'], skillDir)).toBe(EXIT_OK);
    expect(JSON.parse(io.stdout[0])).toHaveLength(1);
  });

  it('should print reading statistics for a skill', async () => {
    expect(await runIn(['stats', 'api-testing', '--json'])).toBe(EXIT_OK);
    const analysis = JSON.parse(io.stdout[0]);
    expect(analysis.skill).toBe('api-testing');
    expect(analysis.manifest.name).toBe('api-testing/SKILL.md');
    expect(analysis.references.map((reference: { name: string }) => reference.name)).toEqual([
      'api-testing/references/pact.md',
    ]);
  });

  it('should print the reading guide and suggestions with skill statistics', async () => {
    expect(await runIn(['stats', 'api-testing'])).toBe(EXIT_OK);

    expect(io.stdout.slice(1)).toEqual([
      '',
      [
        '> **Reading Guide**',
        '>',
        '> **Reading Time:** 1 minute | **Level:** Intermediate',
        '>',
        '> **Prerequisites:** Basic REST API knowledge  ',
        '> **Key Topics:** API Design',
        '>',
        '> **Complexity:** 8.8 grade level • 50.0% technical density • fairly difficult',
      ].join('\n'),
      '',
      'Suggestions for api-testing/SKILL.md:',
      '- High technical density - consider adding explanations for technical terms',
    ]);
  });

  it('should print the reading guide of a reference', async () => {
    expect(await runIn(['guide', 'api-testing', 'references/pact.md'])).toBe(EXIT_OK);

    expect(io.stdout).toEqual([
      [
        '> **Reading Guide**',
        '>',
        '> **Reading Time:** 1 minute | **Level:** Beginner',
        '>',
        '> **Prerequisites:** Basic HTTP knowledge  ',
        '> **Key Topics:** API Design',
        '>',
        '> **Complexity:** -3.4 grade level • 0.0% technical density • very easy',
      ].join('\n'),
    ]);
  });

  it('should print corpus statistics with a summary', async () => {
    expect(await runIn(['stats'])).toBe(EXIT_OK);
    expect(io.stdout[2]).toBe('Total documents: 2');
  });
});
