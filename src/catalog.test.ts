/**
 * Skill Catalog Tests
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import { SkillCatalog } from './catalog.js';
import { RegistryError } from './errors.js';
import {
  createTestCorpus,
  writeReference,
  writeRegistry,
  writeSkill,
  type TestCorpus,
} from './test-utils.js';

describe('SkillCatalog', () => {
  let corpus: TestCorpus;

  beforeEach(async () => {
    corpus = await createTestCorpus('skillbook-catalog-');
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    await writeRegistry(corpus.root, [
      ['api-testing', 'Use when writing contract tests'],
      ['rest-api-design', 'Use when designing resource URLs'],
    ]);
    await writeSkill(corpus.root, 'api-testing', {
      description: 'Use when writing contract tests',
      seeAlso: ['references/pact.md'],
    });
    await writeReference(corpus.root, 'api-testing', 'references/pact.md', '# Pact\n');
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await corpus.cleanup();
  });

  const open = (): Promise<SkillCatalog> =>
    SkillCatalog.open(corpus.root, { homeDir: corpus.homeDir, env: {} });

  it('should rank without checking manifests', async () => {
    const catalog = await open();

    const matches = await catalog.matchSkills('api');

    expect(matches.map((match) => match.name)).toEqual(['api-testing', 'rest-api-design']);
    expect(matches[0].score).toBeCloseTo(2 / 3);
    expect(await catalog.matchSkills('api', { minScore: 0.7 })).toEqual([]);
  });

  it('should apply matcher settings from the config file', async () => {
    await fs.writeFile(
      path.join(corpus.root, 'skillbook.config.json'),
      JSON.stringify({ matcher: { limit: 1 } })
    );
    const catalog = await open();

    expect((await catalog.matchSkills('api')).map((match) => match.name)).toEqual(['api-testing']);
  });

  it('should list declared references', async () => {
    const catalog = await open();

    expect(await catalog.listReferences('api-testing')).toEqual(['references/pact.md']);
  });

  it('should skip skills without a manifest when analyzing the corpus', async () => {
    const catalog = await open();

    const analysis = await catalog.analyzeCorpus();

    expect(analysis.skills.map((skill) => skill.skill)).toEqual(['api-testing']);
    expect(analysis.summary.totalDocuments).toBe(2);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('should stay open when the registry has no table', async () => {
    await fs.writeFile(path.join(corpus.root, 'skills', 'README.md'), '# Skills\n\nNothing here yet.\n');

    const catalog = await open();

    expect(() => catalog.registry).toThrow(RegistryError);
    expect(() => catalog.listSkills()).toThrow(RegistryError);

    const report = await catalog.checkConsistency();
    expect(report.issues.map((issue) => issue.code)).toEqual(['MalformedRegistry']);
    expect(report.ok).toBe(false);
  });
});
