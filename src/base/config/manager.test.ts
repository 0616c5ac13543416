/**
 * Settings Manager Tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import { loadSettings, resolveCorpusRoot } from './manager.js';
import { loadSettingsFile } from './loader.js';
import { parseExtraConfigFiles } from './levels.js';
import { ConfigError } from '../../errors.js';
import { createTestCorpus, writeConfig, writeRegistry, type TestCorpus } from '../../test-utils.js';

describe('loadSettings', () => {
  let corpus: TestCorpus;

  beforeEach(async () => {
    corpus = await createTestCorpus();
  });

  afterEach(async () => {
    await corpus.cleanup();
  });

  it('should return defaults when no settings files exist', async () => {
    const { settings, sources } = await loadSettings(corpus.root, { homeDir: corpus.homeDir, env: {} });

    expect(sources).toEqual([]);
    expect(settings.skillsDir).toBe('skills');
    expect(settings.policy.OrphanReference).toBe('warning');
  });

  it('should merge user, project and local levels in order', async () => {
    await fs.mkdir(path.join(corpus.homeDir, '.skillbook'));
    await fs.writeFile(
      path.join(corpus.homeDir, '.skillbook', 'config.json'),
      JSON.stringify({ matcher: { limit: 2 }, referenceDiscovery: 'frontmatter' })
    );
    await writeConfig(corpus.root, { matcher: { limit: 7 } });
    await writeConfig(corpus.root, { policy: { OrphanReference: 'off' } }, true);

    const { settings, sources } = await loadSettings(corpus.root, { homeDir: corpus.homeDir, env: {} });

    expect(sources.map((source) => source.level)).toEqual(['user', 'project', 'local']);
    expect(settings.matcher.limit).toBe(7);
    expect(settings.referenceDiscovery).toBe('frontmatter');
    expect(settings.policy.OrphanReference).toBe('off');
  });

  it('should read the file named by SKILLBOOK_CONFIG between user and project', async () => {
    const extra = path.join(corpus.tempDir, 'ci.json');
    await fs.writeFile(extra, JSON.stringify({ policy: { OrphanReference: 'error' } }));

    const { settings, sources } = await loadSettings(corpus.root, {
      homeDir: corpus.homeDir,
      env: { SKILLBOOK_CONFIG: extra },
    });

    expect(sources.map((source) => source.level)).toEqual(['extra']);
    expect(settings.policy.OrphanReference).toBe('error');
  });

  it('should apply overrides last', async () => {
    await writeConfig(corpus.root, { matcher: { limit: 7 } });

    const { settings, sources } = await loadSettings(corpus.root, {
      homeDir: corpus.homeDir,
      env: {},
      overrides: { matcher: { limit: 1 } },
    });

    expect(settings.matcher.limit).toBe(1);
    expect(sources[sources.length - 1].level).toBe('cli');
  });

  it('should ignore overrides given as undefined', async () => {
    const { settings } = await loadSettings(corpus.root, {
      homeDir: corpus.homeDir,
      env: {},
      overrides: { referencesDir: undefined, matcher: { limit: 2 } },
    });

    expect(settings.referencesDir).toBe('references');
    expect(settings.matcher.limit).toBe(2);
  });

  it('should reject invalid overrides', async () => {
    await expect(
      loadSettings(corpus.root, { homeDir: corpus.homeDir, env: {}, overrides: { skillsDir: '../up' } })
    ).rejects.toThrow('Invalid settings overrides: skillsDir: Must not contain ".." segments');
  });
});

describe('loadSettingsFile', () => {
  let corpus: TestCorpus;

  beforeEach(async () => {
    corpus = await createTestCorpus();
  });

  afterEach(async () => {
    await corpus.cleanup();
  });

  it('should return null for a missing file', async () => {
    expect(await loadSettingsFile(path.join(corpus.root, 'absent.json'))).toBeNull();
  });

  it('should strip $schema', async () => {
    const filePath = await writeConfig(corpus.root, { $schema: './schema.json', skillsDir: 'docs' });

    expect(await loadSettingsFile(filePath)).toEqual({ skillsDir: 'docs' });
  });

  it('should throw ConfigError naming the file for invalid JSON', async () => {
    const filePath = path.join(corpus.root, 'skillbook.config.json');
    await fs.writeFile(filePath, '{ "skillsDir": ');

    const error = await loadSettingsFile(filePath).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof ConfigError && error.filePath).toBe(filePath);
  });

  it('should throw ConfigError for schema violations', async () => {
    const filePath = await writeConfig(corpus.root, { referenceDiscovery: 'everything' });

    await expect(loadSettingsFile(filePath)).rejects.toThrow(`Invalid settings in ${filePath}`);
  });
});

describe('parseExtraConfigFiles', () => {
  it('should split on the path delimiter and expand ~', () => {
    const env = { SKILLBOOK_CONFIG: ['~/ci.json', '', '/etc/skillbook.json'].join(path.delimiter) };

    expect(parseExtraConfigFiles(env, '/home/tester')).toEqual([
      '/home/tester/ci.json',
      '/etc/skillbook.json',
    ]);
  });
});

describe('resolveCorpusRoot', () => {
  let corpus: TestCorpus;

  beforeEach(async () => {
    corpus = await createTestCorpus();
  });

  afterEach(async () => {
    await corpus.cleanup();
  });

  it('should find the directory holding skills/README.md', async () => {
    await writeRegistry(corpus.root, [['api-testing', 'Use when writing tests']]);
    const nested = path.join(corpus.root, 'skills', 'api-testing');
    await fs.mkdir(nested, { recursive: true });

    expect(await resolveCorpusRoot(nested)).toBe(corpus.root);
  });

  it('should stop at a directory with skillbook.config.json', async () => {
    await writeConfig(corpus.root, {});
    const nested = path.join(corpus.root, 'docs');
    await fs.mkdir(nested);

    expect(await resolveCorpusRoot(nested)).toBe(corpus.root);
  });
});
