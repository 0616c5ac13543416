/**
 * Corpus integration tests against tests/fixtures/corpus
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { SkillCatalog } from '../../src/catalog.js';
import { PathEscapeError, ReferenceNotFoundError } from '../../src/errors.js';
import { writeConfig, writeReference } from '../../src/test-utils.js';

const FIXTURE_ROOT = path.resolve(__dirname, '../fixtures/corpus');

describe('fixture corpus', () => {
  let homeDir: string;
  let catalog: SkillCatalog;

  beforeAll(async () => {
    homeDir = await fs.mkdtemp(path.join(os.tmpdir(), 'skillbook-home-'));
    catalog = await SkillCatalog.open(FIXTURE_ROOT, { homeDir, env: {} });
  });

  afterAll(async () => {
    await fs.rm(homeDir, { recursive: true, force: true });
  });

  it('should read the registry table', () => {
    expect(catalog.listSkills()).toEqual([
      {
        name: 'rest-api-design',
        description: 'Use when designing REST resources, URLs, status codes or pagination',
        line: 8,
      },
      {
        name: 'api-observability',
        description: 'Use when adding health checks, metrics or tracing to a service',
        line: 9,
      },
      {
        name: 'api-testing',
        description: 'Use when writing contract tests or integration tests for an API',
        line: 10,
      },
    ]);
  });

  it('should load a manifest for every registry entry', async () => {
    for (const entry of catalog.listSkills()) {
      const manifest = await catalog.loadManifest(entry.name);
      expect(manifest.name).toBe(entry.name);
    }
  });

  it('should load rest-api-design with its frontmatter', async () => {
    const manifest = await catalog.loadManifest('rest-api-design');

    expect(manifest.description).toBe('Use when designing REST resources, URLs, status codes or pagination');
    expect(manifest.version).toBe('1.2.0');
    expect(manifest.tags).toEqual(['rest', 'design']);
    expect(manifest.references).toEqual(['references/pagination.md']);
    expect(manifest.body.startsWith('# REST API Design')).toBe(true);
  });

  it('should resolve every reference a manifest body mentions', async () => {
    for (const entry of catalog.listSkills()) {
      const manifest = await catalog.loadManifest(entry.name);
      for (const reference of manifest.bodyReferences) {
        const document = await catalog.resolveReference(entry.name, reference);
        expect(document.content.length).toBeGreaterThan(0);
      }
    }
  });

  it('should return the Spring Actuator guide', async () => {
    const document = await catalog.resolveReference('api-observability', 'references/java-spring.md');

    expect(document.skill).toBe('api-observability');
    expect(document.path).toBe('references/java-spring.md');
    expect(document.content.split('\n')[0]).toBe('# Spring Boot Actuator');
    expect(document.content).toContain('/actuator/health/liveness');
  });

  it('should raise ReferenceNotFound for a missing guide', async () => {
    await expect(
      catalog.resolveReference('api-observability', 'references/kotlin-spring.md')
    ).rejects.toBeInstanceOf(ReferenceNotFoundError);
  });

  it('should reject paths with ".." segments', async () => {
    await expect(
      catalog.resolveReference('api-observability', 'references/../SKILL.md')
    ).rejects.toBeInstanceOf(PathEscapeError);
    await expect(
      catalog.resolveReference('api-observability', '../rest-api-design/SKILL.md')
    ).rejects.toBeInstanceOf(PathEscapeError);
  });

  it('should return identical content for repeated loads', async () => {
    const first = await catalog.loadManifest('api-observability');
    const second = await catalog.loadManifest('api-observability');
    catalog.clear();
    const reloaded = await catalog.loadManifest('api-observability');

    expect(second.raw).toBe(first.raw);
    expect(reloaded.raw).toBe(first.raw);
  });

  it('should report no issues', async () => {
    const report = await catalog.checkConsistency();

    expect(report.issues).toEqual([]);
    expect(report.ok).toBe(true);
    expect(report.skillsChecked).toBe(3);
    expect(report.referencesChecked).toBe(2);
  });

  it('should rank name hits above description-only hits', async () => {
    expect(await catalog.findSkills('api design')).toEqual([
      'rest-api-design',
      'api-testing',
      'api-observability',
    ]);
  });

  it('should find the observability skill for a health check task', async () => {
    expect(await catalog.findSkills('add health checks to a spring service')).toEqual(['api-observability']);
  });
});

describe('modified corpus', () => {
  let tempDir: string;
  let root: string;
  let homeDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'skillbook-corpus-'));
    root = path.join(tempDir, 'corpus');
    homeDir = path.join(tempDir, 'home');
    await fs.cp(FIXTURE_ROOT, root, { recursive: true });
    await fs.mkdir(homeDir);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const open = (): Promise<SkillCatalog> => SkillCatalog.open(root, { homeDir, env: {} });

  it('should report exactly one MissingManifest for an unbacked registry row', async () => {
    await fs.appendFile(
      path.join(root, 'skills', 'README.md'),
      '| `codegen-helper` | Use when generating API clients |\n'
    );

    const report = await (await open()).checkConsistency();

    expect(report.issues).toHaveLength(1);
    expect(report.issues[0]).toMatchObject({
      code: 'MissingManifest',
      severity: 'error',
      skill: 'codegen-helper',
    });
    expect(report.ok).toBe(false);
  });

  it('should warn about references no manifest names', async () => {
    await writeReference(root, 'api-testing', 'references/unused.md', '# Unused\n');

    const report = await (await open()).checkConsistency();

    expect(report.issues).toEqual([
      {
        code: 'OrphanReference',
        severity: 'warning',
        skill: 'api-testing',
        path: 'skills/api-testing/references/unused.md',
        message: 'Reference skills/api-testing/references/unused.md is not named by its manifest',
      },
    ]);
    expect(report.ok).toBe(true);
    expect(report.warnings).toBe(1);
  });

  it('should drop issues whose policy is off', async () => {
    await writeReference(root, 'api-testing', 'references/unused.md', '# Unused\n');
    await writeConfig(root, { policy: { OrphanReference: 'off' } }, true);

    const report = await (await open()).checkConsistency();

    expect(report.issues).toEqual([]);
  });

  it('should fail the report when orphans are errors', async () => {
    await writeReference(root, 'api-testing', 'references/unused.md', '# Unused\n');
    await writeConfig(root, { policy: { OrphanReference: 'error' } }, true);

    const report = await (await open()).checkConsistency();

    expect(report.ok).toBe(false);
    expect(report.errors).toBe(1);
  });
});
