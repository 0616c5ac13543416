/**
 * Shared test utilities: throw-away skill corpora
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

export interface TestCorpus {
  tempDir: string;
  /** Corpus root (contains skills/) */
  root: string;
  /** Empty home directory for user-level settings */
  homeDir: string;
  cleanup: () => Promise<void>;
}

export interface SkillFixture {
  description?: string;
  /** Frontmatter `name`; defaults to the directory name */
  frontmatterName?: string;
  seeAlso?: string[];
  body?: string;
}

/**
 * Create a temp directory with a corpus root and a separate home directory
 */
export async function createTestCorpus(prefix = 'skillbook-test-'): Promise<TestCorpus> {
  const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  const root = path.join(tempDir, 'corpus');
  const homeDir = path.join(tempDir, 'home');

  await fs.mkdir(path.join(root, 'skills'), { recursive: true });
  await fs.mkdir(homeDir, { recursive: true });

  return {
    tempDir,
    root,
    homeDir,
    cleanup: async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    },
  };
}

/**
 * Write skills/README.md with a Skill | Description table
 */
export async function writeRegistry(
  root: string,
  rows: Array<[string, string]>,
  heading = '# Skills'
): Promise<string> {
  const lines = [heading, '', '| Skill | Description |', '|-------|-------------|'];
  for (const [name, description] of rows) {
    lines.push(`| \`${name}\` | ${description} |`);
  }

  const filePath = path.join(root, 'skills', 'README.md');
  await fs.writeFile(filePath, lines.join('\n') + '\n');
  return filePath;
}

export function manifestContent(name: string, fixture: SkillFixture = {}): string {
  const lines = ['---', `name: ${fixture.frontmatterName ?? name}`];
  lines.push(`description: ${fixture.description ?? `Use when working on ${name}`}`);
  if (fixture.seeAlso) {
    lines.push('see_also:');
    for (const reference of fixture.seeAlso) {
      lines.push(`  - ${reference}`);
    }
  }
  lines.push('---', '', fixture.body ?? `# ${name}`, '');
  return lines.join('\n');
}

/**
 * Write skills/<name>/SKILL.md
 */
export async function writeSkill(root: string, name: string, fixture: SkillFixture = {}): Promise<string> {
  const dir = path.join(root, 'skills', name);
  await fs.mkdir(dir, { recursive: true });

  const filePath = path.join(dir, 'SKILL.md');
  await fs.writeFile(filePath, manifestContent(name, fixture));
  return filePath;
}

/**
 * Write a file under skills/<skill>/ (e.g. references/topic.md)
 */
export async function writeReference(
  root: string,
  skill: string,
  relativePath: string,
  content: string
): Promise<string> {
  const filePath = path.join(root, 'skills', skill, ...relativePath.split('/'));
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
  return filePath;
}

export async function writeConfig(
  root: string,
  settings: Record<string, unknown>,
  local = false
): Promise<string> {
  const filePath = path.join(root, local ? 'skillbook.config.local.json' : 'skillbook.config.json');
  await fs.writeFile(filePath, JSON.stringify(settings, null, 2));
  return filePath;
}
