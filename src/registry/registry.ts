/**
 * Skill Registry - Immutable snapshot of the registry table
 *
 * Loaded once and passed to consumers; nothing reads the registry file
 * behind the caller's back.
 */

import * as fs from 'fs/promises';
import type {
  MatchOptions,
  RegistryProblem,
  SkillMatch,
  SkillRegistryEntry,
} from './types.js';
import type { Matcher } from './matcher.js';
import { KeywordMatcher } from './matcher.js';
import { parseRegistry } from './parser.js';
import type { CorpusLayout } from '../base/discovery/layout.js';
import { isMissingFileError } from '../base/utils/path-utils.js';
import { isValidSkillName } from '../base/utils/validation.js';
import { RegistryError } from '../errors.js';
import { logger } from '../base/utils/logger.js';

export interface RegistryOptions {
  /** Reject registries with row problems instead of recording them */
  strict?: boolean;
}

function describeProblems(problems: readonly RegistryProblem[]): string {
  return problems.map((problem) => `line ${problem.line}: ${problem.message}`).join('; ');
}

export class SkillRegistry {
  readonly entries: readonly SkillRegistryEntry[];
  readonly problems: readonly RegistryProblem[];
  private readonly byName: ReadonlyMap<string, SkillRegistryEntry>;

  private constructor(
    entries: SkillRegistryEntry[],
    problems: RegistryProblem[],
    /** File the snapshot was read from, or a label for in-memory snapshots */
    readonly source: string
  ) {
    this.entries = Object.freeze(entries.map((entry) => Object.freeze({ ...entry })));
    this.problems = Object.freeze(problems.map((problem) => Object.freeze({ ...problem })));
    this.byName = new Map(this.entries.map((entry) => [entry.name, entry]));
  }

  /**
   * Read the registry file of a corpus
   *
   * @throws RegistryError when the file is missing or has no skills table
   */
  static async load(layout: CorpusLayout, options: RegistryOptions = {}): Promise<SkillRegistry> {
    let markdown: string;
    try {
      markdown = await fs.readFile(layout.registryPath, 'utf-8');
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new RegistryError(`Registry file not found: ${layout.registryPath}`, layout.registryPath);
      }
      throw error;
    }

    const registry = SkillRegistry.fromMarkdown(markdown, layout.registryPath, options);

    logger.debug('registry', 'Loaded registry', {
      file: layout.registryPath,
      entries: registry.size,
      problems: registry.problems.length,
    });

    return registry;
  }

  static fromMarkdown(
    markdown: string,
    source: string = '<memory>',
    options: RegistryOptions = {}
  ): SkillRegistry {
    const { entries, problems } = parseRegistry(markdown, source);

    if (options.strict && problems.length > 0) {
      throw new RegistryError(`Invalid registry ${source}: ${describeProblems(problems)}`, source);
    }

    for (const problem of problems) {
      logger.warn('registry', problem.message, { file: source, line: problem.line });
    }

    return new SkillRegistry(entries, problems, source);
  }

  /**
   * Build a snapshot from entries held in memory
   *
   * @throws RegistryError on invalid or duplicate names
   */
  static fromEntries(
    entries: ReadonlyArray<Pick<SkillRegistryEntry, 'name' | 'description'> & { line?: number }>
  ): SkillRegistry {
    const seen = new Set<string>();
    const normalized: SkillRegistryEntry[] = [];

    entries.forEach((entry, index) => {
      if (!isValidSkillName(entry.name)) {
        throw new RegistryError(`Invalid skill name "${entry.name}"`);
      }
      if (seen.has(entry.name)) {
        throw new RegistryError(`Skill "${entry.name}" is listed more than once`);
      }
      seen.add(entry.name);
      normalized.push({
        name: entry.name,
        description: entry.description,
        line: entry.line ?? index + 1,
      });
    });

    return new SkillRegistry(normalized, [], '<memory>');
  }

  get size(): number {
    return this.entries.length;
  }

  get(name: string): SkillRegistryEntry | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  names(): string[] {
    return this.entries.map((entry) => entry.name);
  }

  /**
   * Rank entries against a task description
   */
  async match(
    intent: string,
    matcher: Matcher = new KeywordMatcher(),
    options: MatchOptions = {}
  ): Promise<SkillMatch[]> {
    return matcher.rank(intent, this.entries, options);
  }

  /**
   * Ordered candidate names for a task description
   */
  async rank(
    intent: string,
    matcher: Matcher = new KeywordMatcher(),
    options: MatchOptions = {}
  ): Promise<string[]> {
    const matches = await this.match(intent, matcher, options);
    return matches.map((match) => match.name);
  }
}
