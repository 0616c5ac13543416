/**
 * Skill Catalog - One session over a skills corpus
 *
 * Ties together settings, the registry snapshot, the manifest loader,
 * the reference resolver and the consistency checker.
 */

import type { ConfigSource, Settings } from './base/config/types.js';
import { loadSettings, resolveCorpusRoot, type LoadSettingsOptions } from './base/config/manager.js';
import { resolveLayout, type CorpusLayout } from './base/discovery/layout.js';
import { SkillRegistry } from './registry/registry.js';
import { KeywordMatcher, type Matcher } from './registry/matcher.js';
import type { MatchOptions, SkillMatch, SkillRegistryEntry } from './registry/types.js';
import { ManifestLoader } from './skills/loader.js';
import { ReferenceResolver } from './skills/references.js';
import type { ReferenceDocument, SkillManifest } from './skills/types.js';
import { ConsistencyChecker } from './consistency/checker.js';
import type { ConsistencyReport } from './consistency/types.js';
import {
  analyzeDocument,
  summarizeAnalyses,
  type AnalysisSummary,
  type DocumentAnalysis,
} from './analysis/reading-level.js';
import { MissingManifestError, RegistryError, getErrorMessage, isSkillbookError } from './errors.js';
import { logger } from './base/utils/logger.js';

export interface CatalogOptions extends LoadSettingsOptions {
  /** Walk up from the given directory to the corpus root first */
  findRoot?: boolean;
  /** Ranking strategy (defaults to KeywordMatcher with the matcher settings) */
  matcher?: Matcher;
}

export interface SkillAnalysis {
  skill: string;
  manifest: DocumentAnalysis;
  references: DocumentAnalysis[];
}

export interface CorpusAnalysis {
  skills: SkillAnalysis[];
  summary: AnalysisSummary;
}

export class SkillCatalog {
  private constructor(
    readonly layout: CorpusLayout,
    readonly settings: Settings,
    readonly sources: ConfigSource[],
    private readonly registryResult: SkillRegistry | RegistryError,
    readonly loader: ManifestLoader,
    readonly resolver: ReferenceResolver,
    readonly matcher: Matcher
  ) {}

  /**
   * Open a corpus
   *
   * @throws ConfigError when a settings file is invalid
   */
  static async open(root: string = process.cwd(), options: CatalogOptions = {}): Promise<SkillCatalog> {
    const corpusRoot = options.findRoot ? await resolveCorpusRoot(root) : root;
    const { settings, sources } = await loadSettings(corpusRoot, options);
    const layout = resolveLayout(corpusRoot, settings);

    let registry: SkillRegistry | RegistryError;
    try {
      registry = await SkillRegistry.load(layout);
    } catch (error) {
      if (!(error instanceof RegistryError)) throw error;
      logger.warn('registry', error.message, { file: layout.registryPath });
      registry = error;
    }

    const loader = new ManifestLoader(layout, { referenceDiscovery: settings.referenceDiscovery });
    const resolver = new ReferenceResolver(layout, loader);
    const matcher = options.matcher ?? new KeywordMatcher(settings.matcher);

    return new SkillCatalog(layout, settings, sources, registry, loader, resolver, matcher);
  }

  get root(): string {
    return this.layout.root;
  }

  /**
   * Registry snapshot
   *
   * @throws RegistryError when the registry file failed to load
   */
  get registry(): SkillRegistry {
    if (this.registryResult instanceof RegistryError) {
      throw this.registryResult;
    }
    return this.registryResult;
  }

  listSkills(): readonly SkillRegistryEntry[] {
    return this.registry.entries;
  }

  loadManifest(name: string): Promise<SkillManifest> {
    return this.loader.load(name);
  }

  resolveReference(name: string, referencePath: string): Promise<ReferenceDocument> {
    return this.resolver.resolve(name, referencePath);
  }

  listReferences(name: string): Promise<string[]> {
    return this.resolver.listReferences(name);
  }

  checkConsistency(): Promise<ConsistencyReport> {
    const checker = new ConsistencyChecker(this.layout, this.registryResult, this.resolver, {
      policy: this.settings.policy,
      referenceDiscovery: this.settings.referenceDiscovery,
    });
    return checker.check();
  }

  async matchSkills(intent: string, options: MatchOptions = {}): Promise<SkillMatch[]> {
    return this.registry.match(intent, this.matcher, {
      limit: options.limit ?? this.settings.matcher.limit,
      minScore: options.minScore ?? this.settings.matcher.minScore,
    });
  }

  /**
   * Ranked candidates, each verified to have a manifest file
   *
   * @throws MissingManifestError when a candidate has no manifest file
   */
  async findSkillMatches(intent: string, options: MatchOptions = {}): Promise<SkillMatch[]> {
    const matches = await this.matchSkills(intent, options);

    for (const match of matches) {
      if (!(await this.loader.exists(match.name))) {
        throw new MissingManifestError(match.name, this.loader.manifestPath(match.name));
      }
    }

    return matches;
  }

  /**
   * Ranked candidate names for a task description
   *
   * @throws MissingManifestError when a candidate has no manifest file
   */
  async findSkills(intent: string, options: MatchOptions = {}): Promise<string[]> {
    const matches = await this.findSkillMatches(intent, options);
    return matches.map((match) => match.name);
  }

  /**
   * Reading analysis of a manifest body and each declared reference
   */
  async analyzeSkill(name: string): Promise<SkillAnalysis> {
    const manifest = await this.loader.load(name);
    const references: DocumentAnalysis[] = [];

    for (const referencePath of manifest.references) {
      references.push(await this.analyzeReference(name, referencePath));
    }

    return {
      skill: name,
      manifest: await this.analyzeManifest(name),
      references,
    };
  }

  /**
   * Reading analysis of a manifest body alone
   */
  async analyzeManifest(name: string): Promise<DocumentAnalysis> {
    const manifest = await this.loader.load(name);
    return analyzeDocument(manifest.body, `${name}/${this.layout.manifestFile}`);
  }

  /**
   * Reading analysis of one declared reference document
   */
  async analyzeReference(name: string, referencePath: string): Promise<DocumentAnalysis> {
    const document = await this.resolver.resolve(name, referencePath);
    return analyzeDocument(document.content, `${name}/${document.path}`);
  }

  /**
   * Analyze every listed skill; skills that fail to load are skipped
   */
  async analyzeCorpus(): Promise<CorpusAnalysis> {
    const skills: SkillAnalysis[] = [];

    for (const entry of this.registry.entries) {
      try {
        skills.push(await this.analyzeSkill(entry.name));
      } catch (error) {
        if (!isSkillbookError(error)) throw error;
        logger.warn('analysis', `Skipping skill: ${getErrorMessage(error)}`, { skill: entry.name });
      }
    }

    const documents = skills.flatMap((skill) => [skill.manifest, ...skill.references]);
    return { skills, summary: summarizeAnalyses(documents) };
  }

  /**
   * Start a new session
   */
  clear(): void {
    this.loader.clear();
    this.resolver.clear();
  }
}
