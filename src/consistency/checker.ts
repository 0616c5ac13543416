/**
 * Consistency Checker - Keep registry, manifests and references in step
 *
 * Collects every violation instead of stopping at the first one. The
 * policy decides which issue codes are errors, warnings or dropped.
 */

import * as fs from 'fs/promises';
import type { ConsistencyIssue, ConsistencyReport } from './types.js';
import type { ConsistencyPolicy, IssueCode, ReferenceDiscovery } from '../base/config/types.js';
import { DEFAULT_POLICY, DEFAULT_SETTINGS } from '../base/config/types.js';
import type { CorpusLayout } from '../base/discovery/layout.js';
import { displayPath, manifestPath } from '../base/discovery/layout.js';
import { scanManifestDirectories, scanReferenceFiles } from '../base/discovery/file-scanner.js';
import type { SkillRegistry } from '../registry/registry.js';
import type { ReferenceResolver } from '../skills/references.js';
import type { SkillManifest } from '../skills/types.js';
import { parseManifest } from '../skills/parser.js';
import { isValidSkillName } from '../base/utils/validation.js';
import {
  MalformedManifestError,
  MissingManifestError,
  PathEscapeError,
  ReferenceNotFoundError,
  ReferenceUnreadableError,
  RegistryError,
} from '../errors.js';
import { logger } from '../base/utils/logger.js';

export interface ConsistencyCheckerOptions {
  policy?: ConsistencyPolicy;
  referenceDiscovery?: ReferenceDiscovery;
}

type RawIssue = Omit<ConsistencyIssue, 'severity'>;

function compareIssues(a: ConsistencyIssue, b: ConsistencyIssue): number {
  const keys: Array<[string, string]> = [
    [a.skill ?? '', b.skill ?? ''],
    [a.code, b.code],
    [a.path ?? '', b.path ?? ''],
    [a.message, b.message],
  ];
  for (const [left, right] of keys) {
    if (left < right) return -1;
    if (left > right) return 1;
  }
  return 0;
}

/**
 * Apply a severity policy to raw issues and summarize them
 */
export function buildReport(
  rawIssues: RawIssue[],
  policy: ConsistencyPolicy,
  counts: { skillsChecked: number; referencesChecked: number }
): ConsistencyReport {
  const issues: ConsistencyIssue[] = [];

  for (const issue of rawIssues) {
    const severity = policy[issue.code];
    if (severity === 'off') continue;
    issues.push({ ...issue, severity });
  }

  issues.sort(compareIssues);

  const errors = issues.filter((issue) => issue.severity === 'error').length;
  return {
    issues,
    errors,
    warnings: issues.length - errors,
    ok: errors === 0,
    ...counts,
  };
}

export class ConsistencyChecker {
  private readonly policy: ConsistencyPolicy;
  private readonly referenceDiscovery: ReferenceDiscovery;

  /**
   * @param registry - Loaded snapshot, or the error raised while loading it
   */
  constructor(
    private readonly layout: CorpusLayout,
    private readonly registry: SkillRegistry | RegistryError,
    private readonly resolver: ReferenceResolver,
    options: ConsistencyCheckerOptions = {}
  ) {
    this.policy = options.policy ?? DEFAULT_POLICY;
    this.referenceDiscovery = options.referenceDiscovery ?? DEFAULT_SETTINGS.referenceDiscovery;
  }

  async check(): Promise<ConsistencyReport> {
    const issues: RawIssue[] = [];
    const listed = this.checkRegistry(issues);
    const registryLoaded = !(this.registry instanceof RegistryError);
    const onDisk = new Set(await scanManifestDirectories(this.layout));

    for (const name of listed) {
      if (!onDisk.has(name)) {
        const expected = displayPath(this.layout, manifestPath(this.layout, name));
        issues.push({
          code: 'MissingManifest',
          skill: name,
          path: expected,
          message: new MissingManifestError(name, expected).message,
        });
      }
    }

    const manifests = new Map<string, SkillManifest>();
    let skillsChecked = 0;
    let referencesChecked = 0;

    for (const name of onDisk) {
      const filePath = displayPath(this.layout, manifestPath(this.layout, name));

      if (!isValidSkillName(name)) {
        issues.push({
          code: 'InvalidSkillName',
          skill: name,
          path: filePath,
          message: `Skill directory "${name}" is not a valid skill name: must contain only lowercase letters, digits and dashes`,
        });
        continue;
      }

      if (registryLoaded && !listed.has(name)) {
        issues.push({
          code: 'UnlistedManifest',
          skill: name,
          path: filePath,
          message: `Manifest ${filePath} is not listed in the registry`,
        });
      }

      skillsChecked++;
      const manifest = await this.inspectManifest(name, issues);
      if (!manifest) continue;

      manifests.set(name, manifest);
      referencesChecked += await this.checkReferences(name, manifest, issues);
    }

    await this.checkOrphans(manifests, issues);

    const report = buildReport(issues, this.policy, { skillsChecked, referencesChecked });

    logger.debug('consistency', 'Check complete', {
      skills: skillsChecked,
      references: referencesChecked,
      errors: report.errors,
      warnings: report.warnings,
    });

    return report;
  }

  /**
   * Record registry problems
   *
   * @returns Names of the valid registry entries
   */
  private checkRegistry(issues: RawIssue[]): Set<string> {
    if (this.registry instanceof RegistryError) {
      issues.push({
        code: 'MalformedRegistry',
        path: displayPath(this.layout, this.layout.registryPath),
        message: this.registry.message,
      });
      return new Set();
    }

    const registryFile = displayPath(this.layout, this.layout.registryPath);
    for (const problem of this.registry.problems) {
      issues.push({
        code: problem.code,
        skill: problem.name,
        path: registryFile,
        line: problem.line,
        message: problem.message,
      });
    }

    return new Set(this.registry.names());
  }

  private async inspectManifest(name: string, issues: RawIssue[]): Promise<SkillManifest | null> {
    const absolutePath = manifestPath(this.layout, name);
    const filePath = displayPath(this.layout, absolutePath);

    let manifest: SkillManifest;
    try {
      const content = await fs.readFile(absolutePath, 'utf-8');
      manifest = parseManifest(content, absolutePath, {
        referencesDir: this.layout.referencesDir,
        referenceDiscovery: this.referenceDiscovery,
      });
    } catch (error) {
      if (error instanceof MalformedManifestError) {
        issues.push({
          code: 'MalformedManifest',
          skill: name,
          path: filePath,
          message: new MalformedManifestError(filePath, error.problems).message,
        });
        return null;
      }
      throw error;
    }

    if (manifest.name !== name) {
      issues.push({
        code: 'NameMismatch',
        skill: name,
        path: filePath,
        message: `Manifest ${filePath} declares name "${manifest.name}" but lives in directory "${name}"`,
      });
    }

    return manifest;
  }

  /**
   * @returns Number of declared references examined
   */
  private async checkReferences(
    skill: string,
    manifest: SkillManifest,
    issues: RawIssue[]
  ): Promise<number> {
    for (const reference of manifest.references) {
      try {
        await this.resolver.locate(manifest, reference);
      } catch (error) {
        if (error instanceof ReferenceNotFoundError) {
          const missing = displayPath(this.layout, error.resolvedPath);
          issues.push({
            code: 'ReferenceNotFound',
            skill,
            path: missing,
            message: new ReferenceNotFoundError(skill, error.referencePath, missing).message,
          });
        } else if (error instanceof ReferenceUnreadableError) {
          const unreadable = displayPath(this.layout, error.resolvedPath);
          issues.push({
            code: 'ReferenceNotFound',
            skill,
            path: unreadable,
            message: new ReferenceUnreadableError(skill, error.referencePath, unreadable, error.reason).message,
          });
        } else if (error instanceof PathEscapeError) {
          issues.push({
            code: 'PathEscape',
            skill,
            message: new PathEscapeError(skill, error.referencePath, error.reason).message,
          });
        } else {
          throw error;
        }
      }
    }

    if (this.referenceDiscovery === 'frontmatter') {
      for (const mention of manifest.bodyReferences) {
        if (!manifest.seeAlso.includes(mention)) {
          issues.push({
            code: 'UndeclaredReference',
            skill,
            path: displayPath(this.layout, manifest.path),
            message: `Body mentions "${mention}" but see_also does not declare it`,
          });
        }
      }
    }

    return manifest.references.length;
  }

  /**
   * Reference files no manifest names. Only skills whose manifest parsed
   * are checked.
   */
  private async checkOrphans(
    manifests: Map<string, SkillManifest>,
    issues: RawIssue[]
  ): Promise<void> {
    const files = await scanReferenceFiles(this.layout);

    for (const file of files) {
      const manifest = manifests.get(file.skill);
      if (!manifest) continue;

      const named = manifest.seeAlso.includes(file.path) || manifest.bodyReferences.includes(file.path);
      if (!named) {
        const filePath = displayPath(this.layout, file.absolutePath);
        issues.push({
          code: 'OrphanReference',
          skill: file.skill,
          path: filePath,
          message: `Reference ${filePath} is not named by its manifest`,
        });
      }
    }
  }
}
