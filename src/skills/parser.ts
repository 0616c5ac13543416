/**
 * Skills Parser - Parse SKILL.md files with YAML frontmatter
 *
 * Uses gray-matter to parse YAML frontmatter and extract skill metadata.
 */

import matter from 'gray-matter';
import * as path from 'path';
import type { SkillManifest } from './types.js';
import type { ReferenceDiscovery } from '../base/config/types.js';
import { DEFAULT_SETTINGS } from '../base/config/types.js';
import { validateSkillFrontmatter } from '../base/utils/config-validator.js';
import { normalizeReferencePath } from '../base/utils/validation.js';
import { MalformedManifestError, getErrorMessage } from '../errors.js';

export interface ParseManifestOptions {
  /** Directory name the manifest lives in; frontmatter `name` must equal it */
  expectedName?: string;
  referencesDir?: string;
  referenceDiscovery?: ReferenceDiscovery;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

/**
 * Find `references/<...>.md` mentions in a markdown body
 *
 * A mention may start with `./`. Paths nested under another directory or a
 * URL (`skills/other/references/a.md`) belong to someone else and are skipped.
 * Returns normalized paths in order of first appearance.
 */
export function extractBodyReferences(
  body: string,
  referencesDir: string = DEFAULT_SETTINGS.referencesDir
): string[] {
  const pattern = new RegExp(
    `(?<=^|[^A-Za-z0-9_./-]|(?:^|[^A-Za-z0-9_./-])\\./)${escapeRegExp(referencesDir)}/[A-Za-z0-9._/-]+?\\.md(?![A-Za-z0-9_])`,
    'g'
  );

  return unique(Array.from(body.matchAll(pattern), (match) => normalizeReferencePath(match[0])));
}

/**
 * Reference paths a manifest declares under the given discovery mode
 */
export function declaredReferences(
  manifest: Pick<SkillManifest, 'seeAlso' | 'bodyReferences'>,
  mode: ReferenceDiscovery
): string[] {
  return mode === 'frontmatter'
    ? [...manifest.seeAlso]
    : unique([...manifest.seeAlso, ...manifest.bodyReferences]);
}

/**
 * Parse SKILL.md content into a SkillManifest
 *
 * @param filePath - Absolute path to the SKILL.md file
 * @throws MalformedManifestError when the frontmatter is missing or invalid
 */
export function parseManifest(
  content: string,
  filePath: string,
  options: ParseManifestOptions = {}
): SkillManifest {
  if (!matter.test(content)) {
    throw new MalformedManifestError(filePath, ['missing frontmatter block']);
  }

  let data: Record<string, unknown>;
  let body: string;
  try {
    // options bypass gray-matter's content cache, which keeps failed parses
    const parsed = matter(content, {});
    data = parsed.data;
    body = parsed.content;
  } catch (error) {
    throw new MalformedManifestError(filePath, [`invalid YAML: ${getErrorMessage(error)}`]);
  }

  const validation = validateSkillFrontmatter(data, filePath);
  if (!validation.valid || !validation.data) {
    throw new MalformedManifestError(filePath, validation.errors ?? ['invalid frontmatter']);
  }

  const frontmatter = validation.data;
  if (options.expectedName !== undefined && frontmatter.name !== options.expectedName) {
    throw new MalformedManifestError(filePath, [
      `name "${frontmatter.name}" does not match directory "${options.expectedName}"`,
    ]);
  }

  const trimmedBody = body.trim();
  const seeAlso = unique((frontmatter.see_also ?? []).map(normalizeReferencePath));
  const bodyReferences = extractBodyReferences(
    trimmedBody,
    options.referencesDir ?? DEFAULT_SETTINGS.referencesDir
  );

  return Object.freeze({
    name: frontmatter.name,
    description: frontmatter.description,
    body: trimmedBody,
    raw: content,
    seeAlso: Object.freeze(seeAlso),
    bodyReferences: Object.freeze(bodyReferences),
    references: Object.freeze(
      declaredReferences(
        { seeAlso, bodyReferences },
        options.referenceDiscovery ?? DEFAULT_SETTINGS.referenceDiscovery
      )
    ),
    version: frontmatter.version,
    tags: frontmatter.tags ? Object.freeze(frontmatter.tags) : undefined,
    path: filePath,
    directory: path.dirname(filePath),
  });
}
