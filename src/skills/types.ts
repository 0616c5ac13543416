/**
 * Skills Types - Manifests and the reference documents they name
 */

/**
 * Parsed SKILL.md
 *
 * Loaders share one instance per session, so manifests are frozen.
 */
export interface SkillManifest {
  /** Skill name (kebab-case, equals the directory name) */
  readonly name: string;
  /** Trigger summary shown in the registry */
  readonly description: string;
  /** Markdown body after the frontmatter, trimmed */
  readonly body: string;
  /** File content exactly as read */
  readonly raw: string;
  /** Normalized `see_also` entries */
  readonly seeAlso: readonly string[];
  /** Normalized `references/*.md` mentions found in the body */
  readonly bodyReferences: readonly string[];
  /** Declared reference paths under the active discovery mode */
  readonly references: readonly string[];
  readonly version?: string;
  readonly tags?: readonly string[];
  /** Absolute path to SKILL.md */
  readonly path: string;
  /** Absolute path to the skill directory */
  readonly directory: string;
}

/**
 * A reference document loaded on demand
 */
export interface ReferenceDocument {
  /** Owning skill */
  readonly skill: string;
  /** Path relative to the skill directory, e.g. references/java-spring.md */
  readonly path: string;
  readonly absolutePath: string;
  readonly content: string;
}
