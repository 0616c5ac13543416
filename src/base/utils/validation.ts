/**
 * Shared Validation Utilities
 */

/**
 * Skill names: lowercase letters, digits and dashes (kebab-case tokens)
 */
export const SKILL_NAME_PATTERN = /^[a-z0-9-]+$/;

export function isValidSkillName(name: string): boolean {
  return SKILL_NAME_PATTERN.test(name);
}

/**
 * Split a relative path on both separators, dropping empty and "." segments
 */
export function pathSegments(relativePath: string): string[] {
  return relativePath.split(/[\\/]+/).filter((segment) => segment !== '' && segment !== '.');
}

/**
 * Normalize an authored reference path ("./references//a.md" -> "references/a.md")
 */
export function normalizeReferencePath(relativePath: string): string {
  return pathSegments(relativePath.trim()).join('/');
}

/**
 * Check a relative path for traversal segments or absolute roots
 *
 * @returns A reason string when the path is unsafe, otherwise null
 */
export function unsafePathReason(relativePath: string): string | null {
  if (relativePath.includes('\0')) {
    return 'path contains a null byte';
  }
  if (/^([\\/]|[a-zA-Z]:)/.test(relativePath)) {
    return 'absolute paths are not allowed';
  }
  if (pathSegments(relativePath).includes('..')) {
    return 'path contains ".." segments';
  }
  return null;
}
