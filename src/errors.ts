/**
 * Error types for skill loading and validation
 *
 * Runtime loads throw these; the consistency checker reports the same
 * conditions as aggregated issues instead.
 */

export type SkillbookErrorCode =
  | 'MissingManifest'
  | 'NotFound'
  | 'MalformedManifest'
  | 'ReferenceNotFound'
  | 'ReferenceUnreadable'
  | 'PathEscape'
  | 'UndeclaredReference'
  | 'InvalidSkillName'
  | 'MalformedRegistry'
  | 'InvalidConfig';

export class SkillbookError extends Error {
  constructor(
    message: string,
    public readonly code: SkillbookErrorCode,
    public readonly context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'SkillbookError';
  }
}

/**
 * A registry entry has no manifest file behind it
 */
export class MissingManifestError extends SkillbookError {
  constructor(
    public readonly skill: string,
    public readonly expectedPath: string
  ) {
    super(
      `Registry lists skill "${skill}" but no manifest exists at ${expectedPath}`,
      'MissingManifest',
      { skill, path: expectedPath }
    );
    this.name = 'MissingManifestError';
  }
}

export class ManifestNotFoundError extends SkillbookError {
  constructor(
    public readonly skill: string,
    public readonly expectedPath: string
  ) {
    super(`Skill "${skill}" not found: ${expectedPath} does not exist`, 'NotFound', {
      skill,
      path: expectedPath,
    });
    this.name = 'ManifestNotFoundError';
  }
}

export class MalformedManifestError extends SkillbookError {
  constructor(
    public readonly filePath: string,
    public readonly problems: string[]
  ) {
    super(`Malformed manifest ${filePath}: ${problems.join('; ')}`, 'MalformedManifest', {
      path: filePath,
      problems,
    });
    this.name = 'MalformedManifestError';
  }
}

export class ReferenceNotFoundError extends SkillbookError {
  constructor(
    public readonly skill: string,
    public readonly referencePath: string,
    public readonly resolvedPath: string
  ) {
    super(
      `Reference "${referencePath}" of skill "${skill}" not found: ${resolvedPath} does not exist`,
      'ReferenceNotFound',
      { skill, reference: referencePath, path: resolvedPath }
    );
    this.name = 'ReferenceNotFoundError';
  }
}

/**
 * The reference path exists but cannot be resolved or read (ELOOP, EACCES, ...)
 */
export class ReferenceUnreadableError extends SkillbookError {
  constructor(
    public readonly skill: string,
    public readonly referencePath: string,
    public readonly resolvedPath: string,
    public readonly reason: string
  ) {
    super(
      `Reference "${referencePath}" of skill "${skill}" cannot be read: ${reason}`,
      'ReferenceUnreadable',
      { skill, reference: referencePath, path: resolvedPath, reason }
    );
    this.name = 'ReferenceUnreadableError';
  }
}

export class PathEscapeError extends SkillbookError {
  constructor(
    public readonly skill: string,
    public readonly referencePath: string,
    public readonly reason: string
  ) {
    super(
      `Reference "${referencePath}" of skill "${skill}" is not allowed: ${reason}`,
      'PathEscape',
      { skill, reference: referencePath, reason }
    );
    this.name = 'PathEscapeError';
  }
}

/**
 * The manifest never names the requested reference
 */
export class UndeclaredReferenceError extends SkillbookError {
  constructor(
    public readonly skill: string,
    public readonly referencePath: string,
    public readonly declared: readonly string[]
  ) {
    super(
      `Skill "${skill}" does not reference "${referencePath}"` +
        (declared.length > 0 ? ` (declared: ${declared.join(', ')})` : ' (no references declared)'),
      'UndeclaredReference',
      { skill, reference: referencePath, declared }
    );
    this.name = 'UndeclaredReferenceError';
  }
}

export class InvalidSkillNameError extends SkillbookError {
  constructor(public readonly skill: string) {
    super(
      `Invalid skill name "${skill}": must contain only lowercase letters, digits and dashes`,
      'InvalidSkillName',
      { skill }
    );
    this.name = 'InvalidSkillNameError';
  }
}

export class RegistryError extends SkillbookError {
  constructor(
    message: string,
    public readonly filePath?: string
  ) {
    super(message, 'MalformedRegistry', filePath ? { path: filePath } : {});
    this.name = 'RegistryError';
  }
}

export class ConfigError extends SkillbookError {
  constructor(
    message: string,
    public readonly filePath?: string
  ) {
    super(message, 'InvalidConfig', filePath ? { path: filePath } : {});
    this.name = 'ConfigError';
  }
}

export function isSkillbookError(error: unknown): error is SkillbookError {
  return error instanceof SkillbookError;
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
