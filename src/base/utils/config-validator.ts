/**
 * Configuration Validator
 *
 * Zod schemas for:
 * - SKILL.md frontmatter
 * - skillbook.config.json settings files
 */

import { z } from 'zod';
import { SKILL_NAME_PATTERN } from './validation.js';
import { REFERENCE_DISCOVERY_MODES, SEVERITIES } from '../config/types.js';

/**
 * SKILL.md frontmatter schema
 */
export const SkillFrontmatterSchema = z.object({
  name: z
    .string()
    .min(1, 'Skill name is required')
    .regex(SKILL_NAME_PATTERN, 'Skill name may only contain lowercase letters, digits and dashes'),
  description: z.string().trim().min(1, 'Skill description is required'),
  see_also: z
    .array(z.string().min(1, 'Reference path must not be empty'))
    .optional()
    .describe('Reference documents this skill may load on demand'),
  version: z
    .union([z.string(), z.number()])
    .transform((value) => String(value))
    .optional(),
  tags: z.array(z.string()).optional(),
});

export type SkillFrontmatter = z.infer<typeof SkillFrontmatterSchema>;

const SeveritySchema = z.enum(SEVERITIES);

const PolicySchema = z.strictObject({
  MissingManifest: SeveritySchema.optional(),
  UnlistedManifest: SeveritySchema.optional(),
  NameMismatch: SeveritySchema.optional(),
  MalformedManifest: SeveritySchema.optional(),
  MalformedRegistry: SeveritySchema.optional(),
  DuplicateRegistryEntry: SeveritySchema.optional(),
  InvalidSkillName: SeveritySchema.optional(),
  ReferenceNotFound: SeveritySchema.optional(),
  PathEscape: SeveritySchema.optional(),
  UndeclaredReference: SeveritySchema.optional(),
  OrphanReference: SeveritySchema.optional(),
});

const relativeDir = z
  .string()
  .min(1)
  .refine((value) => !value.split(/[\\/]/).includes('..'), 'Must not contain ".." segments');

// Reference paths are checked against their first segment, so these stay one name
const singleSegment = z
  .string()
  .min(1)
  .refine((value) => !/[\\/]/.test(value), 'Must be a single path segment')
  .refine((value) => value !== '.' && value !== '..', 'Must name a file or directory');

/**
 * skillbook.config.json schema (all fields optional; unknown keys rejected)
 */
export const SettingsFileSchema = z.strictObject({
  $schema: z.string().optional(),
  skillsDir: relativeDir.optional(),
  registryFile: relativeDir.optional(),
  manifestFile: singleSegment.optional(),
  referencesDir: singleSegment.optional(),
  referenceDiscovery: z.enum(REFERENCE_DISCOVERY_MODES).optional(),
  policy: PolicySchema.optional(),
  matcher: z
    .strictObject({
      limit: z.number().int().positive().optional(),
      minScore: z.number().min(0).max(1).optional(),
    })
    .optional(),
});

export type SettingsFile = z.infer<typeof SettingsFileSchema>;

export interface ValidationResult<T> {
  valid: boolean;
  data?: T;
  errors?: string[];
}

/**
 * Validate configuration data against a Zod schema
 *
 * @param context - Context for error messages (e.g., file path)
 */
export function validateConfig<T>(
  schema: z.ZodType<T>,
  data: unknown,
  context: string
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { valid: true, data: result.data };
  }

  const errors = result.error.issues.map((issue) => {
    const issuePath = issue.path.map(String).join('.');
    return issuePath ? `${issuePath}: ${issue.message}` : issue.message;
  });

  return { valid: false, errors: errors.length > 0 ? errors : [`Invalid data in ${context}`] };
}

export function validateSkillFrontmatter(
  data: unknown,
  filePath: string
): ValidationResult<SkillFrontmatter> {
  return validateConfig(SkillFrontmatterSchema, data, filePath);
}

export function validateSettingsFile(
  data: unknown,
  filePath: string
): ValidationResult<SettingsFile> {
  return validateConfig(SettingsFileSchema, data, filePath);
}
