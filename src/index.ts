/**
 * skillbook - Skill discovery and context loading for markdown skill corpora
 */

export { SkillCatalog } from './catalog.js';
export type { CatalogOptions, SkillAnalysis, CorpusAnalysis } from './catalog.js';

export * from './errors.js';
export * from './base/config/index.js';
export { resolveLayout } from './base/discovery/layout.js';
export type { CorpusLayout } from './base/discovery/layout.js';
export { logger } from './base/utils/logger.js';
export { resetDebugConfig } from './base/utils/debug.js';
export {
  SkillFrontmatterSchema,
  SettingsFileSchema,
  validateConfig,
} from './base/utils/config-validator.js';
export type { SkillFrontmatter, SettingsFile, ValidationResult } from './base/utils/config-validator.js';

export * from './registry/index.js';
export * from './skills/index.js';
export * from './consistency/index.js';
export * from './analysis/index.js';
export * from './tools/index.js';
