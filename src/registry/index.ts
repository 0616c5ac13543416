/**
 * Skill Registry - Module exports
 */

export * from './types.js';
export { parseRegistry, cellText } from './parser.js';
export { KeywordMatcher, tokenize, termsMatch } from './matcher.js';
export type { Matcher } from './matcher.js';
export { SkillRegistry } from './registry.js';
export type { RegistryOptions } from './registry.js';
