/**
 * Registry Types
 */

/**
 * One row of the registry table
 */
export interface SkillRegistryEntry {
  name: string;
  description: string;
  /** 1-based line of the row in the registry file */
  line: number;
}

export type RegistryProblemCode = 'MalformedRegistry' | 'DuplicateRegistryEntry' | 'InvalidSkillName';

/**
 * A registry row that could not become an entry
 */
export interface RegistryProblem {
  code: RegistryProblemCode;
  message: string;
  line: number;
  name?: string;
}

export interface ParsedRegistry {
  entries: SkillRegistryEntry[];
  problems: RegistryProblem[];
}

/**
 * A ranked registry candidate
 */
export interface SkillMatch {
  name: string;
  /** Relevance between 0 and 1 */
  score: number;
  /** Intent terms that hit the name or description */
  matchedTerms: string[];
}

export interface MatchOptions {
  /** Maximum number of results */
  limit?: number;
  /** Drop results scoring below this */
  minScore?: number;
}
