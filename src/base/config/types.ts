/**
 * Configuration Types - Multi-level settings
 *
 * Configuration hierarchy (priority from low to high):
 * 1. User Level: ~/.skillbook/config.json
 * 2. Extra: file named by SKILLBOOK_CONFIG
 * 3. Project Level: <root>/skillbook.config.json
 * 4. Local Level: <root>/skillbook.config.local.json (not committed)
 * 5. CLI: programmatic or command line overrides
 */

import * as os from 'os';
import * as path from 'path';

// =============================================================================
// Consistency policy
// =============================================================================

export const ISSUE_CODES = [
  'MissingManifest',
  'UnlistedManifest',
  'NameMismatch',
  'MalformedManifest',
  'MalformedRegistry',
  'DuplicateRegistryEntry',
  'InvalidSkillName',
  'ReferenceNotFound',
  'PathEscape',
  'UndeclaredReference',
  'OrphanReference',
] as const;

export type IssueCode = (typeof ISSUE_CODES)[number];

export const SEVERITIES = ['error', 'warning', 'off'] as const;

export type Severity = (typeof SEVERITIES)[number];

export type ConsistencyPolicy = Record<IssueCode, Severity>;

// =============================================================================
// Settings
// =============================================================================

/**
 * How a manifest declares the references it may load:
 * - frontmatter: only the `see_also` list
 * - frontmatter-and-body: `see_also` plus every references/*.md mention in the body
 */
export const REFERENCE_DISCOVERY_MODES = ['frontmatter', 'frontmatter-and-body'] as const;

export type ReferenceDiscovery = (typeof REFERENCE_DISCOVERY_MODES)[number];

export interface MatcherSettings {
  limit: number;
  minScore: number;
}

/**
 * Fully resolved settings (defaults applied)
 */
export interface Settings {
  skillsDir: string;
  registryFile: string;
  manifestFile: string;
  referencesDir: string;
  referenceDiscovery: ReferenceDiscovery;
  policy: ConsistencyPolicy;
  matcher: MatcherSettings;
}

/**
 * Settings as written in a config file; every field optional
 */
export interface PartialSettings {
  skillsDir?: string;
  registryFile?: string;
  manifestFile?: string;
  referencesDir?: string;
  referenceDiscovery?: ReferenceDiscovery;
  policy?: Partial<ConsistencyPolicy>;
  matcher?: Partial<MatcherSettings>;
}

export const DEFAULT_POLICY: ConsistencyPolicy = {
  MissingManifest: 'error',
  UnlistedManifest: 'error',
  NameMismatch: 'error',
  MalformedManifest: 'error',
  MalformedRegistry: 'error',
  DuplicateRegistryEntry: 'error',
  InvalidSkillName: 'error',
  ReferenceNotFound: 'error',
  PathEscape: 'error',
  UndeclaredReference: 'warning',
  OrphanReference: 'warning',
};

export const DEFAULT_SETTINGS: Settings = {
  skillsDir: 'skills',
  registryFile: 'README.md',
  manifestFile: 'SKILL.md',
  referencesDir: 'references',
  referenceDiscovery: 'frontmatter-and-body',
  policy: DEFAULT_POLICY,
  matcher: {
    limit: 5,
    minScore: 0,
  },
};

// =============================================================================
// Configuration Level Types
// =============================================================================

export type ConfigLevelType = 'user' | 'extra' | 'project' | 'local' | 'cli';

/**
 * A loaded configuration source
 */
export interface ConfigSource {
  level: ConfigLevelType;
  path: string;
  settings: PartialSettings;
}

/**
 * Result of merging all configuration sources
 */
export interface MergedConfig {
  settings: Settings;
  sources: ConfigSource[];
}

// =============================================================================
// Constants
// =============================================================================

export const SKILLBOOK_CONFIG_ENV = 'SKILLBOOK_CONFIG';

export const CONFIG_FILE_NAME = 'skillbook.config.json';
export const CONFIG_LOCAL_FILE_NAME = 'skillbook.config.local.json';
export const USER_CONFIG_FILE_NAME = 'config.json';

export const USER_DIR_NAME = '.skillbook';

export function getUserConfigDir(homeDir: string = os.homedir()): string {
  return path.join(homeDir, USER_DIR_NAME);
}
