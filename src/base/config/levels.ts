/**
 * Configuration Levels - Path resolution for multi-level config
 *
 * Defines the configuration hierarchy and resolves the settings file
 * for each level. Files are merged from low to high priority.
 */

import * as path from 'path';
import * as os from 'os';
import {
  type ConfigLevelType,
  CONFIG_FILE_NAME,
  CONFIG_LOCAL_FILE_NAME,
  USER_CONFIG_FILE_NAME,
  SKILLBOOK_CONFIG_ENV,
  getUserConfigDir,
} from './types.js';
import { pathExists } from '../utils/path-utils.js';

/**
 * Configuration level with resolved settings file
 */
export interface ResolvedLevel {
  type: ConfigLevelType;
  priority: number;
  settingsPath: string;
  exists: boolean;
  description: string;
}

export interface LevelOptions {
  /** Home directory for the user level (defaults to os.homedir()) */
  homeDir?: string;
  /** Environment to read SKILLBOOK_CONFIG from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Parse SKILLBOOK_CONFIG: one or more settings files separated by the
 * platform path delimiter
 */
export function parseExtraConfigFiles(
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir()
): string[] {
  const value = env[SKILLBOOK_CONFIG_ENV];
  if (!value) return [];

  return value
    .split(path.delimiter)
    .map((file) => file.trim())
    .filter((file) => file.length > 0)
    .map((file) => file.replace(/^~(?=$|[\\/])/, homeDir));
}

/**
 * Get all file-backed configuration levels for a corpus root
 *
 * The cli level has no file; overrides are applied by the manager.
 */
export async function getConfigLevels(
  corpusRoot: string,
  options: LevelOptions = {}
): Promise<ResolvedLevel[]> {
  const homeDir = options.homeDir ?? os.homedir();
  const levels: ResolvedLevel[] = [];

  const userPath = path.join(getUserConfigDir(homeDir), USER_CONFIG_FILE_NAME);
  levels.push({
    type: 'user',
    priority: 10,
    settingsPath: userPath,
    exists: await pathExists(userPath),
    description: 'User global settings',
  });

  const extraFiles = parseExtraConfigFiles(options.env ?? process.env, homeDir);
  for (let i = 0; i < extraFiles.length; i++) {
    const settingsPath = path.resolve(corpusRoot, extraFiles[i]);
    levels.push({
      type: 'extra',
      priority: 20 + i, // Each extra file has slightly higher priority
      settingsPath,
      exists: await pathExists(settingsPath),
      description: `Extra config from ${SKILLBOOK_CONFIG_ENV}`,
    });
  }

  const projectPath = path.join(corpusRoot, CONFIG_FILE_NAME);
  levels.push({
    type: 'project',
    priority: 30,
    settingsPath: projectPath,
    exists: await pathExists(projectPath),
    description: 'Project shared settings',
  });

  const localPath = path.join(corpusRoot, CONFIG_LOCAL_FILE_NAME);
  levels.push({
    type: 'local',
    priority: 40,
    settingsPath: localPath,
    exists: await pathExists(localPath),
    description: 'Local personal settings (not committed)',
  });

  return levels.sort((a, b) => a.priority - b.priority);
}
