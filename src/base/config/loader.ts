/**
 * Configuration Loader - Load settings files from every level
 */

import * as fs from 'fs/promises';
import type { ConfigSource, PartialSettings } from './types.js';
import { getConfigLevels, type LevelOptions, type ResolvedLevel } from './levels.js';
import { validateSettingsFile } from '../utils/config-validator.js';
import { ConfigError, getErrorMessage } from '../../errors.js';
import { logger } from '../utils/logger.js';

/**
 * Load and validate a single JSON settings file
 *
 * @returns null when the file does not exist
 * @throws ConfigError when the file is not valid JSON or fails the schema
 */
export async function loadSettingsFile(filePath: string): Promise<PartialSettings | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw new ConfigError(`Cannot read settings file ${filePath}: ${getErrorMessage(error)}`, filePath);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${filePath}: ${getErrorMessage(error)}`, filePath);
  }

  const validation = validateSettingsFile(data, filePath);
  if (!validation.valid || !validation.data) {
    const errorList = validation.errors?.join(', ') ?? 'Unknown validation error';
    throw new ConfigError(`Invalid settings in ${filePath}: ${errorList}`, filePath);
  }

  const { $schema: _schema, ...settings } = validation.data;
  return settings;
}

async function loadFromLevel(level: ResolvedLevel): Promise<ConfigSource | null> {
  if (!level.exists) return null;

  const settings = await loadSettingsFile(level.settingsPath);
  if (!settings) return null;

  logger.debug('config', `Loaded ${level.type} settings`, { file: level.settingsPath });

  return {
    level: level.type,
    path: level.settingsPath,
    settings,
  };
}

/**
 * Load all configuration sources in priority order (lowest first)
 */
export async function loadAllSources(
  corpusRoot: string,
  options: LevelOptions = {}
): Promise<ConfigSource[]> {
  const levels = await getConfigLevels(corpusRoot, options);
  const sources: ConfigSource[] = [];

  for (const level of levels) {
    const source = await loadFromLevel(level);
    if (source) {
      sources.push(source);
    }
  }

  return sources;
}
