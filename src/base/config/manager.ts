/**
 * Settings Manager - Resolve the corpus root and its effective settings
 */

import { DEFAULT_SETTINGS, CONFIG_FILE_NAME } from './types.js';
import type { ConfigSource, MergedConfig, PartialSettings } from './types.js';
import type { LevelOptions } from './levels.js';
import { loadAllSources } from './loader.js';
import { mergeSettings } from './merger.js';
import { validateSettingsFile } from '../utils/config-validator.js';
import { findCorpusRoot } from '../utils/path-utils.js';
import { ConfigError } from '../../errors.js';

export interface LoadSettingsOptions extends LevelOptions {
  /** Highest-priority overrides (CLI flags, programmatic callers) */
  overrides?: PartialSettings;
}

/**
 * Find the corpus root for a working directory
 */
export async function resolveCorpusRoot(cwd: string): Promise<string> {
  return findCorpusRoot(cwd, {
    configFile: CONFIG_FILE_NAME,
    skillsDir: DEFAULT_SETTINGS.skillsDir,
    registryFile: DEFAULT_SETTINGS.registryFile,
  });
}

/**
 * Load and merge settings for a corpus root
 *
 * @throws ConfigError when a settings file or the overrides are invalid
 */
export async function loadSettings(
  corpusRoot: string,
  options: LoadSettingsOptions = {}
): Promise<MergedConfig> {
  const sources = await loadAllSources(corpusRoot, options);

  if (options.overrides) {
    const validation = validateSettingsFile(options.overrides, 'overrides');
    if (!validation.valid || !validation.data) {
      throw new ConfigError(`Invalid settings overrides: ${(validation.errors ?? []).join(', ')}`);
    }

    const { $schema: _schema, ...settings } = validation.data;
    const cliSource: ConfigSource = {
      level: 'cli',
      path: '<overrides>',
      settings,
    };
    sources.push(cliSource);
  }

  return {
    settings: mergeSettings(DEFAULT_SETTINGS, sources),
    sources,
  };
}
