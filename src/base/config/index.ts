/**
 * Configuration System
 */

export * from './types.js';
export { getConfigLevels, parseExtraConfigFiles } from './levels.js';
export type { ResolvedLevel, LevelOptions } from './levels.js';
export { loadSettingsFile, loadAllSources } from './loader.js';
export { applyOverride, mergeSettings } from './merger.js';
export { resolveCorpusRoot, loadSettings } from './manager.js';
export type { LoadSettingsOptions } from './manager.js';
