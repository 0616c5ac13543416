/**
 * Configuration Merger - Merge settings from multiple sources
 *
 * - Scalar values: higher priority replaces lower
 * - Objects (policy, matcher): merged key by key
 */

import { ISSUE_CODES } from './types.js';
import type { Settings, PartialSettings, ConfigSource } from './types.js';

/**
 * Apply one partial settings object on top of resolved settings
 *
 * Keys present but set to undefined leave the base value in place.
 */
export function applyOverride(base: Settings, override: PartialSettings): Settings {
  const policy = { ...base.policy };
  for (const code of ISSUE_CODES) {
    const severity = override.policy?.[code];
    if (severity !== undefined) policy[code] = severity;
  }

  return {
    skillsDir: override.skillsDir ?? base.skillsDir,
    registryFile: override.registryFile ?? base.registryFile,
    manifestFile: override.manifestFile ?? base.manifestFile,
    referencesDir: override.referencesDir ?? base.referencesDir,
    referenceDiscovery: override.referenceDiscovery ?? base.referenceDiscovery,
    policy,
    matcher: {
      limit: override.matcher?.limit ?? base.matcher.limit,
      minScore: override.matcher?.minScore ?? base.matcher.minScore,
    },
  };
}

/**
 * Merge all configuration sources on top of the defaults
 *
 * Sources should be in priority order (lowest first).
 */
export function mergeSettings(defaults: Settings, sources: ConfigSource[]): Settings {
  let merged = defaults;

  for (const source of sources) {
    merged = applyOverride(merged, source.settings);
  }

  return merged;
}
