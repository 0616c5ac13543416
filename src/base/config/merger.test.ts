/**
 * Config Merger Tests
 */

import { describe, it, expect } from '@jest/globals';
import { applyOverride, mergeSettings } from './merger.js';
import { DEFAULT_SETTINGS } from './types.js';
import type { ConfigSource } from './types.js';

describe('applyOverride', () => {
  it('should override scalar values', () => {
    const result = applyOverride(DEFAULT_SETTINGS, { skillsDir: 'docs/skills' });

    expect(result.skillsDir).toBe('docs/skills');
    expect(result.manifestFile).toBe('SKILL.md');
  });

  it('should merge policy key by key', () => {
    const result = applyOverride(DEFAULT_SETTINGS, { policy: { OrphanReference: 'error' } });

    expect(result.policy.OrphanReference).toBe('error');
    expect(result.policy.UndeclaredReference).toBe('warning');
    expect(result.policy.MissingManifest).toBe('error');
  });

  it('should keep base values for keys set to undefined', () => {
    const result = applyOverride(DEFAULT_SETTINGS, {
      referencesDir: undefined,
      policy: { PathEscape: undefined, OrphanReference: 'off' },
      matcher: { limit: undefined },
    });

    expect(result.referencesDir).toBe('references');
    expect(result.policy.PathEscape).toBe('error');
    expect(result.policy.OrphanReference).toBe('off');
    expect(result.matcher.limit).toBe(5);
  });

  it('should not modify the base settings', () => {
    applyOverride(DEFAULT_SETTINGS, { matcher: { limit: 1 } });

    expect(DEFAULT_SETTINGS.matcher.limit).toBe(5);
  });
});

describe('mergeSettings', () => {
  it('should let later sources win', () => {
    const sources: ConfigSource[] = [
      { level: 'user', path: '/home/config.json', settings: { matcher: { limit: 3, minScore: 0.2 } } },
      { level: 'project', path: '/corpus/skillbook.config.json', settings: { matcher: { limit: 10 } } },
      { level: 'local', path: '/corpus/skillbook.config.local.json', settings: { referenceDiscovery: 'frontmatter' } },
    ];

    const result = mergeSettings(DEFAULT_SETTINGS, sources);

    expect(result.matcher).toEqual({ limit: 10, minScore: 0.2 });
    expect(result.referenceDiscovery).toBe('frontmatter');
  });

  it('should return the defaults when there are no sources', () => {
    expect(mergeSettings(DEFAULT_SETTINGS, [])).toEqual(DEFAULT_SETTINGS);
  });
});
