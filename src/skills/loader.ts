/**
 * Manifest Loader - Resolve a skill name to its SKILL.md, once per session
 */

import * as fs from 'fs/promises';
import type { SkillManifest } from './types.js';
import type { ReferenceDiscovery } from '../base/config/types.js';
import { DEFAULT_SETTINGS } from '../base/config/types.js';
import type { CorpusLayout } from '../base/discovery/layout.js';
import { manifestPath } from '../base/discovery/layout.js';
import { scanManifestDirectories } from '../base/discovery/file-scanner.js';
import { parseManifest } from './parser.js';
import { isMissingFileError } from '../base/utils/path-utils.js';
import { isValidSkillName } from '../base/utils/validation.js';
import { InvalidSkillNameError, ManifestNotFoundError } from '../errors.js';
import { logger } from '../base/utils/logger.js';

export interface ManifestLoaderOptions {
  referenceDiscovery?: ReferenceDiscovery;
}

export class ManifestLoader {
  private cache = new Map<string, Promise<SkillManifest>>();
  private readonly referenceDiscovery: ReferenceDiscovery;

  constructor(
    private readonly layout: CorpusLayout,
    options: ManifestLoaderOptions = {}
  ) {
    this.referenceDiscovery = options.referenceDiscovery ?? DEFAULT_SETTINGS.referenceDiscovery;
  }

  /**
   * Absolute path of a skill's manifest file
   */
  manifestPath(name: string): string {
    return manifestPath(this.layout, name);
  }

  /**
   * Load a manifest by skill name
   *
   * Concurrent calls for the same name share one read. Failed loads are
   * not cached, so a later call retries.
   *
   * @throws InvalidSkillNameError, ManifestNotFoundError, MalformedManifestError
   */
  async load(name: string): Promise<SkillManifest> {
    if (!isValidSkillName(name)) {
      throw new InvalidSkillNameError(name);
    }

    const cached = this.cache.get(name);
    if (cached) {
      logger.debug('manifests', 'Cache hit', { skill: name }, 2);
      return cached;
    }

    const pending = this.read(name);
    this.cache.set(name, pending);

    try {
      return await pending;
    } catch (error) {
      if (this.cache.get(name) === pending) {
        this.cache.delete(name);
      }
      throw error;
    }
  }

  /**
   * Whether a manifest file exists for the skill (no parsing)
   */
  async exists(name: string): Promise<boolean> {
    if (!isValidSkillName(name)) return false;
    try {
      return (await fs.stat(this.manifestPath(name))).isFile();
    } catch (error) {
      if (isMissingFileError(error)) return false;
      throw error;
    }
  }

  /**
   * List skill directories that contain a manifest file, sorted
   */
  async discoverManifestNames(): Promise<string[]> {
    return scanManifestDirectories(this.layout);
  }

  /**
   * Forget every cached manifest (starts a new session)
   */
  clear(): void {
    this.cache.clear();
  }

  private async read(name: string): Promise<SkillManifest> {
    const filePath = this.manifestPath(name);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new ManifestNotFoundError(name, filePath);
      }
      throw error;
    }

    const manifest = parseManifest(content, filePath, {
      expectedName: name,
      referencesDir: this.layout.referencesDir,
      referenceDiscovery: this.referenceDiscovery,
    });

    logger.debug('manifests', 'Loaded manifest', {
      skill: name,
      references: manifest.references.length,
    });

    return manifest;
  }
}
