/**
 * Reference Resolver - Load reference documents a manifest names
 *
 * Checks run in a fixed order: path safety, then existence, then whether
 * the manifest declares the path.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { ReferenceDocument, SkillManifest } from './types.js';
import type { ManifestLoader } from './loader.js';
import type { CorpusLayout } from '../base/discovery/layout.js';
import {
  normalizeReferencePath,
  pathSegments,
  unsafePathReason,
} from '../base/utils/validation.js';
import { fileSystemErrorCode, isMissingFileError, isWithin } from '../base/utils/path-utils.js';
import {
  PathEscapeError,
  ReferenceNotFoundError,
  ReferenceUnreadableError,
  UndeclaredReferenceError,
} from '../errors.js';
import { logger } from '../base/utils/logger.js';

export class ReferenceResolver {
  private cache = new Map<string, Promise<ReferenceDocument>>();

  constructor(
    private readonly layout: CorpusLayout,
    private readonly loader: ManifestLoader
  ) {}

  /**
   * Load a reference document of a skill
   *
   * @param referencePath - Path relative to the skill directory, e.g. references/java-spring.md
   * @throws PathEscapeError, ReferenceNotFoundError, UndeclaredReferenceError,
   *   or any error from loading the manifest
   */
  async resolve(skill: string, referencePath: string): Promise<ReferenceDocument> {
    const normalized = this.checkPath(skill, referencePath);
    const manifest = await this.loader.load(skill);

    const key = `${skill}\0${normalized}`;
    const cached = this.cache.get(key);
    if (cached) return cached;

    const pending = this.read(manifest, normalized);
    this.cache.set(key, pending);

    try {
      return await pending;
    } catch (error) {
      if (this.cache.get(key) === pending) {
        this.cache.delete(key);
      }
      throw error;
    }
  }

  /**
   * Locate a reference file on disk without the declaration check
   *
   * @returns The real (symlink-free) absolute path of the file
   * @throws PathEscapeError, ReferenceNotFoundError, ReferenceUnreadableError
   */
  async locate(manifest: SkillManifest, referencePath: string): Promise<string> {
    const normalized = this.checkPath(manifest.name, referencePath);
    const absolutePath = path.join(manifest.directory, ...pathSegments(normalized));

    let realPath: string;
    let realSkillDir: string;
    let isRegularFile: boolean;
    try {
      realPath = await fs.realpath(absolutePath);
      realSkillDir = await fs.realpath(manifest.directory);
      isRegularFile = (await fs.stat(realPath)).isFile();
    } catch (error) {
      throw this.fileSystemError(error, manifest.name, normalized, absolutePath);
    }

    if (!isWithin(realSkillDir, realPath)) {
      throw new PathEscapeError(manifest.name, normalized, 'path resolves outside the skill directory');
    }

    if (!isRegularFile) {
      throw new ReferenceNotFoundError(manifest.name, normalized, absolutePath);
    }

    return realPath;
  }

  /**
   * Declared reference paths of a skill, without reading them
   */
  async listReferences(skill: string): Promise<string[]> {
    const manifest = await this.loader.load(skill);
    return [...manifest.references];
  }

  clear(): void {
    this.cache.clear();
  }

  /**
   * Lexical checks: no absolute paths, no "..", and inside references/
   *
   * @returns The normalized path
   */
  private checkPath(skill: string, referencePath: string): string {
    const reason = unsafePathReason(referencePath);
    if (reason) {
      throw new PathEscapeError(skill, referencePath, reason);
    }

    const normalized = normalizeReferencePath(referencePath);
    const segments = pathSegments(normalized);
    if (segments.length < 2 || segments[0] !== this.layout.referencesDir) {
      throw new PathEscapeError(
        skill,
        referencePath,
        `path is outside the ${this.layout.referencesDir}/ directory`
      );
    }

    return normalized;
  }

  /**
   * Map a failed file system call to a reference error; other errors pass through
   */
  private fileSystemError(error: unknown, skill: string, normalized: string, absolutePath: string): unknown {
    if (isMissingFileError(error)) {
      return new ReferenceNotFoundError(skill, normalized, absolutePath);
    }
    const code = fileSystemErrorCode(error);
    if (code !== undefined) {
      return new ReferenceUnreadableError(skill, normalized, absolutePath, code);
    }
    return error;
  }

  private async read(manifest: SkillManifest, normalized: string): Promise<ReferenceDocument> {
    const realPath = await this.locate(manifest, normalized);

    if (!manifest.references.includes(normalized)) {
      throw new UndeclaredReferenceError(manifest.name, normalized, manifest.references);
    }

    const absolutePath = path.join(manifest.directory, ...pathSegments(normalized));

    let content: string;
    try {
      content = await fs.readFile(realPath, 'utf-8');
    } catch (error) {
      throw this.fileSystemError(error, manifest.name, normalized, absolutePath);
    }

    logger.debug('references', 'Loaded reference', {
      skill: manifest.name,
      path: normalized,
      bytes: content.length,
    });

    return Object.freeze({
      skill: manifest.name,
      path: normalized,
      absolutePath,
      content,
    });
  }
}
