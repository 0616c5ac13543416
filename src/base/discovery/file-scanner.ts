/**
 * File Scanner - Scan the skills directory for manifests and references
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import fastGlob from 'fast-glob';
import { manifestPath, type CorpusLayout } from './layout.js';
import { isFile, isDirectory } from '../utils/path-utils.js';

/**
 * List subdirectories of the skills directory that contain a manifest file
 *
 * @returns Directory names, sorted
 */
export async function scanManifestDirectories(layout: CorpusLayout): Promise<string[]> {
  if (!(await isDirectory(layout.skillsDir))) {
    return [];
  }

  const entries = await fs.readdir(layout.skillsDir, { withFileTypes: true });
  const names: string[] = [];

  for (const entry of entries) {
    if (entry.isDirectory() && (await isFile(manifestPath(layout, entry.name)))) {
      names.push(entry.name);
    }
  }

  return names.sort();
}

export interface ScannedReference {
  /** Owning skill (directory name) */
  skill: string;
  /** Path relative to the skill directory, forward slashes */
  path: string;
  absolutePath: string;
}

/**
 * Find every markdown file under <skill>/<referencesDir>/
 */
export async function scanReferenceFiles(layout: CorpusLayout): Promise<ScannedReference[]> {
  if (!(await isDirectory(layout.skillsDir))) {
    return [];
  }

  const pattern = `*/${fastGlob.escapePath(layout.referencesDir)}/**/*.md`;
  const files = await fastGlob(pattern, {
    cwd: layout.skillsDir,
    onlyFiles: true,
    dot: false,
    followSymbolicLinks: false,
  });

  return files.sort().map((relative) => {
    const [skill, ...rest] = relative.split('/');
    return {
      skill,
      path: rest.join('/'),
      absolutePath: path.join(layout.skillsDir, ...relative.split('/')),
    };
  });
}
