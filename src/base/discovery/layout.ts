/**
 * Corpus Layout - Absolute paths of the file-layout contract
 *
 *   <root>/<skillsDir>/<registryFile>
 *   <root>/<skillsDir>/<name>/<manifestFile>
 *   <root>/<skillsDir>/<name>/<referencesDir>/<topic>.md
 */

import * as path from 'path';
import type { Settings } from '../config/types.js';
import { toPosixPath } from '../utils/path-utils.js';

export interface CorpusLayout {
  /** Corpus root directory */
  root: string;
  /** Absolute path of the skills directory */
  skillsDir: string;
  /** Absolute path of the registry file */
  registryPath: string;
  /** Manifest file name inside each skill directory */
  manifestFile: string;
  /** References directory name inside each skill directory */
  referencesDir: string;
}

export function resolveLayout(
  root: string,
  settings: Pick<Settings, 'skillsDir' | 'registryFile' | 'manifestFile' | 'referencesDir'>
): CorpusLayout {
  const absoluteRoot = path.resolve(root);
  const skillsDir = path.resolve(absoluteRoot, settings.skillsDir);

  return {
    root: absoluteRoot,
    skillsDir,
    registryPath: path.resolve(skillsDir, settings.registryFile),
    manifestFile: settings.manifestFile,
    referencesDir: settings.referencesDir,
  };
}

export function skillDirectory(layout: CorpusLayout, name: string): string {
  return path.join(layout.skillsDir, name);
}

export function manifestPath(layout: CorpusLayout, name: string): string {
  return path.join(skillDirectory(layout, name), layout.manifestFile);
}

/**
 * Path relative to the corpus root, with forward slashes, for messages
 */
export function displayPath(layout: CorpusLayout, absolutePath: string): string {
  return toPosixPath(path.relative(layout.root, absolutePath));
}
