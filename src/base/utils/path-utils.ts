import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Check if a path exists
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

const MISSING_FILE_CODES = new Set(['ENOENT', 'ENOTDIR', 'EISDIR']);

/**
 * Error code of a failed file system call (ENOENT, ELOOP, ...), if any
 */
export function fileSystemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Whether a file system error means "nothing readable at this path"
 */
export function isMissingFileError(error: unknown): boolean {
  const code = fileSystemErrorCode(error);
  return code !== undefined && MISSING_FILE_CODES.has(code);
}

export async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Whether `target` is `base` itself or lies underneath it
 */
export function isWithin(base: string, target: string): boolean {
  const relative = path.relative(base, target);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

/**
 * Convert a platform path to forward slashes
 */
export function toPosixPath(filePath: string): string {
  return filePath.split(path.sep).join('/');
}

/**
 * Find the corpus root by walking up from `cwd`
 *
 * A directory is the root when it holds skillbook.config.json, a skills
 * directory with a registry file, or .git. Falls back to `cwd`.
 */
export async function findCorpusRoot(
  cwd: string,
  markers: { configFile: string; skillsDir: string; registryFile: string }
): Promise<string> {
  let current = path.resolve(cwd);

  for (;;) {
    if (await pathExists(path.join(current, markers.configFile))) {
      return current;
    }

    if (await isFile(path.join(current, markers.skillsDir, markers.registryFile))) {
      return current;
    }

    if (await pathExists(path.join(current, '.git'))) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }

  return path.resolve(cwd);
}
