/**
 * File Collector
 * 
 * Builds the file set: the fixed top-level files of the source directory
 * plus the files sitting directly inside each extra directory. Collection
 * is shallow; nested directories are never descended into.
 */

import fg from 'fast-glob';
import { isAbsolute, posix, relative, resolve, sep } from 'node:path';
import { DirectoryNotFoundError, FIXED_PATTERNS, ValidationError } from '@relpack/core';
import { createLogger, isDirectory } from '@relpack/utils';

const logger = createLogger({ component: 'collector' });

function normalizeDir(dir: string): string {
  return dir.trim().replace(/[\\/]+$/, '');
}

/**
 * Merge the mandatory utility directory into the user's list.
 * The utility directory comes first; blanks and repeats are dropped.
 */
export function mergeExtraDirs(utilityDir: string, userDirs: readonly string[]): string[] {
  const merged = new Set<string>();
  for (const dir of [utilityDir, ...userDirs]) {
    const normalized = normalizeDir(dir);
    if (normalized) {
      merged.add(normalized);
    }
  }
  return Array.from(merged);
}

/**
 * Split a `--dirs a,b,c` value
 */
export function splitDirList(value: string): string[] {
  return value.split(',').map((dir) => dir.trim()).filter((dir) => dir.length > 0);
}

/**
 * Path of an extra directory relative to the source directory, in posix form
 */
function toSourceRelative(sourceDir: string, dir: string): string {
  const absolute = resolve(sourceDir, dir);
  const rel = relative(sourceDir, absolute);
  if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new ValidationError('--dirs', `"${dir}" must be a directory inside ${sourceDir}`);
  }
  return rel.split(sep).join(posix.sep);
}

/**
 * Every extra directory must exist before any collection work starts
 *
 * @throws DirectoryNotFoundError for the first missing directory
 */
export async function validateExtraDirs(sourceDir: string, dirs: readonly string[]): Promise<void> {
  for (const dir of dirs) {
    toSourceRelative(sourceDir, dir);
    if (!(await isDirectory(resolve(sourceDir, dir)))) {
      throw new DirectoryNotFoundError('extra', dir, sourceDir);
    }
  }
}

/**
 * Collect the file set, as posix paths relative to the source directory
 */
export async function collectFiles(
  sourceDir: string,
  dirs: readonly string[],
  patterns: readonly string[] = FIXED_PATTERNS
): Promise<string[]> {
  const files = new Set<string>();

  const topLevel = await fg([...patterns], {
    cwd: sourceDir,
    onlyFiles: true,
    deep: 1,
    followSymbolicLinks: false,
  });
  for (const file of topLevel) {
    files.add(file);
  }

  for (const pattern of patterns) {
    if (!fg.isDynamicPattern(pattern) && !files.has(pattern)) {
      logger.warn({ file: pattern, sourceDir }, 'Top-level file missing, not packaged');
    }
  }

  for (const dir of dirs) {
    const relDir = toSourceRelative(sourceDir, dir);
    const entries = await fg('*', {
      cwd: resolve(sourceDir, relDir),
      onlyFiles: true,
      dot: true,
      deep: 1,
      followSymbolicLinks: false,
    });
    for (const entry of entries) {
      files.add(posix.join(relDir, entry));
    }
    logger.debug({ dir: relDir, count: entries.length }, 'Collected extra directory');
  }

  return Array.from(files);
}
