/**
 * Turns parsed command-line options into a packaging configuration.
 */

import {
  DEFAULT_EXCLUDES,
  DirectoryNotFoundError,
  type DirectoryKind,
  type PackagingConfig,
  type PackagingOptions,
  type RelpackSettings,
} from '@relpack/core';
import { isDirectory } from '@relpack/utils';
import { mergeExtraDirs } from './collector.js';

export async function assertDirectory(kind: DirectoryKind, path: string): Promise<void> {
  if (!(await isDirectory(path))) {
    throw new DirectoryNotFoundError(kind, path);
  }
}

/**
 * Check source and target exist, then merge in the package settings.
 * Extra directories are checked later, once the version is known.
 */
export async function createPackagingConfig(
  options: PackagingOptions,
  settings: RelpackSettings['packaging']
): Promise<PackagingConfig> {
  await assertDirectory('source', options.sourceDir);
  await assertDirectory('target', options.targetDir);

  return {
    packageName: settings.packageName,
    sourceDir: options.sourceDir,
    targetDir: options.targetDir,
    workDir: options.workDir,
    pkgVersion: options.pkgVersion,
    extraDirs: mergeExtraDirs(settings.utilityDir, options.extraDirs),
    excludes: [...DEFAULT_EXCLUDES],
  };
}
