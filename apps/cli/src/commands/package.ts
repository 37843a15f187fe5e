/**
 * Package Command
 *
 * The default action: build `<package-name>-<version>.tar.gz`.
 */

import ora from 'ora';
import chalk from 'chalk';
import { resolve } from 'node:path';
import type {
  PackageResult,
  PackagingOptions,
  PackagingState,
  PackagingStateTransition,
} from '@relpack/core';
import { createPackagingConfig } from '@relpack/packaging';
import { formatBytes, formatDuration } from '@relpack/utils';
import type { CliContext } from '../context.js';
import { printKeyValue, printSuccess } from '../lib/output.js';

export interface PackageCommandOptions {
  source?: string;
  targetDir?: string;
  pkgVersion?: string;
  dirs?: string[];
}

const STEP_TEXT: Partial<Record<PackagingState, string>> = {
  RESOLVED_VERSION: 'Checking extra directories...',
  VALIDATED_DIRS: 'Collecting files...',
  COLLECTED_FILES: 'Staging files...',
  STAGED: 'Creating tarball...',
  ARCHIVED: 'Verifying tarball...',
  VERIFIED: 'Moving tarball into place...',
};

/**
 * Command-line flags to packaging options. Relative paths resolve against cwd.
 */
export function toPackagingOptions(options: PackageCommandOptions, cwd: string): PackagingOptions {
  const sourceDir = resolve(cwd, options.source ?? '.');
  return {
    sourceDir,
    targetDir: options.targetDir ? resolve(cwd, options.targetDir) : sourceDir,
    pkgVersion: options.pkgVersion,
    extraDirs: options.dirs ?? [],
    workDir: cwd,
  };
}

export async function packageCommand(
  options: PackageCommandOptions,
  context: CliContext
): Promise<PackageResult> {
  const config = await createPackagingConfig(
    toPackagingOptions(options, context.cwd),
    context.settings.packaging
  );

  console.log('Creates a tarball containing the install package.');
  console.log();
  printKeyValue('Source dir', config.sourceDir);
  printKeyValue('Target dir', config.targetDir);
  printKeyValue('Extra dirs', config.extraDirs.join(' '));

  const spinner = ora('Resolving package version...').start();
  const onTransition = (transition: PackagingStateTransition): void => {
    const version = transition.metadata?.['version'];
    if (transition.to === 'RESOLVED_VERSION' && typeof version === 'string') {
      spinner.info(`Creating ${config.packageName}-${version}.tar.gz tarball in ${config.targetDir}`);
      spinner.start();
    }
    const text = STEP_TEXT[transition.to];
    if (text) {
      spinner.text = text;
    }
  };

  const startedAt = Date.now();
  let result: PackageResult;
  try {
    result = await context.services.createPackager(onTransition).build(config);
  } catch (error) {
    spinner.fail('Packaging failed');
    throw error;
  }
  spinner.stop();

  printSuccess(`Created ${chalk.cyan(result.archivePath)}`);
  printKeyValue('Files', result.files.length);
  printKeyValue('Size', formatBytes(result.size));
  printKeyValue('SHA-256', result.sha256);
  printKeyValue('Time', formatDuration(Date.now() - startedAt));

  return result;
}
