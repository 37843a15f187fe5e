/**
 * Packager
 * 
 * Assembles the release tarball:
 * resolve version → validate dirs → collect → stage → archive → verify → relocate.
 * Every failure is fatal and the run is all-or-nothing.
 */

import { join, resolve } from 'node:path';
import {
  ArchiveCreationError,
  PackagingStateMachine,
  type PackageResult,
  type PackagingConfig,
  type PackagingState,
  type PackagingStateTransition,
} from '@relpack/core';
import {
  calculateFileHash,
  copyFile,
  countEntries,
  createLogger,
  ensureDir,
  getFileSizeBytes,
  removePath,
  type Logger,
} from '@relpack/utils';
import type { Archiver } from './archiver.js';
import { collectFiles, validateExtraDirs } from './collector.js';
import { FsMover, type Mover } from './mover.js';
import { resolvePackageVersion, type Versioner } from './versioner.js';

export interface PackagerDeps {
  versioner: Versioner;
  archiver: Archiver;
  mover?: Mover;
  logger?: Logger;
  onTransition?: (transition: PackagingStateTransition) => void;
}

/**
 * `<package-name>-<version>`: the archive stem and staging directory name
 */
export function archiveStem(packageName: string, version: string): string {
  return `${packageName}-${version}`;
}

export class Packager {
  private readonly versioner: Versioner;
  private readonly archiver: Archiver;
  private readonly mover: Mover;
  private readonly logger: Logger;
  private readonly onTransition?: (transition: PackagingStateTransition) => void;

  constructor(deps: PackagerDeps) {
    this.versioner = deps.versioner;
    this.archiver = deps.archiver;
    this.mover = deps.mover ?? new FsMover();
    this.logger = deps.logger ?? createLogger({ component: 'packager' });
    this.onTransition = deps.onTransition;
  }

  async build(config: PackagingConfig): Promise<PackageResult> {
    const machine = new PackagingStateMachine(`${config.packageName}-${Date.now()}`);
    const step = (state: PackagingState, metadata?: Record<string, unknown>): void => {
      const transition = machine.transitionTo(state, undefined, metadata);
      this.logger.debug({ from: transition.from, to: transition.to, ...metadata }, 'Packaging step');
      this.onTransition?.(transition);
    };

    try {
      step('PARSED_CONFIG', { sourceDir: config.sourceDir, targetDir: config.targetDir });

      const version = await resolvePackageVersion(config.sourceDir, config.pkgVersion, this.versioner);
      step('RESOLVED_VERSION', { version });

      await validateExtraDirs(config.sourceDir, config.extraDirs);
      step('VALIDATED_DIRS', { extraDirs: config.extraDirs });

      const files = await collectFiles(config.sourceDir, config.extraDirs);
      step('COLLECTED_FILES', { count: files.length });

      const stem = archiveStem(config.packageName, version);
      const archiveName = `${stem}.tar.gz`;
      const archivePath = join(config.workDir, archiveName);
      const stagingDir = join(config.workDir, stem);

      this.logger.info({ archive: archiveName, target: config.targetDir }, 'Creating tarball');

      await removePath(archivePath);
      await removePath(stagingDir);
      await ensureDir(stagingDir);

      try {
        // Copy "with parents": bin/a.sh lands in <staging>/bin/a.sh
        for (const file of files) {
          await copyFile(join(config.sourceDir, file), join(stagingDir, file));
        }
        step('STAGED', { stagingDir });

        await this.archiver.create({
          cwd: config.workDir,
          archiveName,
          root: stem,
          excludes: config.excludes,
        });
        step('ARCHIVED', { archiver: this.archiver.name });

        const artifactCount = await countEntries(archivePath);
        if (artifactCount !== 1) {
          throw new ArchiveCreationError(archivePath, artifactCount);
        }
        step('VERIFIED');
      } finally {
        await removePath(stagingDir);
      }

      let finalPath = archivePath;
      if (resolve(config.targetDir) !== resolve(config.workDir)) {
        finalPath = await this.mover.move(archivePath, config.targetDir);
      }
      step('RELOCATED', { archivePath: finalPath });

      const [size, sha256] = await Promise.all([
        getFileSizeBytes(finalPath),
        calculateFileHash(finalPath, 'sha256'),
      ]);

      step('DONE');
      this.logger.info({ archive: finalPath, size, sha256 }, 'Tarball created');

      return {
        packageName: config.packageName,
        version,
        archiveName,
        archivePath: finalPath,
        files,
        size,
        sha256,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const failedAt = machine.getState();
      if (!machine.isTerminal()) {
        this.onTransition?.(machine.fail(message, { failedAt }));
      }
      this.logger.error({ error: message, failedAt }, 'Packaging failed');
      throw error;
    }
  }
}
