/**
 * Version Resolver
 * 
 * Derives the package version from an explicit override or from the
 * newest tag of the source directory's git repository.
 */

import { VersionResolutionError } from '@relpack/core';
import { createLogger, executeCommand, type CommandRunner } from '@relpack/utils';

const logger = createLogger({ component: 'versioner' });

/**
 * Version control capability used by the resolver
 */
export interface Versioner {
  isRepository(dir: string): Promise<boolean>;
  /** Most recent tag reachable from HEAD, or null when there is none */
  latestTag(dir: string): Promise<string | null>;
}

export interface GitVersionerOptions {
  gitPath?: string;
  timeout?: number;
  run?: CommandRunner;
}

export class GitVersioner implements Versioner {
  private readonly gitPath: string;
  private readonly timeout: number;
  private readonly run: CommandRunner;

  constructor(options: GitVersionerOptions = {}) {
    this.gitPath = options.gitPath ?? 'git';
    this.timeout = options.timeout ?? 30000;
    this.run = options.run ?? executeCommand;
  }

  async isRepository(dir: string): Promise<boolean> {
    try {
      const result = await this.run(this.gitPath, ['rev-parse', '--is-inside-work-tree'], {
        cwd: dir,
        timeout: this.timeout,
      });
      return result.exitCode === 0 && result.stdout.trim() === 'true';
    } catch (error) {
      // No git binary means no git environment
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        logger.debug({ gitPath: this.gitPath }, 'git binary not found');
        return false;
      }
      throw error;
    }
  }

  async latestTag(dir: string): Promise<string | null> {
    const result = await this.run(this.gitPath, ['describe', '--abbrev=0', '--tags'], {
      cwd: dir,
      timeout: this.timeout,
    });

    if (result.exitCode !== 0) {
      logger.debug({ dir, stderr: result.stderr.trim() }, 'git describe found no tag');
      return null;
    }

    const tag = result.stdout.trim();
    return tag.length > 0 ? tag : null;
  }
}

/**
 * Make a version safe for file and directory names: x.y -> x_y
 */
export function normalizeVersion(version: string): string {
  return version.trim().replace(/\./g, '_');
}

/**
 * Resolve the package version. A supplied version trumps the git tag.
 *
 * @throws VersionResolutionError when neither source yields a usable version
 */
export async function resolvePackageVersion(
  sourceDir: string,
  explicitVersion: string | undefined,
  versioner: Versioner
): Promise<string> {
  let raw = explicitVersion?.trim() ?? '';

  if (raw) {
    logger.debug({ version: raw }, 'Using supplied package version');
  } else {
    if (!(await versioner.isRepository(sourceDir))) {
      throw new VersionResolutionError(sourceDir, 'no-repository');
    }
    const tag = await versioner.latestTag(sourceDir);
    if (!tag) {
      throw new VersionResolutionError(sourceDir, 'no-tags');
    }
    logger.debug({ tag, sourceDir }, 'Using latest git tag as package version');
    raw = tag;
  }

  const version = normalizeVersion(raw);
  if (!version) {
    throw new VersionResolutionError(sourceDir, 'empty');
  }
  // Names a single archive and staging directory; tags such as release/2.0 would nest it
  if (/[\/\\]/.test(version)) {
    throw new VersionResolutionError(sourceDir, 'path-separator', raw.trim());
  }
  return version;
}
