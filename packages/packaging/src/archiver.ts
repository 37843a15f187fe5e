/**
 * Archivers
 * 
 * Turn a staging directory into `<archive>.tar.gz`.
 * - SystemTarArchiver shells out to tar (default)
 * - BuiltinTarArchiver uses the tar npm package, for hosts without GNU tar
 */

import fg from 'fast-glob';
import * as tar from 'tar';
import { join } from 'node:path';
import { CommandExecutionError } from '@relpack/core';
import { createLogger, executeCommand, type CommandRunner } from '@relpack/utils';

const logger = createLogger({ component: 'archiver' });

export interface ArchiveRequest {
  /** Directory the archive is written to and the root is found in */
  cwd: string;
  /** Archive file name, relative to cwd */
  archiveName: string;
  /** Staging directory name, the single top-level entry of the archive */
  root: string;
  /** Base-name patterns left out wherever they appear */
  excludes: readonly string[];
}

export interface Archiver {
  readonly name: string;
  create(request: ArchiveRequest): Promise<void>;
}

export interface SystemTarArchiverOptions {
  tarPath?: string;
  timeout?: number;
  run?: CommandRunner;
}

export class SystemTarArchiver implements Archiver {
  readonly name = 'system';
  private readonly tarPath: string;
  private readonly timeout: number;
  private readonly run: CommandRunner;

  constructor(options: SystemTarArchiverOptions = {}) {
    this.tarPath = options.tarPath ?? 'tar';
    this.timeout = options.timeout ?? 300000;
    this.run = options.run ?? executeCommand;
  }

  /**
   * tar -czvf <archive> --exclude <pattern>... <root>
   */
  buildArgs(request: ArchiveRequest): string[] {
    return [
      '-czvf',
      request.archiveName,
      ...request.excludes.flatMap((pattern) => ['--exclude', pattern]),
      request.root,
    ];
  }

  async create(request: ArchiveRequest): Promise<void> {
    const args = this.buildArgs(request);
    logger.debug({ command: this.tarPath, args, cwd: request.cwd }, 'Running tar');

    const result = await this.run(this.tarPath, args, {
      cwd: request.cwd,
      timeout: this.timeout,
    });

    if (result.timedOut) {
      throw new CommandExecutionError(this.tarPath, result.exitCode, `timed out after ${this.timeout}ms`);
    }
    if (result.exitCode !== 0) {
      throw new CommandExecutionError(this.tarPath, result.exitCode, result.stderr);
    }

    const members = result.stdout.split('\n').filter((line) => line.trim().length > 0);
    logger.debug({ archive: request.archiveName, members }, 'tar finished');
  }
}

export class BuiltinTarArchiver implements Archiver {
  readonly name = 'builtin';

  /**
   * Archive members: the root directory and everything below it that no
   * exclude pattern matches. Directories are listed explicitly so tar does
   * not recurse past the filter.
   */
  async listMembers(request: ArchiveRequest): Promise<string[]> {
    const entries = await fg('**', {
      cwd: join(request.cwd, request.root),
      dot: true,
      onlyFiles: false,
      followSymbolicLinks: false,
      ignore: request.excludes.map((pattern) => `**/${pattern}`),
    });
    return [request.root, ...entries.map((entry) => `${request.root}/${entry}`)];
  }

  async create(request: ArchiveRequest): Promise<void> {
    const members = await this.listMembers(request);
    logger.debug({ archive: request.archiveName, members }, 'Writing archive');

    await tar.create(
      {
        gzip: true,
        cwd: request.cwd,
        file: join(request.cwd, request.archiveName),
        portable: true,
        noDirRecurse: true,
      },
      members
    );
  }
}
