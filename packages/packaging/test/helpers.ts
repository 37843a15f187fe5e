import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import * as tar from 'tar';
import type { CommandResult } from '@relpack/utils';
import type { Versioner } from '../src/versioner.js';

export async function makeTempDir(prefix = 'relpack-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

/**
 * Write files given as relative path -> content
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = join(root, relativePath);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, content);
  }
}

/**
 * Regular-file members of a .tar.gz, sorted
 */
export async function listArchiveFiles(archivePath: string): Promise<string[]> {
  const members: string[] = [];
  await tar.list({
    file: archivePath,
    onReadEntry: (entry) => {
      if (entry.type === 'File') {
        members.push(entry.path);
      }
    },
  });
  return members.sort();
}

export function commandResult(partial: Partial<CommandResult> = {}): CommandResult {
  return {
    exitCode: 0,
    stdout: '',
    stderr: '',
    duration: 1,
    timedOut: false,
    ...partial,
  };
}

export class FakeVersioner implements Versioner {
  constructor(
    private readonly repository: boolean,
    private readonly tag: string | null = null
  ) {}

  async isRepository(): Promise<boolean> {
    return this.repository;
  }

  async latestTag(): Promise<string | null> {
    return this.tag;
  }
}
