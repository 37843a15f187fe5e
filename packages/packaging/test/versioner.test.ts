import { describe, expect, it, vi } from 'vitest';
import { VersionResolutionError } from '@relpack/core';
import type { CommandRunner } from '@relpack/utils';
import { GitVersioner, normalizeVersion, resolvePackageVersion } from '../src/versioner.js';
import { FakeVersioner, commandResult } from './helpers.js';

describe('normalizeVersion', () => {
  it('replaces every dot with an underscore', () => {
    expect(normalizeVersion('1.2')).toBe('1_2');
    expect(normalizeVersion('v2.0.13')).toBe('v2_0_13');
    expect(normalizeVersion(' 3 ')).toBe('3');
  });
});

describe('resolvePackageVersion', () => {
  it('prefers the supplied version over the git tag', async () => {
    const versioner = new FakeVersioner(true, '9.9');
    const isRepository = vi.spyOn(versioner, 'isRepository');

    await expect(resolvePackageVersion('/src', '1.2', versioner)).resolves.toBe('1_2');
    expect(isRepository).not.toHaveBeenCalled();
  });

  it('falls back to the latest tag', async () => {
    await expect(resolvePackageVersion('/src', undefined, new FakeVersioner(true, '2.1.0'))).resolves.toBe(
      '2_1_0'
    );
  });

  it('treats a blank supplied version as absent', async () => {
    await expect(resolvePackageVersion('/src', '  ', new FakeVersioner(true, '0.5'))).resolves.toBe('0_5');
  });

  it('fails without a repository', async () => {
    const attempt = resolvePackageVersion('/src', undefined, new FakeVersioner(false));

    await expect(attempt).rejects.toBeInstanceOf(VersionResolutionError);
    await expect(attempt).rejects.toThrow('package version not supplied and no git environment present.');
  });

  it('fails in a repository without tags', async () => {
    await expect(resolvePackageVersion('/src', undefined, new FakeVersioner(true, null))).rejects.toThrow(
      'package version not supplied and no git tag found in /src.'
    );
  });

  it('rejects a tag with a slash', async () => {
    const attempt = resolvePackageVersion('/src', undefined, new FakeVersioner(true, 'release/2.0'));

    await expect(attempt).rejects.toBeInstanceOf(VersionResolutionError);
    await expect(attempt).rejects.toThrow('package version "release/2.0" must not contain a path separator.');
  });

  it('rejects a supplied version with a backslash', async () => {
    await expect(resolvePackageVersion('/src', 'a\\b', new FakeVersioner(true, '1.0'))).rejects.toMatchObject({
      code: 'VERSION_UNRESOLVED',
      exitCode: 2,
      details: { reason: 'path-separator', version: 'a\\b' },
    });
  });
});

describe('GitVersioner', () => {
  it('asks git whether the directory is a work tree', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue(commandResult({ stdout: 'true\n' }));
    const versioner = new GitVersioner({ gitPath: '/usr/bin/git', run, timeout: 500 });

    await expect(versioner.isRepository('/repo')).resolves.toBe(true);
    expect(run).toHaveBeenCalledWith('/usr/bin/git', ['rev-parse', '--is-inside-work-tree'], {
      cwd: '/repo',
      timeout: 500,
    });
  });

  it('reports non-repositories', async () => {
    const run = vi
      .fn<CommandRunner>()
      .mockResolvedValue(commandResult({ exitCode: 128, stderr: 'fatal: not a git repository' }));

    await expect(new GitVersioner({ run }).isRepository('/tmp')).resolves.toBe(false);
  });

  it('treats a missing git binary as no repository', async () => {
    const missing = Object.assign(new Error('spawn git ENOENT'), { code: 'ENOENT' });
    const run = vi.fn<CommandRunner>().mockRejectedValue(missing);

    await expect(new GitVersioner({ run }).isRepository('/repo')).resolves.toBe(false);
  });

  it('propagates other spawn failures', async () => {
    const run = vi.fn<CommandRunner>().mockRejectedValue(new Error('EACCES'));

    await expect(new GitVersioner({ run }).isRepository('/repo')).rejects.toThrow('EACCES');
  });

  it('reads the most recent tag', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue(commandResult({ stdout: 'v2.0\n' }));
    const versioner = new GitVersioner({ run });

    await expect(versioner.latestTag('/repo')).resolves.toBe('v2.0');
    expect(run).toHaveBeenCalledWith('git', ['describe', '--abbrev=0', '--tags'], {
      cwd: '/repo',
      timeout: 30000,
    });
  });

  it('returns null when describe fails', async () => {
    const run = vi
      .fn<CommandRunner>()
      .mockResolvedValue(commandResult({ exitCode: 128, stderr: 'fatal: No names found' }));

    await expect(new GitVersioner({ run }).latestTag('/repo')).resolves.toBeNull();
  });
});
