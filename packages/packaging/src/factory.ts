/**
 * Wires the packaging capabilities from environment settings.
 */

import type { PackagingStateTransition, RelpackSettings } from '@relpack/core';
import { BuiltinTarArchiver, SystemTarArchiver, type Archiver } from './archiver.js';
import { Packager } from './packager.js';
import { GitVersioner } from './versioner.js';

export function createArchiver(settings: RelpackSettings): Archiver {
  if (settings.packaging.archiver === 'builtin') {
    return new BuiltinTarArchiver();
  }
  return new SystemTarArchiver({
    tarPath: settings.binaries.tar,
    timeout: settings.packaging.commandTimeoutMs,
  });
}

export function createPackager(
  settings: RelpackSettings,
  onTransition?: (transition: PackagingStateTransition) => void
): Packager {
  return new Packager({
    versioner: new GitVersioner({
      gitPath: settings.binaries.git,
      timeout: settings.packaging.commandTimeoutMs,
    }),
    archiver: createArchiver(settings),
    onTransition,
  });
}
