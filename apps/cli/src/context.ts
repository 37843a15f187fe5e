/**
 * What a command needs to run: settings, the working directory and
 * factories for the services it drives. Tests swap the factories.
 */

import type { PackagingStateTransition, RelpackSettings } from '@relpack/core';
import { SofficeConverter, type DocumentConverter } from '@relpack/convert';
import { createPackager, type Packager } from '@relpack/packaging';
import { createPublisher, type ArchivePublisher } from '@relpack/upload';

export interface CliServices {
  createPackager(onTransition: (transition: PackagingStateTransition) => void): Pick<Packager, 'build'>;
  createConverter(): DocumentConverter;
  createPublisher(): Pick<ArchivePublisher, 'publish'>;
}

export interface CliContext {
  settings: RelpackSettings;
  cwd: string;
  services: CliServices;
}

export function defaultServices(settings: RelpackSettings): CliServices {
  return {
    createPackager: (onTransition) => createPackager(settings, onTransition),
    createConverter: () =>
      new SofficeConverter({
        sofficePath: settings.binaries.soffice,
        timeout: settings.packaging.commandTimeoutMs,
      }),
    createPublisher: () => createPublisher(settings.storage),
  };
}

export function createContext(settings: RelpackSettings, cwd: string): CliContext {
  return { settings, cwd, services: defaultServices(settings) };
}
