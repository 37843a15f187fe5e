/**
 * @relpack/packaging
 * 
 * Release tarball assembly.
 * 
 * Responsibilities:
 * - Resolve the package version
 * - Collect the file set
 * - Stage, archive and verify
 * - Move the archive into the target directory
 */

export { Packager, archiveStem, type PackagerDeps } from './packager.js';
export { createPackager, createArchiver } from './factory.js';
export { createPackagingConfig, assertDirectory } from './config.js';
export {
  GitVersioner,
  normalizeVersion,
  resolvePackageVersion,
  type Versioner,
  type GitVersionerOptions,
} from './versioner.js';
export {
  collectFiles,
  mergeExtraDirs,
  splitDirList,
  validateExtraDirs,
} from './collector.js';
export {
  SystemTarArchiver,
  BuiltinTarArchiver,
  type Archiver,
  type ArchiveRequest,
  type SystemTarArchiverOptions,
} from './archiver.js';
export { FsMover, type Mover } from './mover.js';
