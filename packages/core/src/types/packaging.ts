/**
 * Packaging run types shared by the CLI and the packaging layer
 */

/**
 * What the option parser hands over. Paths are absolute.
 */
export interface PackagingOptions {
  sourceDir: string;
  targetDir: string;
  pkgVersion?: string;
  /** Extra directories exactly as given on the command line */
  extraDirs: string[];
  /** Directory the staging dir and the archive are created in */
  workDir: string;
}

/**
 * A fully assembled run configuration
 */
export interface PackagingConfig {
  packageName: string;
  sourceDir: string;
  targetDir: string;
  workDir: string;
  pkgVersion?: string;
  /** Utility directory first, then the user's, relative to sourceDir */
  extraDirs: string[];
  /** Member names left out of the archive wherever they appear */
  excludes: string[];
}

export interface PackageResult {
  packageName: string;
  version: string;
  archiveName: string;
  archivePath: string;
  files: string[];
  size: number;
  sha256: string;
}

/** Names never shipped: the repo preparation script and editor swap files */
export const DEFAULT_EXCLUDES: readonly string[] = ['FIRST_PREP_REPO.sh', '*swp'];

/** Top-level files always packaged when present */
export const FIXED_PATTERNS: readonly string[] = ['*.sh', 'VERSION', 'README.md'];
