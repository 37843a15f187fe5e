import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, dirname, extname, join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import {
  ConversionFailedError,
  ConversionTimeoutError,
  DirectoryNotFoundError,
} from '@relpack/core';
import {
  createLogger,
  ensureDir,
  executeCommand,
  isDirectory,
  moveFile,
  pathExists,
  removePath,
  type CommandResult,
  type CommandRunner,
} from '@relpack/utils';

const logger = createLogger({ component: 'convert:soffice' });

const DEFAULT_TIMEOUT = 60000; // 60 seconds

export interface ConversionOptions {
  /** Directory the PDF is written to; defaults to the document's directory */
  outDir?: string;
  timeout?: number;
}

export interface DocumentConverter {
  /** Convert an office document to PDF and return the PDF's path */
  convertToPdf(documentPath: string, options?: ConversionOptions): Promise<string>;
}

export interface SofficeConverterOptions {
  sofficePath?: string;
  timeout?: number;
  /** Parent directory for the throwaway LibreOffice profile */
  workdir?: string;
  run?: CommandRunner;
}

/**
 * LibreOffice converter
 *
 * Runs `soffice --headless --convert-to pdf` in a fresh directory per
 * conversion, with its own user profile, then moves the PDF into place.
 *
 * @example
 * ```typescript
 * const converter = new SofficeConverter({ timeout: 120000 });
 * const pdfPath = await converter.convertToPdf('docs/install-guide.odt');
 * ```
 */
export class SofficeConverter implements DocumentConverter {
  private readonly sofficePath: string;
  private readonly timeout: number;
  private readonly workdir: string;
  private readonly run: CommandRunner;

  constructor(options: SofficeConverterOptions = {}) {
    this.sofficePath = options.sofficePath ?? 'soffice';
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.workdir = options.workdir ?? tmpdir();
    this.run = options.run ?? executeCommand;
  }

  /**
   * Command: soffice --headless --convert-to pdf --outdir <dir> -env:UserInstallation=<profile> <document>
   */
  buildArgs(documentPath: string, outDir: string, profileDir: string): string[] {
    return [
      '--headless',
      '--convert-to',
      'pdf',
      '--outdir',
      outDir,
      `-env:UserInstallation=${pathToFileURL(profileDir).href}`,
      documentPath,
    ];
  }

  async convertToPdf(documentPath: string, options: ConversionOptions = {}): Promise<string> {
    const document = resolve(documentPath);
    const outDir = resolve(options.outDir ?? dirname(document));
    const timeout = options.timeout ?? this.timeout;

    if (!(await pathExists(document))) {
      throw new ConversionFailedError(documentPath, 'document not found');
    }
    if (!(await isDirectory(outDir))) {
      throw new DirectoryNotFoundError('target', outDir);
    }

    const pdfName = `${basename(document, extname(document))}.pdf`;
    const pdfPath = join(outDir, pdfName);

    // Profile and output live in a per-run directory; only a PDF written there counts
    const runDir = await mkdtemp(join(this.workdir, 'relpack-soffice-'));
    const profileDir = join(runDir, 'profile');
    const runOutDir = join(runDir, 'out');
    const args = this.buildArgs(document, runOutDir, profileDir);

    logger.debug({ command: this.sofficePath, args, timeout }, 'Executing LibreOffice conversion');

    try {
      await ensureDir(runOutDir);

      let result: CommandResult;
      try {
        result = await this.run(this.sofficePath, args, { timeout });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConversionFailedError(documentPath, `could not start ${this.sofficePath}: ${message}`);
      }

      if (result.timedOut) {
        throw new ConversionTimeoutError(documentPath, timeout);
      }

      if (result.exitCode !== 0) {
        throw new ConversionFailedError(documentPath, `exit code ${result.exitCode}`, {
          exitCode: result.exitCode,
          stderr: result.stderr.trim(),
        });
      }

      if (result.stderr.trim()) {
        logger.warn({ stderr: result.stderr.trim() }, 'LibreOffice produced stderr output');
      }

      const producedPath = join(runOutDir, pdfName);
      if (!(await pathExists(producedPath))) {
        throw new ConversionFailedError(documentPath, `LibreOffice did not produce ${pdfName}`, {
          stdout: result.stdout.trim(),
          stderr: result.stderr.trim(),
        });
      }

      await moveFile(producedPath, pdfPath);

      logger.info({ document, pdfPath, duration: result.duration }, 'Conversion completed');
      return pdfPath;
    } finally {
      try {
        await removePath(runDir);
      } catch (cleanupError) {
        logger.warn(
          {
            runDir,
            error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
          },
          'Failed to clean up LibreOffice run directory'
        );
      }
    }
  }
}
