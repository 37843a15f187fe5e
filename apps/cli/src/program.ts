/**
 * Command definitions for `relpack`.
 *
 * The bare command packages; `convert` and `publish` are the
 * optional steps around it.
 */

import { Command, CommanderError, InvalidArgumentError, type OutputConfiguration } from 'commander';
import { toRelpackError } from '@relpack/core';
import { splitDirList } from '@relpack/packaging';
import type { CliContext } from './context.js';
import { convertCommand, type ConvertCommandOptions } from './commands/convert.js';
import { packageCommand, type PackageCommandOptions } from './commands/package.js';
import { publishCommand, type PublishCommandOptions } from './commands/publish.js';
import { printError } from './lib/output.js';

export const VERSION = '0.1.0';

const USAGE_NOTES = `
This creates the install tarball <package-name>-<version>.tar.gz.
There are no required parameters.

Notes:
  --source      It is expected that a git clone or git pull has been done
                into the source directory.
  --pkg-version Dots are replaced with underscores in the tarball name.
  --dirs        Collecting files within each directory is not recursive:
                sub-directories are ignored. The utility directory (bin/ by
                default) is always included. May be given more than once.

Top-level *.sh, VERSION and README.md are always packaged.
FIRST_PREP_REPO.sh and *swp files are never packaged.`;

function collectDirs(value: string, previous: string[] = []): string[] {
  return [...previous, ...splitDirList(value)];
}

function parseTimeout(value: string): number {
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new InvalidArgumentError('Not a positive number of milliseconds.');
  }
  return timeout;
}

export function createProgram(context: CliContext, output?: OutputConfiguration): Command {
  const program = new Command();

  // Set before subcommands are added so they inherit both
  program.exitOverride();
  if (output) {
    program.configureOutput(output);
  }

  program
    .name('relpack')
    .description('Create the install package tarball from a source checkout')
    .version(VERSION)
    .option('--source <dir>', 'directory containing the source files (default: current directory)')
    .option('--target-dir <dir>', 'directory the tarball is written to (default: the source directory)')
    .option('--pkg-version <version>', 'version used in the tarball name (default: most recent git tag in the source directory)')
    .option('--dirs <list>', 'comma-separated directories whose files are included', collectDirs)
    .allowExcessArguments(false)
    .addHelpText('after', USAGE_NOTES)
    .action(async (options: PackageCommandOptions) => {
      await packageCommand(options, context);
    });

  program
    .command('convert <document>')
    .description('Convert an office document to PDF with LibreOffice')
    .option('--out-dir <dir>', 'directory the PDF is written to (default: next to the document)')
    .option('--timeout <ms>', 'conversion timeout in milliseconds', parseTimeout)
    .action(async (document: string, options: ConvertCommandOptions) => {
      await convertCommand(document, options, context);
    });

  program
    .command('publish <archive>')
    .description('Upload a tarball to S3-compatible object storage')
    .option('--bucket <name>', 'bucket to upload into (default: MINIO_BUCKET)')
    .option('--prefix <prefix>', 'object key prefix')
    .action(async (archive: string, options: PublishCommandOptions) => {
      await publishCommand(archive, options, context);
    });

  return program;
}

/**
 * Parse and run, returning the process exit code
 */
export async function runCli(
  argv: string[],
  context: CliContext,
  output?: OutputConfiguration
): Promise<number> {
  const program = createProgram(context, output);

  try {
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander has already printed the message; usage errors exit 2
      return error.exitCode === 0 ? 0 : 2;
    }
    const relpackError = toRelpackError(error);
    printError(relpackError.message);
    return relpackError.exitCode;
  }
}
