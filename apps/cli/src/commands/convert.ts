/**
 * Convert Command
 *
 * Turn an office document (install guide, release notes) into a PDF.
 */

import ora from 'ora';
import chalk from 'chalk';
import { resolve } from 'node:path';
import type { CliContext } from '../context.js';
import { printSuccess } from '../lib/output.js';

export interface ConvertCommandOptions {
  outDir?: string;
  timeout?: number;
}

export async function convertCommand(
  document: string,
  options: ConvertCommandOptions,
  context: CliContext
): Promise<string> {
  const spinner = ora(`Converting ${document} to PDF...`).start();

  let pdfPath: string;
  try {
    pdfPath = await context.services.createConverter().convertToPdf(resolve(context.cwd, document), {
      outDir: options.outDir ? resolve(context.cwd, options.outDir) : undefined,
      timeout: options.timeout,
    });
  } catch (error) {
    spinner.fail('Conversion failed');
    throw error;
  }

  spinner.stop();
  printSuccess(`Wrote ${chalk.cyan(pdfPath)}`);
  return pdfPath;
}
