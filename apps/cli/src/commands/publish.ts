/**
 * Publish Command
 *
 * Upload a release tarball to object storage.
 */

import ora from 'ora';
import chalk from 'chalk';
import { resolve } from 'node:path';
import type { PublishResult } from '@relpack/upload';
import type { CliContext } from '../context.js';
import { printKeyValue, printSuccess } from '../lib/output.js';

export interface PublishCommandOptions {
  bucket?: string;
  prefix?: string;
}

export async function publishCommand(
  archive: string,
  options: PublishCommandOptions,
  context: CliContext
): Promise<PublishResult> {
  const publisher = context.services.createPublisher();
  const spinner = ora(`Uploading ${archive}...`).start();

  let result: PublishResult;
  try {
    result = await publisher.publish(resolve(context.cwd, archive), {
      bucket: options.bucket,
      prefix: options.prefix,
      onProgress: (progress) => {
        spinner.text = `Uploading ${archive}... ${progress.percentage.toFixed(0)}%`;
      },
    });
  } catch (error) {
    spinner.fail('Upload failed');
    throw error;
  }

  spinner.stop();
  printSuccess(`Published ${chalk.cyan(`${result.bucket}/${result.key}`)}`);
  printKeyValue('ETag', result.etag);
  printKeyValue('SHA-256', result.sha256);
  return result;
}
