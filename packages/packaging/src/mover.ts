/**
 * Moves the finished archive into the target directory.
 */

import { basename, join } from 'node:path';
import { moveFile } from '@relpack/utils';

export interface Mover {
  /** Move a file into a directory, returning its new path */
  move(source: string, destinationDir: string): Promise<string>;
}

export class FsMover implements Mover {
  async move(source: string, destinationDir: string): Promise<string> {
    const destination = join(destinationDir, basename(source));
    await moveFile(source, destination);
    return destination;
  }
}
