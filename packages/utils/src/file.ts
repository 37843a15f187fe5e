/**
 * File Operations
 * 
 * Safe file operations with proper error handling.
 */

import { 
  mkdir, 
  stat, 
  rename, 
  rm,
  unlink,
  readdir,
  copyFile as fsCopyFile,
} from 'node:fs/promises';
import { createHash } from 'node:crypto';
import { createReadStream, type Stats } from 'node:fs';
import { dirname } from 'node:path';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * stat() that returns null instead of throwing for a missing path
 */
export async function safeStat(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return null;
    }
    throw error;
  }
}

export async function pathExists(path: string): Promise<boolean> {
  return (await safeStat(path)) !== null;
}

export async function isDirectory(path: string): Promise<boolean> {
  const stats = await safeStat(path);
  return stats?.isDirectory() ?? false;
}

/**
 * Number of entries a path holds the way `ls <path> | wc -l` sees it:
 * 0 when missing, 1 for a file, the entry count for a directory.
 */
export async function countEntries(path: string): Promise<number> {
  const stats = await safeStat(path);
  if (!stats) return 0;
  if (!stats.isDirectory()) return 1;
  const entries = await readdir(path);
  return entries.length;
}

/**
 * Remove a file or directory tree; missing paths are fine
 */
export async function removePath(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Calculate the hash of a file
 */
export async function calculateFileHash(
  filePath: string,
  algorithm: 'md5' | 'sha1' | 'sha256' = 'sha256'
): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash(algorithm);
    const stream = createReadStream(filePath);
    
    stream.on('data', (data) => hash.update(data));
    stream.on('end', () => resolve(hash.digest('hex')));
    stream.on('error', reject);
  });
}

/**
 * Get file size in bytes
 */
export async function getFileSizeBytes(filePath: string): Promise<number> {
  const stats = await stat(filePath);
  return stats.size;
}

/**
 * Move a file to a new location.
 * Falls back to copy + unlink when source and destination sit on different devices.
 */
export async function moveFile(
  source: string,
  destination: string
): Promise<void> {
  await ensureDir(dirname(destination));
  try {
    await rename(source, destination);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'EXDEV') {
      throw error;
    }
    await fsCopyFile(source, destination);
    await unlink(source);
  }
}

/**
 * Copy a file to a new location
 */
export async function copyFile(
  source: string,
  destination: string
): Promise<void> {
  await ensureDir(dirname(destination));
  await fsCopyFile(source, destination);
}
