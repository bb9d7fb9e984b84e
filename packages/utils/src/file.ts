/**
 * File Operations
 *
 * Safe file operations with proper error handling.
 */

import { mkdir, rm, stat, chmod } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Remove a file, treating "already gone" as success
 */
export async function removeFile(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}

/**
 * Check whether a path exists without throwing
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * rwxr-xr-x
 */
export async function makeExecutable(filePath: string): Promise<void> {
  await chmod(filePath, 0o755);
}

/**
 * Build a unique path for a transient file. Nothing is created on disk.
 */
export function createTempPath(prefix: string, suffix = '.tmp', dir: string = tmpdir()): string {
  return join(dir, `${prefix}-${randomUUID()}${suffix}`);
}
