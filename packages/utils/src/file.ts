/**
 * File Operations
 * 
 * Safe file operations with proper error handling.
 */

import { stat, rm } from 'node:fs/promises';
import { rmSync, type Stats } from 'node:fs';

/**
 * Stat a path, returning null if it doesn't exist
 */
export async function safeStat(filePath: string): Promise<Stats | null> {
  try {
    return await stat(filePath);
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return null;
    }
    throw error;
  }
}

/**
 * Get file size in bytes, or null when the file is missing
 */
export async function getFileSizeBytes(filePath: string): Promise<number | null> {
  const stats = await safeStat(filePath);
  return stats?.isFile() ? stats.size : null;
}

/**
 * Remove a file if present. Returns true when something was deleted.
 */
export async function removeFileIfExists(filePath: string): Promise<boolean> {
  const stats = await safeStat(filePath);
  if (!stats) return false;
  await rm(filePath, { force: true });
  return true;
}

/**
 * Synchronous variant for process exit handlers
 */
export function removeFileIfExistsSync(filePath: string): void {
  rmSync(filePath, { force: true });
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
