import { access, constants, lstat, mkdir, readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { logger } from './logger.js';

/**
 * Check if a path exists and can be stat'ed
 */
export async function isAccessible(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if anything exists at a path, including a dangling symlink
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if the current user may read a path
 */
export async function isReadable(path: string): Promise<boolean> {
  try {
    await access(path, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Size of a file in bytes, or null if it cannot be read
 */
export async function fileSize(path: string): Promise<number | null> {
  try {
    return (await stat(path)).size;
  } catch (error) {
    logger.debug(`Cannot stat ${path}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}

/**
 * Create a directory and its parents
 */
export async function ensureDirectory(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}

/**
 * Total size in bytes of all files below a directory.
 * Missing directories count as empty; entries that disappear mid-walk are skipped.
 */
export async function directorySize(path: string): Promise<number> {
  let entries;
  try {
    entries = await readdir(path, { withFileTypes: true });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
      logger.debug(`Cannot read directory ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }
    return 0;
  }

  let total = 0;
  for (const entry of entries) {
    const fullPath = join(path, entry.name);
    if (entry.isDirectory()) {
      total += await directorySize(fullPath);
    } else if (entry.isFile()) {
      total += (await fileSize(fullPath)) ?? 0;
    }
  }
  return total;
}
