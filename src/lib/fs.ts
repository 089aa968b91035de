/**
 * Filesystem helpers shared by the stores and loaders.
 */

import { mkdir, rename, stat, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * The errno code of a filesystem error, if it carries one.
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Check whether a path exists.
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Write a file atomically.
 *
 * Writes to a temp file first, then renames over the target so readers
 * never observe a partial file.
 */
export async function writeFileAtomic(
  filePath: string,
  content: string,
  mode?: number
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.tmp`;
  await writeFile(tempPath, content, { encoding: 'utf-8', mode });
  await rename(tempPath, filePath);
}
