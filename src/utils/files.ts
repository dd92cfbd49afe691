/**
 * ABOUTME: File system utility functions.
 * Provides existence checks, glob matching and the writable-directory probe
 * used before a run starts.
 */

import { join } from 'node:path';
import { stat, writeFile, unlink } from 'node:fs/promises';
import { randomBytes } from 'node:crypto';

/**
 * Check if a path is a directory
 */
export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stats = await stat(filePath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Check if a path is a file
 */
export async function isFile(filePath: string): Promise<boolean> {
  try {
    const stats = await stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Probe a directory by creating and removing a scratch file.
 * `access(W_OK)` alone misses read-only mounts.
 */
export async function isWritableDirectory(dirPath: string): Promise<boolean> {
  if (!(await isDirectory(dirPath))) {
    return false;
  }
  const probe = join(dirPath, `.write-probe-${randomBytes(4).toString('hex')}`);
  try {
    await writeFile(probe, '');
    await unlink(probe);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a string matches a glob pattern.
 * Supports * (any run of characters except '/'), ** (anything) and ? (one character).
 */
export function globMatch(pattern: string, str: string): boolean {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern.charAt(i);
    if (char === '*') {
      if (pattern.charAt(i + 1) === '*') {
        source += '.*';
        i++;
      } else {
        source += '[^/]*';
      }
    } else if (char === '?') {
      source += '[^/]';
    } else {
      source += char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`).test(str);
}
