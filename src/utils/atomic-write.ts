/**
 * ABOUTME: Atomic file write helpers for the manifest and the run summary.
 * Writes data to a temporary file, fsyncs it, then renames it in place
 * so readers never observe partially-written JSON.
 */

import { dirname } from 'node:path';
import { randomBytes } from 'node:crypto';
import { mkdir, open, rename, rm, type FileHandle } from 'node:fs/promises';

const DEFAULT_MODE = 0o644;

/**
 * Atomically write UTF-8 text to a file.
 */
export async function writeFileAtomic(
  filePath: string,
  content: string,
  mode: number = DEFAULT_MODE
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;

  let handle: FileHandle | null = null;
  try {
    handle = await open(tempPath, 'w', mode);
    await handle.writeFile(content, 'utf-8');
    await handle.sync();
    await handle.close();
    handle = null;

    await rename(tempPath, filePath);
  } catch (error) {
    if (handle) {
      await handle.close().catch(() => undefined);
    }
    await rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Atomically write a JSON value to disk, newline-terminated.
 */
export async function writeJsonAtomic(
  filePath: string,
  value: unknown,
  mode: number = DEFAULT_MODE
): Promise<void> {
  await writeFileAtomic(filePath, `${JSON.stringify(value, null, 2)}\n`, mode);
}
